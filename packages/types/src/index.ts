export * from './errors'
export * from './intcode'
export * from './safe'
