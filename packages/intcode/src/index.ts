/**
 * Intcode Virtual Machine
 *
 * Interpreter, loader, disassembler and host helpers
 */

export * from './config'
export * from './decoder'
export * from './disassembler'
export * from './env'
export * from './host'
export * from './instructions/arithmetic'
export * from './instructions/base'
export * from './instructions/comparison'
export * from './instructions/control-flow'
export * from './instructions/io'
export * from './instructions/registry'
export * from './instructions/relative-base'
export * from './machine'
export * from './memory'
export * from './operands'
export * from './parser'
