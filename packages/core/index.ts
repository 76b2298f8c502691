/**
 * Intcode Core Package
 *
 * Logging and environment configuration shared by the Intcode packages
 */

export * from './src/env'
export * from './src/logger'
