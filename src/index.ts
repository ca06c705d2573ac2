/**
 * scanrelay library entry point
 */

export * from './types/index.js'
export * from './core/errors.js'
export * from './core/config/index.js'
export * from './core/manifest/index.js'
export * from './core/runner/index.js'
export * from './core/scanner/index.js'
export * from './core/aggregator/index.js'
export * from './core/quality-gate/index.js'
export * from './core/notifier/index.js'
export * from './core/workspace/index.js'
export * from './core/pipeline/index.js'
export { createLogger, configureLogger, nullLogger, type Logger, type LogLevel } from './utils/logger.js'
