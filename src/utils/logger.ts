import chalk from 'chalk'

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel
  quiet: boolean
  /** Prefix every line with an ISO timestamp (CI consoles usually add their own) */
  timestamps: boolean
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
}

const COLORS: Record<LogLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red
}

let config: LoggerConfig = {
  level: 'info',
  quiet: false,
  timestamps: true
}

/**
 * Configure the logger
 */
export function configureLogger(options: Partial<LoggerConfig>): void {
  config = { ...config, ...options }
}

/**
 * Translate CLI verbosity flags into a log level
 */
export function levelFromFlags(flags: { verbose?: boolean; quiet?: boolean }): LogLevel {
  if (flags.quiet) return 'error'
  if (flags.verbose) return 'debug'
  return 'info'
}

function shouldLog(level: LogLevel): boolean {
  if (config.quiet && level !== 'error') {
    return false
  }
  return LOG_LEVELS[level] >= LOG_LEVELS[config.level]
}

function formatMessage(level: LogLevel, name: string, message: string): string {
  const parts = [`[${level.toUpperCase()}]`, `[${name}]`, message]
  if (config.timestamps) {
    parts.unshift(`[${new Date().toISOString()}]`)
  }
  return parts.join(' ')
}

function write(level: LogLevel, name: string, message: string, args: unknown[]): void {
  if (!shouldLog(level)) return
  const line = COLORS[level](formatMessage(level, name, message))
  switch (level) {
    case 'debug':
      console.debug(line, ...args)
      break
    case 'info':
      console.info(line, ...args)
      break
    case 'warn':
      console.warn(line, ...args)
      break
    case 'error':
      console.error(line, ...args)
      break
  }
}

/**
 * Print a success line (always shown unless quiet)
 */
export function success(message: string): void {
  if (!config.quiet) {
    console.log(chalk.green(message))
  }
}

/**
 * Logger interface for named loggers
 */
export interface Logger {
  debug: (message: string, ...args: unknown[]) => void
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
}

/**
 * Create a named logger instance
 */
export function createLogger(name: string): Logger {
  return {
    debug: (message: string, ...args: unknown[]) => write('debug', name, message, args),
    info: (message: string, ...args: unknown[]) => write('info', name, message, args),
    warn: (message: string, ...args: unknown[]) => write('warn', name, message, args),
    error: (message: string, ...args: unknown[]) => write('error', name, message, args)
  }
}

/**
 * Logger that discards everything
 */
export const nullLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
}
