#!/usr/bin/env node
/**
 * scanrelay CLI entry point
 *
 * Runs dependency and static-analysis pipelines from a CI job
 */

import { Command } from 'commander'
import { configureLogger, createLogger, levelFromFlags, success } from '../utils/logger.js'
import { createConfigLoader } from '../core/config/loader.js'
import { errorMessage } from '../core/errors.js'
import { initCommand, DEFAULT_OUTPUT_FILENAME } from './commands/init.js'
import { registerDepsCommand } from './commands/deps.js'
import { registerSonarCommand } from './commands/sonar.js'

/**
 * Exit codes for the CLI
 * - 0: pipeline succeeded
 * - 1: pipeline failed
 * - 2: configuration or usage error
 */
export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  ERROR: 2
} as const

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode]

/**
 * Global CLI options
 */
export interface GlobalOptions {
  verbose?: boolean
  quiet?: boolean
  config?: string
  /** Set to false by --no-timestamps */
  timestamps?: boolean
}

const logger = createLogger('cli')

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('scanrelay')
    .description('Run dependency and static-analysis scanners and relay their results')
    .version('1.0.0')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('-c, --config <path>', 'Path to configuration file')
    .option('--no-timestamps', 'Omit timestamps from log lines')
    .hook('preAction', () => {
      const globalOpts = program.opts<GlobalOptions>()
      configureLogger({
        level: levelFromFlags(globalOpts),
        quiet: globalOpts.quiet ?? false,
        timestamps: globalOpts.timestamps ?? true
      })
    })

  registerDepsCommand(program)
  registerSonarCommand(program)

  program
    .command('init')
    .description('Generate a default configuration file')
    .option('-o, --output <file>', 'Output file path', DEFAULT_OUTPUT_FILENAME)
    .option('--force', 'Overwrite existing file')
    .action(async (options: { output?: string; force?: boolean }) => {
      const result = await initCommand({
        output: options.output,
        force: options.force
      })

      if (result.success) {
        success(`Created configuration file: ${result.outputPath}`)
        process.exit(ExitCode.SUCCESS)
      } else {
        logger.error(`Failed to create configuration file: ${result.error}`)
        process.exit(ExitCode.ERROR)
      }
    })

  program
    .command('validate <config>')
    .description('Validate a configuration file')
    .action(async (configPath: string) => {
      try {
        const result = await createConfigLoader().validate(configPath)

        if (result.valid) {
          success(`✓ Configuration file is valid: ${configPath}`)
          process.exit(ExitCode.SUCCESS)
        } else {
          logger.error(`✗ Configuration file is invalid: ${configPath}`)
          for (const error of result.errors) {
            logger.error(`  - ${error}`)
          }
          process.exit(ExitCode.ERROR)
        }
      } catch (error) {
        logger.error(`Failed to validate configuration: ${errorMessage(error)}`)
        process.exit(ExitCode.ERROR)
      }
    })

  return program
}

/**
 * Run the CLI
 */
export async function run(args: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(args)
  } catch (error) {
    logger.error(`CLI error: ${errorMessage(error)}`)
    process.exit(ExitCode.ERROR)
  }
}

// Run CLI when executed directly (not when imported as a module)
const isMainModule =
  import.meta.url === `file://${process.argv[1]}` ||
  decodeURIComponent(import.meta.url) === `file://${process.argv[1]}`
if (isMainModule) {
  void run()
}
