import { EnvironmentError } from '../errors.js'
import { execCommand, commandFailure, type CommandExecutor } from './exec.js'
import { createLogger, type Logger } from '../../utils/logger.js'

export interface PreparationResult {
  /** null when no test command is configured */
  testsPassed: boolean | null
}

/**
 * Installs project dependencies and runs its tests before analysis
 */
export interface ProjectPreparer {
  prepare(root: string): Promise<PreparationResult>
}

export interface CommandPreparerOptions {
  /** Argument vector; empty skips the step */
  installCommand: readonly string[]
  testCommand: readonly string[]
  exec?: CommandExecutor
  timeoutMs?: number
  logger?: Logger
}

/**
 * ProjectPreparer running configured commands. A failed install aborts
 * the run; failing tests are logged and analysis continues.
 */
export class CommandPreparer implements ProjectPreparer {
  private readonly options: CommandPreparerOptions
  private readonly exec: CommandExecutor
  private readonly logger: Logger

  constructor(options: CommandPreparerOptions) {
    this.options = options
    this.exec = options.exec ?? execCommand
    this.logger = options.logger ?? createLogger('prepare')
  }

  async prepare(root: string): Promise<PreparationResult> {
    const timeoutMs = this.options.timeoutMs ?? 30 * 60 * 1000
    const [installFile, ...installArgs] = this.options.installCommand
    if (installFile) {
      this.logger.info(`Installing dependencies: ${this.options.installCommand.join(' ')}`)
      try {
        await this.exec(installFile, installArgs, { cwd: root, timeoutMs })
      } catch (error) {
        throw new EnvironmentError(`Install command failed: ${commandFailure(error)}`, {
          cause: error
        })
      }
    }

    const [testFile, ...testArgs] = this.options.testCommand
    if (!testFile) {
      return { testsPassed: null }
    }

    this.logger.info(`Running tests: ${this.options.testCommand.join(' ')}`)
    try {
      await this.exec(testFile, testArgs, {
        cwd: root,
        timeoutMs,
        env: { ...process.env, CI: 'true' }
      })
      return { testsPassed: true }
    } catch (error) {
      this.logger.warn(`Tests failed, continuing with analysis: ${commandFailure(error)}`)
      return { testsPassed: false }
    }
  }
}
