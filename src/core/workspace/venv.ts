import { join, resolve } from 'path'
import { EnvironmentError } from '../errors.js'
import { execCommand, commandFailure, type CommandExecutor } from './exec.js'
import { createLogger, type Logger } from '../../utils/logger.js'

export interface ProvisionedEnvironment {
  /** Environment directory, removed at the end of the run */
  path: string
  /** Directory holding the installed tool binaries */
  binDir: string
}

/**
 * Creates the disposable environment the scanners run from
 */
export interface EnvironmentProvisioner {
  /** Directory `provision` creates under `projectRoot`, known before it exists */
  pathFor(projectRoot: string): string
  provision(projectRoot: string): Promise<ProvisionedEnvironment>
}

export interface PythonVenvProvisionerOptions {
  /** Environment directory, relative to the project root */
  venvDir: string
  pythonBin: string
  /** Packages installed into the environment */
  packages: readonly string[]
  exec?: CommandExecutor
  timeoutMs?: number
  logger?: Logger
}

/**
 * Provisions a Python virtual environment with the scanner packages
 */
export class PythonVenvProvisioner implements EnvironmentProvisioner {
  private readonly options: PythonVenvProvisionerOptions
  private readonly exec: CommandExecutor
  private readonly logger: Logger

  constructor(options: PythonVenvProvisionerOptions) {
    this.options = options
    this.exec = options.exec ?? execCommand
    this.logger = options.logger ?? createLogger('venv')
  }

  pathFor(projectRoot: string): string {
    return resolve(projectRoot, this.options.venvDir)
  }

  async provision(projectRoot: string): Promise<ProvisionedEnvironment> {
    const path = this.pathFor(projectRoot)
    const binDir = join(path, process.platform === 'win32' ? 'Scripts' : 'bin')
    const pip = join(binDir, 'pip')

    this.logger.info(`Creating virtual environment at ${path}`)
    await this.step('create virtual environment', this.options.pythonBin, ['-m', 'venv', path])
    await this.step('upgrade pip', pip, ['install', '--upgrade', 'pip'])
    if (this.options.packages.length > 0) {
      this.logger.info(`Installing ${this.options.packages.join(', ')}`)
      await this.step('install scanners', pip, ['install', ...this.options.packages])
    }

    return { path, binDir }
  }

  private async step(description: string, file: string, args: string[]): Promise<void> {
    try {
      await this.exec(file, args, { timeoutMs: this.options.timeoutMs ?? 15 * 60 * 1000 })
    } catch (error) {
      throw new EnvironmentError(`Failed to ${description}: ${commandFailure(error)}`, {
        cause: error
      })
    }
  }
}
