import { randomUUID } from 'crypto'
import { join } from 'path'
import { EnvironmentError } from '../errors.js'
import { assertSafeArgument } from '../runner/tools.js'
import { execCommand, commandFailure, type CommandExecutor } from './exec.js'
import { createLogger, type Logger } from '../../utils/logger.js'

export const UNKNOWN_REPOSITORY = 'Not available'

export interface CheckoutRequest {
  /** Directory the pipeline runs in */
  workspaceRoot: string
  /** Repository to clone; empty means use `workspaceRoot` as it is */
  repoUrl: string
  branch: string
}

export interface CheckoutResult {
  /** Root of the source tree to analyse */
  root: string
  repositoryUrl: string
  /** True when `root` is a fresh clone the pipeline owns */
  cloned: boolean
}

/**
 * Source-checkout collaborator
 */
export interface SourceCheckout {
  checkout(request: CheckoutRequest): Promise<CheckoutResult>
}

export interface GitCheckoutOptions {
  exec?: CommandExecutor
  timeoutMs?: number
  logger?: Logger
}

/**
 * SourceCheckout backed by the git command line
 */
export class GitCheckout implements SourceCheckout {
  private readonly exec: CommandExecutor
  private readonly timeoutMs: number
  private readonly logger: Logger

  constructor(options: GitCheckoutOptions = {}) {
    this.exec = options.exec ?? execCommand
    this.timeoutMs = options.timeoutMs ?? 10 * 60 * 1000
    this.logger = options.logger ?? createLogger('git')
  }

  async checkout(request: CheckoutRequest): Promise<CheckoutResult> {
    if (!request.repoUrl) {
      return {
        root: request.workspaceRoot,
        repositoryUrl: await this.originUrl(request.workspaceRoot),
        cloned: false
      }
    }

    const url = assertSafeArgument(request.repoUrl, 'repository URL')
    const branch = assertSafeArgument(request.branch, 'branch')
    const cloneDir = join(request.workspaceRoot, `checkout-${randomUUID().slice(0, 8)}`)

    this.logger.info(`Cloning ${url} (${branch})`)
    try {
      await this.exec('git', ['clone', '--depth', '1', '--branch', branch, '--', url, cloneDir], {
        timeoutMs: this.timeoutMs
      })
    } catch (error) {
      throw new EnvironmentError(`Failed to clone repository: ${commandFailure(error)}`, {
        cause: error
      })
    }

    return { root: cloneDir, repositoryUrl: url, cloned: true }
  }

  /**
   * Remote origin of an existing checkout
   */
  async originUrl(dir: string): Promise<string> {
    try {
      const { stdout } = await this.exec('git', ['config', '--get', 'remote.origin.url'], {
        cwd: dir,
        timeoutMs: this.timeoutMs
      })
      return stdout.trim() || UNKNOWN_REPOSITORY
    } catch (error) {
      this.logger.debug(`Could not read origin URL: ${commandFailure(error)}`)
      return UNKNOWN_REPOSITORY
    }
  }
}
