import { mkdtemp, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { errorMessage } from '../errors.js'
import { createLogger, type Logger } from '../../utils/logger.js'

/**
 * Temporary state scoped to one pipeline run: a private directory for
 * side files plus any other paths registered with `track`.
 * Everything is removed by `dispose`.
 */
export class RunWorkspace {
  private readonly tracked: string[] = []
  private disposed = false

  private constructor(
    readonly dir: string,
    private readonly logger: Logger
  ) {}

  static async create(logger: Logger = createLogger('workspace')): Promise<RunWorkspace> {
    const dir = await mkdtemp(join(tmpdir(), 'scanrelay-'))
    return new RunWorkspace(dir, logger)
  }

  /**
   * Path of a run-scoped file
   */
  path(name: string): string {
    return join(this.dir, name)
  }

  /**
   * Register an extra path for removal
   */
  track(path: string): void {
    this.tracked.push(path)
  }

  /**
   * Remove every tracked path and the run directory. Failures are logged.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return
    this.disposed = true

    for (const path of [...this.tracked, this.dir]) {
      try {
        await rm(path, { recursive: true, force: true })
      } catch (error) {
        this.logger.warn(`Failed to remove ${path}: ${errorMessage(error)}`)
      }
    }
  }
}
