import { copyFile, mkdir, readdir } from 'fs/promises'
import { dirname, join, relative, resolve, sep } from 'path'
import { minimatch } from 'minimatch'
import { createLogger, type Logger } from '../../utils/logger.js'

/**
 * Artifact-archival collaborator
 */
export interface ArtifactArchiver {
  /**
   * Copy files under `sourceDir` matching any of `patterns`.
   * Resolves to the archived paths, relative to `sourceDir`.
   */
  archive(sourceDir: string, patterns: readonly string[], options?: ArchiveOptions): Promise<string[]>

  /** Where an archived file ends up */
  location(relativePath: string): string
}

export interface ArchiveOptions {
  /** Directories left out of the search, such as the tool environment */
  skip?: readonly string[]
}

export interface FileArchiverOptions {
  /** Destination directory */
  archiveDir: string
  /** Fail when nothing matches */
  requireMatch?: boolean
  logger?: Logger
}

const SKIPPED_DIRS = new Set(['.git', 'node_modules'])

/**
 * ArtifactArchiver copying files into a local directory
 */
export class FileArchiver implements ArtifactArchiver {
  private readonly options: FileArchiverOptions
  private readonly logger: Logger

  constructor(options: FileArchiverOptions) {
    this.options = options
    this.logger = options.logger ?? createLogger('archive')
  }

  get archiveDir(): string {
    return resolve(this.options.archiveDir)
  }

  location(relativePath: string): string {
    return join(this.archiveDir, relativePath)
  }

  async archive(
    sourceDir: string,
    patterns: readonly string[],
    options: ArchiveOptions = {}
  ): Promise<string[]> {
    const root = resolve(sourceDir)
    const skipped = new Set([this.archiveDir, ...(options.skip ?? []).map(dir => resolve(dir))])
    const files = await this.walk(root, root, skipped)
    const matched = files.filter(file =>
      patterns.some(pattern => minimatch(file, pattern, { dot: true }))
    )

    if (matched.length === 0) {
      if (this.options.requireMatch) {
        throw new Error(`No artifacts matched ${patterns.join(', ')}`)
      }
      this.logger.warn(`No artifacts matched ${patterns.join(', ')}`)
      return []
    }

    for (const file of matched) {
      const target = join(this.archiveDir, file)
      await mkdir(dirname(target), { recursive: true })
      await copyFile(join(root, file), target)
    }
    this.logger.info(`Archived ${matched.length} file(s) to ${this.archiveDir}`)
    return matched
  }

  /**
   * Relative, forward-slash paths of every file under `dir`
   */
  private async walk(root: string, dir: string, skipped: ReadonlySet<string>): Promise<string[]> {
    if (skipped.has(dir)) return []

    const entries = await readdir(dir, { withFileTypes: true })
    const files: string[] = []
    for (const entry of entries) {
      const fullPath = join(dir, entry.name)
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRS.has(entry.name)) {
          files.push(...(await this.walk(root, fullPath, skipped)))
        }
      } else if (entry.isFile()) {
        files.push(relative(root, fullPath).split(sep).join('/'))
      }
    }
    return files.sort()
  }
}
