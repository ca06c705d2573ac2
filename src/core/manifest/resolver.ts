import { readFile, writeFile } from 'fs/promises'
import { join } from 'path'
import { extractRequirements, extractPyprojectDependencies } from './extract.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import type { ManifestFileName, ManifestProbe, PackageRef } from '../../types/index.js'

export const REQUIREMENTS_FILE: ManifestFileName = 'requirements.txt'
export const PYPROJECT_FILE: ManifestFileName = 'pyproject.toml'

/**
 * Side file holding dependencies extracted from the metadata manifest
 */
export const EXTRACTED_DEPS_FILE = 'pyproject_deps.txt'

export interface ManifestResolverOptions {
  logger?: Logger
}

/**
 * Discovers dependency manifests in a project root and turns each into
 * a scanner input
 */
export class ManifestResolver {
  private readonly logger: Logger

  constructor(options: ManifestResolverOptions = {}) {
    this.logger = options.logger ?? createLogger('manifest')
  }

  /**
   * Probe requirements.txt, then pyproject.toml. Always returns one probe per
   * file, in that order. Side files are written to `workDir`, never to the project.
   */
  async resolve(projectRoot: string, workDir: string): Promise<ManifestProbe[]> {
    return [
      await this.probeRequirements(projectRoot),
      await this.probePyproject(projectRoot, workDir)
    ]
  }

  private async probeRequirements(projectRoot: string): Promise<ManifestProbe> {
    const sourcePath = join(projectRoot, REQUIREMENTS_FILE)
    const content = await readIfExists(sourcePath)
    if (content === null) {
      this.logger.info(`No ${REQUIREMENTS_FILE} found`)
      return { fileName: REQUIREMENTS_FILE, found: false }
    }

    const manifest = extractRequirements(content, sourcePath)
    this.logger.info(`${REQUIREMENTS_FILE}: ${manifest.packages.length} entries`)

    // Scanners read the requirements file itself so pip options in it still apply
    return {
      fileName: REQUIREMENTS_FILE,
      found: true,
      content,
      manifest,
      notes: [],
      scanInput: sourcePath
    }
  }

  private async probePyproject(projectRoot: string, workDir: string): Promise<ManifestProbe> {
    const sourcePath = join(projectRoot, PYPROJECT_FILE)
    const content = await readIfExists(sourcePath)
    if (content === null) {
      this.logger.info(`No ${PYPROJECT_FILE} found`)
      return { fileName: PYPROJECT_FILE, found: false }
    }

    const { manifest, notes } = extractPyprojectDependencies(content, sourcePath)
    for (const note of notes) {
      this.logger.debug(note)
    }

    if (manifest.packages.length === 0) {
      return { fileName: PYPROJECT_FILE, found: true, content, manifest, notes }
    }

    const scanInput = join(workDir, EXTRACTED_DEPS_FILE)
    await writeFile(scanInput, renderRequirements(manifest.packages), 'utf-8')
    this.logger.info(`${PYPROJECT_FILE}: ${manifest.packages.length} dependencies (${manifest.kind})`)

    return { fileName: PYPROJECT_FILE, found: true, content, manifest, notes, scanInput }
  }
}

/**
 * One dependency per line, in declaration order
 */
export function renderRequirements(packages: readonly PackageRef[]): string {
  return packages.map(ref => `${ref.name}\n`).join('')
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf-8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null
    }
    throw error
  }
}
