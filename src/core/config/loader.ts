import { readFile, access } from 'fs/promises'
import { resolve } from 'path'
import yaml from 'js-yaml'
import { ConfigLoadError, errorMessage } from '../errors.js'
import {
  ConfigFileSchema,
  DependencyScanConfigSchema,
  StaticAnalysisConfigSchema,
  formatValidationErrors,
  type ConfigFile
} from './schema.js'

export const DEFAULT_CONFIG_FILENAME = 'scanrelay.yaml'

export interface LoaderOptions {
  basePath?: string
}

export class ConfigLoader {
  private basePath: string

  constructor(options: LoaderOptions = {}) {
    this.basePath = options.basePath || process.cwd()
  }

  /**
   * Load a configuration file. Without an explicit path the default file is
   * used when present, otherwise an empty configuration.
   */
  async load(configPath?: string): Promise<ConfigFile> {
    if (!configPath) {
      const defaultPath = resolve(this.basePath, DEFAULT_CONFIG_FILENAME)
      if (!(await this.exists(defaultPath))) {
        return {}
      }
      return this.parse(defaultPath)
    }
    return this.parse(resolve(this.basePath, configPath))
  }

  /**
   * Parse YAML content into the file shape
   */
  loadFromString(content: string, configPath?: string): ConfigFile {
    let raw: unknown
    try {
      raw = yaml.load(content)
    } catch (error) {
      throw new ConfigLoadError(
        `Failed to parse configuration: ${errorMessage(error)}`,
        configPath,
        [errorMessage(error)]
      )
    }

    // An empty document is an empty configuration
    if (raw === undefined || raw === null) {
      return {}
    }

    const result = ConfigFileSchema.safeParse(raw)
    if (!result.success) {
      const errors = formatValidationErrors(result.error)
      throw new ConfigLoadError(
        `Invalid configuration file${configPath ? `: ${configPath}` : ''}\n${errors.join('\n')}`,
        configPath,
        errors
      )
    }
    return result.data
  }

  /**
   * Validate a configuration file, including every pipeline section it contains
   */
  async validate(configPath: string): Promise<{
    valid: boolean
    errors: string[]
  }> {
    try {
      const file = await this.load(configPath)
      const errors: string[] = []

      if (file.dependencyScan) {
        const result = DependencyScanConfigSchema.safeParse(file.dependencyScan)
        if (!result.success) {
          errors.push(...formatValidationErrors(result.error).map(e => `dependencyScan.${e}`))
        }
      }
      if (file.staticAnalysis) {
        const result = StaticAnalysisConfigSchema.safeParse(file.staticAnalysis)
        if (!result.success) {
          errors.push(...formatValidationErrors(result.error).map(e => `staticAnalysis.${e}`))
        }
      }

      return { valid: errors.length === 0, errors }
    } catch (error) {
      if (error instanceof ConfigLoadError) {
        return { valid: false, errors: error.validationErrors }
      }
      return { valid: false, errors: [errorMessage(error)] }
    }
  }

  private async parse(absolutePath: string): Promise<ConfigFile> {
    const content = await this.readConfigFile(absolutePath)
    return this.loadFromString(content, absolutePath)
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await access(path)
      return true
    } catch {
      return false
    }
  }

  private async readConfigFile(absolutePath: string): Promise<string> {
    try {
      return await readFile(absolutePath, 'utf-8')
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? String(error.code) : 'UNKNOWN'
      throw new ConfigLoadError(
        `Failed to read configuration file: ${absolutePath}`,
        absolutePath,
        [code]
      )
    }
  }
}

/**
 * Create a default loader instance
 */
export function createConfigLoader(options?: LoaderOptions): ConfigLoader {
  return new ConfigLoader(options)
}
