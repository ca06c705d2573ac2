/**
 * init command - Generate a configuration file from the bundled template
 */

import * as fs from 'fs'
import * as path from 'path'
import { fileURLToPath } from 'url'
import { DEFAULT_CONFIG_FILENAME } from '../../core/config/loader.js'
import { errorMessage } from '../../core/errors.js'

export const DEFAULT_OUTPUT_FILENAME = DEFAULT_CONFIG_FILENAME

export interface InitOptions {
  output?: string
  force?: boolean
}

export interface InitResult {
  success: boolean
  outputPath?: string
  error?: string
}

/**
 * Path of the template bundled with the package.
 * Both src/cli/commands and dist/cli/commands sit three levels below the root.
 */
function getTemplatePath(): string {
  const here = path.dirname(fileURLToPath(import.meta.url))
  return path.join(path.resolve(here, '..', '..', '..'), 'config', 'default.yaml')
}

/**
 * Execute the init command
 */
export async function initCommand(options: InitOptions): Promise<InitResult> {
  const outputPath = path.resolve(process.cwd(), options.output ?? DEFAULT_OUTPUT_FILENAME)

  try {
    if (fs.existsSync(outputPath) && !options.force) {
      return {
        success: false,
        outputPath,
        error: `File already exists: ${outputPath}. Use --force to overwrite.`
      }
    }

    const template = fs.readFileSync(getTemplatePath(), 'utf-8')
    fs.mkdirSync(path.dirname(outputPath), { recursive: true })
    fs.writeFileSync(outputPath, template, 'utf-8')

    return { success: true, outputPath }
  } catch (error) {
    return { success: false, outputPath, error: errorMessage(error) }
  }
}
