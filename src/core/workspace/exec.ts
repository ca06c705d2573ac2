import { execFile } from 'child_process'
import { promisify } from 'util'
import { errorMessage } from '../errors.js'

const execFileAsync = promisify(execFile)

export interface CommandOptions {
  cwd?: string
  timeoutMs?: number
  env?: NodeJS.ProcessEnv
}

export interface CommandOutput {
  stdout: string
  stderr: string
}

/**
 * Runs a command without a shell and rejects on a non-zero exit
 */
export type CommandExecutor = (
  file: string,
  args: readonly string[],
  options?: CommandOptions
) => Promise<CommandOutput>

const MAX_BUFFER = 64 * 1024 * 1024

export const execCommand: CommandExecutor = async (file, args, options = {}) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], {
    cwd: options.cwd,
    env: options.env,
    timeout: options.timeoutMs,
    maxBuffer: MAX_BUFFER,
    encoding: 'utf8'
  })
  return { stdout, stderr }
}

/**
 * Best description of a failed command: its stderr when it wrote any
 */
export function commandFailure(error: unknown): string {
  if (error instanceof Error && 'stderr' in error && typeof error.stderr === 'string') {
    const stderr = error.stderr.trim()
    if (stderr) return stderr
  }
  return errorMessage(error)
}
