import { spawn } from 'child_process'
import { isAbsolute, join } from 'path'
import { ToolUnavailableError } from '../errors.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import type { ScanTarget, ToolInvocation } from '../../types/index.js'
import type { ToolSpec } from './tools.js'

/**
 * Runs one external tool against one target.
 * A non-zero exit is reported in the result; only a tool that cannot be
 * executed at all rejects, with ToolUnavailableError.
 */
export interface ToolRunner {
  run(tool: ToolSpec, target: ScanTarget): Promise<ToolInvocation>
}

export interface ProcessToolRunnerOptions {
  /** Directory holding the tool binaries, e.g. a virtual environment's bin/ */
  binDir?: string
  /** Working directory for the child process */
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** Kill the tool after this many milliseconds */
  timeoutMs?: number
  logger?: Logger
}

interface ProcessResult {
  exitStatus: number
  output: string
}

/**
 * ToolRunner backed by child processes
 */
export class ProcessToolRunner implements ToolRunner {
  private readonly options: ProcessToolRunnerOptions
  private readonly logger: Logger

  constructor(options: ProcessToolRunnerOptions = {}) {
    this.options = options
    this.logger = options.logger ?? createLogger('runner')
  }

  async run(tool: ToolSpec, target: ScanTarget): Promise<ToolInvocation> {
    const binaryPath = this.resolveBinary(tool.binary)
    const args = tool.buildArgs(target)
    const start = Date.now()

    this.logger.debug(`Running ${binaryPath} ${args.join(' ')}`)
    const { exitStatus, output } = await this.execute(tool.name, binaryPath, args)
    const durationMs = Date.now() - start

    if (exitStatus !== 0) {
      this.logger.debug(`${tool.name} exited with status ${exitStatus}`)
    }

    return {
      toolName: tool.name,
      manifestKind: target.type === 'manifest' ? target.kind : null,
      exitStatus,
      stdout: output,
      durationMs
    }
  }

  /**
   * Bare executable names resolve inside binDir when one is configured
   */
  resolveBinary(binary: string): string {
    const { binDir } = this.options
    if (!binDir || isAbsolute(binary) || binary.includes('/')) {
      return binary
    }
    return join(binDir, binary)
  }

  private execute(toolName: string, binaryPath: string, args: string[]): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = []
      let settled = false
      let timer: NodeJS.Timeout | undefined

      const child = spawn(binaryPath, args, {
        cwd: this.options.cwd,
        env: this.options.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false
      })

      child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk))
      child.stderr.on('data', (chunk: Buffer) => chunks.push(chunk))

      if (this.options.timeoutMs) {
        const timeoutMs = this.options.timeoutMs
        timer = setTimeout(() => {
          chunks.push(Buffer.from(`\n${toolName} timed out after ${timeoutMs}ms\n`))
          child.kill('SIGTERM')
        }, timeoutMs)
      }

      child.on('error', (err) => {
        if (settled) return
        settled = true
        if (timer) clearTimeout(timer)
        reject(new ToolUnavailableError(toolName, binaryPath, err.message))
      })

      child.on('close', (code, signal) => {
        if (settled) return
        settled = true
        if (timer) clearTimeout(timer)
        if (signal) {
          chunks.push(Buffer.from(`\n${toolName} terminated by ${signal}\n`))
        }
        resolve({
          exitStatus: code ?? 1,
          output: Buffer.concat(chunks).toString('utf-8')
        })
      })
    })
  }
}

