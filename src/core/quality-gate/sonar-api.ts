import { readFile } from 'fs/promises'
import { setTimeout as delay } from 'timers/promises'
import { z } from 'zod'
import type { QualityGateSignal, QualityGateStatusQuery } from './checker.js'

export interface SonarClientOptions {
  baseUrl: string
  token?: string
  fetchImpl?: typeof fetch
}

/**
 * Minimal HTTP client for the analysis server's web API
 */
export class SonarClient {
  private readonly baseUrl: string
  private readonly token?: string
  private readonly fetchImpl: typeof fetch

  constructor(options: SonarClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.token = options.token
    this.fetchImpl = options.fetchImpl ?? fetch
  }

  async getText(path: string, signal?: AbortSignal): Promise<string> {
    const headers: Record<string, string> = { Accept: 'application/json' }
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`
    }

    const response = await this.fetchImpl(`${this.baseUrl}${path}`, { headers, signal })
    const body = await response.text()
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} from ${path}`)
    }
    return body
  }

  async getJson(path: string, signal?: AbortSignal): Promise<unknown> {
    return JSON.parse(await this.getText(path, signal))
  }
}

const CeTaskSchema = z.object({
  task: z.object({
    id: z.string(),
    status: z.string(),
    analysisId: z.string().optional()
  })
})

const ProjectStatusSchema = z.object({
  projectStatus: z.object({
    status: z.string()
  })
})

/**
 * Parse a `key=value` properties file such as `.scannerwork/report-task.txt`
 */
export function parseReportTask(content: string): Record<string, string> {
  const values: Record<string, string> = {}
  for (const line of content.split(/\r?\n/)) {
    const separator = line.indexOf('=')
    if (separator <= 0 || line.startsWith('#')) continue
    values[line.slice(0, separator).trim()] = line.slice(separator + 1).trim()
  }
  return values
}

export interface SonarTaskSignalOptions {
  client: SonarClient
  /** Metadata file written by the scanner */
  reportTaskPath: string
  pollIntervalMs: number
}

/**
 * Waits for the background analysis task submitted by the scanner to
 * finish, then reads the quality gate verdict for that analysis
 */
export class SonarTaskSignal implements QualityGateSignal {
  constructor(private readonly options: SonarTaskSignalOptions) {}

  async wait(signal: AbortSignal): Promise<string> {
    const { client, pollIntervalMs } = this.options
    const taskId = await this.readTaskId()

    for (;;) {
      const { task } = CeTaskSchema.parse(
        await client.getJson(`/api/ce/task?id=${encodeURIComponent(taskId)}`, signal)
      )

      if (task.status === 'PENDING' || task.status === 'IN_PROGRESS') {
        await delay(pollIntervalMs, undefined, { signal })
        continue
      }
      if (task.status !== 'SUCCESS' || !task.analysisId) {
        throw new Error(`Analysis task ${taskId} ended with status ${task.status}`)
      }

      const { projectStatus } = ProjectStatusSchema.parse(
        await client.getJson(
          `/api/qualitygates/project_status?analysisId=${encodeURIComponent(task.analysisId)}`,
          signal
        )
      )
      return projectStatus.status
    }
  }

  private async readTaskId(): Promise<string> {
    const content = await readFile(this.options.reportTaskPath, 'utf-8')
    const taskId = parseReportTask(content).ceTaskId
    if (!taskId) {
      throw new Error(`No ceTaskId in ${this.options.reportTaskPath}`)
    }
    return taskId
  }
}

/**
 * One direct request for the project's current gate status
 */
export class SonarStatusQuery implements QualityGateStatusQuery {
  constructor(
    private readonly client: SonarClient,
    private readonly projectKey: string
  ) {}

  fetchStatus(signal: AbortSignal): Promise<string> {
    return this.client.getText(
      `/api/qualitygates/project_status?projectKey=${encodeURIComponent(this.projectKey)}`,
      signal
    )
  }
}

const SUCCESS_MARKER = /"status"\s*:\s*"OK"/

/**
 * Classify a status response. JSON bodies are judged on the overall
 * project status; anything else falls back to looking for the OK marker.
 */
export function classifyStatusResponse(body: string): 'OK' | 'FAILED' {
  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch {
    return SUCCESS_MARKER.test(body) ? 'OK' : 'FAILED'
  }

  const result = ProjectStatusSchema.safeParse(parsed)
  if (result.success) {
    return result.data.projectStatus.status === 'OK' ? 'OK' : 'FAILED'
  }
  return SUCCESS_MARKER.test(body) ? 'OK' : 'FAILED'
}
