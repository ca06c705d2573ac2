import { classifyStatusResponse } from './sonar-api.js'
import { errorMessage } from '../errors.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import type { QualityGateResult } from '../../types/index.js'

/**
 * Asynchronous gate verdict channel. Resolves with the raw gate status
 * (e.g. `OK`, `ERROR`) and should stop work when `signal` aborts.
 */
export interface QualityGateSignal {
  wait(signal: AbortSignal): Promise<string>
}

/**
 * Synchronous status endpoint used when the signal channel fails.
 * Resolves with the raw response text.
 */
export interface QualityGateStatusQuery {
  fetchStatus(signal: AbortSignal): Promise<string>
}

export interface QualityGateCheckerOptions {
  enabled: boolean
  primary: QualityGateSignal
  fallback: QualityGateStatusQuery
  /** Bound on the primary wait */
  timeoutMs: number
  /** Bound on the single fallback query */
  fallbackTimeoutMs?: number
  logger?: Logger
}

const DEFAULT_FALLBACK_TIMEOUT_MS = 30_000

/**
 * Reject once `signal` aborts, even if `promise` never settles
 */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal, reason: string): Promise<T> {
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(new Error(reason))
    if (signal.aborted) {
      onAbort()
      return
    }
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )
  })
}

/**
 * Resolves the quality gate to a terminal status: waits on the primary
 * channel up to the timeout, then falls back to one direct status query
 */
export class QualityGateChecker {
  private readonly options: QualityGateCheckerOptions
  private readonly logger: Logger

  constructor(options: QualityGateCheckerOptions) {
    this.options = options
    this.logger = options.logger ?? createLogger('quality-gate')
  }

  async check(): Promise<QualityGateResult> {
    if (!this.options.enabled) {
      return { status: 'NOT_RUN', source: 'primary' }
    }

    const controller = new AbortController()
    let timedOut = false
    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.options.timeoutMs)

    try {
      this.logger.info(`Waiting up to ${this.options.timeoutMs}ms for the quality gate`)
      const status = await untilAborted(
        this.options.primary.wait(controller.signal),
        controller.signal,
        `Timed out after ${this.options.timeoutMs}ms waiting for the quality gate`
      )
      if (status !== 'OK') {
        this.logger.warn(`Quality Gate failed with status: ${status}`)
      }
      return { status: status === 'OK' ? 'OK' : 'FAILED', source: 'primary' }
    } catch (error) {
      this.logger.warn(`Error waiting for Quality Gate: ${errorMessage(error)}`)
    } finally {
      clearTimeout(timer)
      if (!controller.signal.aborted) {
        controller.abort()
      }
    }

    return this.queryFallback(timedOut)
  }

  private async queryFallback(primaryTimedOut: boolean): Promise<QualityGateResult> {
    const timeoutMs = this.options.fallbackTimeoutMs ?? DEFAULT_FALLBACK_TIMEOUT_MS
    const signal = AbortSignal.timeout(timeoutMs)

    this.logger.info('Attempting direct status query')
    try {
      const body = await untilAborted(
        this.options.fallback.fetchStatus(signal),
        signal,
        `Status query timed out after ${timeoutMs}ms`
      )
      this.logger.debug(`Status response: ${body}`)
      const status = classifyStatusResponse(body)
      if (status !== 'OK') {
        this.logger.warn('Quality Gate failed (via API)')
      }
      return { status, source: 'fallback-api' }
    } catch (error) {
      this.logger.error(`Status query failed: ${errorMessage(error)}`)
      return { status: primaryTimedOut ? 'TIMEOUT' : 'ERROR', source: 'fallback-api' }
    }
  }
}
