import type { ScanSummary } from './scan.js'

export type PipelineStatus = 'SUCCESS' | 'FAILURE'

/**
 * Final outcome of a pipeline run, consumed by the CI host and notifier
 */
export interface PipelineOutcome {
  status: PipelineStatus
  summary?: ScanSummary
  errorMessage?: string
  reportLocation: string
}

export type QualityGateStatus = 'OK' | 'FAILED' | 'ERROR' | 'TIMEOUT' | 'NOT_RUN'

export type QualityGateSource = 'primary' | 'fallback-api'

export interface QualityGateResult {
  status: QualityGateStatus
  source: QualityGateSource
}

/**
 * State the CI host provides, passed in explicitly rather than read from the environment
 */
export interface HostContext {
  /** Build page URL, ending with a slash */
  buildUrl?: string

  /** Repository URL known to the host */
  gitUrl?: string

  /** Token forwarded to the analysis server, never stored */
  sonarToken?: string

  now: () => Date
}
