import type { ManifestKind } from './manifest.js'

/**
 * What a scanner is pointed at
 */
export type ScanTarget =
  | { type: 'manifest'; kind: ManifestKind | null; path: string }
  | { type: 'environment' }

/**
 * Result of running one external tool once
 */
export interface ToolInvocation {
  toolName: string

  /** Manifest schema scanned, null for installed-environment scans */
  manifestKind: ManifestKind | null

  /** Process exit status; non-zero is recorded, never thrown */
  exitStatus: number

  /** Combined stdout and stderr in arrival order */
  stdout: string

  /** Wall-clock duration in milliseconds */
  durationMs: number
}

/**
 * One titled block of the scan report
 */
export interface ReportSection {
  title: string
  body: string
}

/**
 * Approximate summary derived from the report text
 */
export interface ScanSummary {
  /** Case-insensitive keyword occurrences; an approximation, not a parsed count */
  readonly approximateFindingCount: number

  /** Keyword-adjacent excerpts, bounded in count and total lines */
  readonly highlights: readonly string[]
}
