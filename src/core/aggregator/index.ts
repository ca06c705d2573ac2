import type { ReportSection, ScanSummary } from '../../types/index.js'
import type { ScanReport } from '../scanner/report.js'

/**
 * Word counted in the merged report text. Scanner output formats differ,
 * so the count is an approximation rather than a parsed total.
 */
export const FINDING_KEYWORD = 'vulnerability'

export const NO_ISSUES_HIGHLIGHT = 'No obvious vulnerabilities were detected in the scan.'

export const HIGHLIGHT_SEPARATOR = '--'

export interface AggregatorOptions {
  keyword?: string
  /** Lines of context before each matching line */
  contextBefore?: number
  /** Lines of context after each matching line */
  contextAfter?: number
  /** Total lines across all highlights */
  maxLines?: number
  /** Number of highlight excerpts */
  maxHighlights?: number
}

export interface SummaryContext {
  timestamp: string
  repository: string
}

const DEFAULTS: Required<AggregatorOptions> = {
  keyword: FINDING_KEYWORD,
  contextBefore: 1,
  contextAfter: 2,
  maxLines: 20,
  maxHighlights: 10
}

/**
 * Case-insensitive, non-overlapping substring count
 */
export function countOccurrences(text: string, keyword: string): number {
  const needle = keyword.toLowerCase()
  if (!needle) return 0

  const haystack = text.toLowerCase()
  let count = 0
  let index = haystack.indexOf(needle)
  while (index !== -1) {
    count++
    index = haystack.indexOf(needle, index + needle.length)
  }
  return count
}

interface LineWindow {
  start: number
  end: number
}

/**
 * Excerpts around keyword lines. Touching or overlapping windows merge;
 * output stops at the excerpt cap or when the line budget runs out,
 * truncating the last excerpt if needed.
 */
export function extractHighlights(
  text: string,
  options: AggregatorOptions = {}
): string[] {
  const { keyword, contextBefore, contextAfter, maxLines, maxHighlights } = { ...DEFAULTS, ...options }
  const needle = keyword.toLowerCase()
  const lines = text.split('\n')

  const windows: LineWindow[] = []
  lines.forEach((line, index) => {
    if (!line.toLowerCase().includes(needle)) return

    const start = Math.max(0, index - contextBefore)
    const end = Math.min(lines.length - 1, index + contextAfter)
    const last = windows[windows.length - 1]
    if (last && start <= last.end + 1) {
      last.end = Math.max(last.end, end)
    } else {
      windows.push({ start, end })
    }
  })

  const highlights: string[] = []
  let budget = maxLines
  for (const window of windows) {
    if (highlights.length >= maxHighlights || budget <= 0) break
    const excerpt = lines.slice(window.start, Math.min(window.end + 1, window.start + budget))
    budget -= excerpt.length
    highlights.push(excerpt.join('\n'))
  }
  return highlights
}

/**
 * Derives the approximate finding count and highlights from a report
 */
export class ReportAggregator {
  private readonly options: Required<AggregatorOptions>

  constructor(options: AggregatorOptions = {}) {
    this.options = { ...DEFAULTS, ...options }
  }

  summarize(report: ScanReport): ScanSummary {
    const text = report.bodyText()
    const approximateFindingCount = countOccurrences(text, this.options.keyword)
    const highlights = approximateFindingCount > 0
      ? extractHighlights(text, this.options)
      : [NO_ISSUES_HIGHLIGHT]

    return Object.freeze({
      approximateFindingCount,
      highlights: Object.freeze(highlights)
    })
  }

  /**
   * Closing report sections for a summary
   */
  renderSections(summary: ScanSummary, context: SummaryContext): ReportSection[] {
    const count = summary.approximateFindingCount
    const highlightsBody = count > 0
      ? `${summary.highlights.join(`\n${HIGHLIGHT_SEPARATOR}\n`)}\n\n(See full report for complete details)`
      : summary.highlights.join('\n')

    return [
      {
        title: 'SUMMARY',
        body: `Timestamp: ${context.timestamp}\nRepository: ${context.repository}`
      },
      {
        title: 'VULNERABILITY FINDINGS',
        body: `Found approximately ${count} references to vulnerabilities in the scan report.`
      },
      {
        title: 'VULNERABILITY HIGHLIGHTS',
        body: highlightsBody
      }
    ]
  }
}
