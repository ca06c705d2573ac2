import { ManifestResolver } from '../manifest/resolver.js'
import { ReportAggregator } from '../aggregator/index.js'
import { PIP_FREEZE, type ToolSpec } from '../runner/tools.js'
import type { ToolRunner } from '../runner/process-runner.js'
import { errorMessage } from '../errors.js'
import { ScanReport, ScanAbortedError } from './report.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import { formatTimestamp } from '../../utils/format.js'
import type {
  ManifestProbe,
  ScanSummary,
  ScanTarget,
  ToolInvocation
} from '../../types/index.js'

export interface ScanOrchestratorOptions {
  runner: ToolRunner
  /** Scanners run against every manifest and the installed environment, in order */
  tools: readonly ToolSpec[]
  resolver?: ManifestResolver
  aggregator?: ReportAggregator
  /** Lists installed packages for the environment snapshot */
  snapshotTool?: ToolSpec
  /** Repository shown in the summary */
  repository?: string
  now?: () => Date
  logger?: Logger
}

/**
 * Result of a complete orchestration run
 */
export interface ScanRun {
  /** Sealed report */
  report: ScanReport
  summary: ScanSummary
  invocations: ToolInvocation[]
}

/**
 * Sequences manifest discovery and every (manifest, tool) scan in a fixed
 * order, one tool at a time, appending one report section per step
 */
export class ScanOrchestrator {
  private readonly runner: ToolRunner
  private readonly tools: readonly ToolSpec[]
  private readonly resolver: ManifestResolver
  private readonly aggregator: ReportAggregator
  private readonly snapshotTool: ToolSpec
  private readonly repository: string
  private readonly now: () => Date
  private readonly logger: Logger

  constructor(options: ScanOrchestratorOptions) {
    this.runner = options.runner
    this.tools = options.tools
    this.logger = options.logger ?? createLogger('orchestrator')
    this.resolver = options.resolver ?? new ManifestResolver({ logger: this.logger })
    this.aggregator = options.aggregator ?? new ReportAggregator()
    this.snapshotTool = options.snapshotTool ?? PIP_FREEZE
    this.repository = options.repository ?? 'Not available'
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Run every stage against `projectRoot`. Side files go to `workDir`.
   * Tool findings never stop the run; an unrecoverable error rejects with
   * ScanAbortedError carrying the sections produced so far.
   */
  async runAll(projectRoot: string, workDir: string): Promise<ScanRun> {
    const report = new ScanReport()
    const invocations: ToolInvocation[] = []

    try {
      report.append(`Python Dependency Scan Report - ${formatTimestamp(this.now())}`, '')

      const probes = await this.resolver.resolve(projectRoot, workDir)
      for (const probe of probes) {
        report.append(...manifestSection(probe))
        if (probe.found && probe.scanInput) {
          const target: ScanTarget = { type: 'manifest', kind: probe.manifest.kind, path: probe.scanInput }
          const prefix = probe.fileName === 'requirements.txt' ? 'SCANNING' : 'SCANNING EXTRACTED DEPENDENCIES'
          await this.scanWithAll(report, invocations, target, prefix)
        }
      }

      const snapshot = await this.execute(this.snapshotTool, { type: 'environment' }, invocations)
      report.append('SCANNING ALL INSTALLED PACKAGES', snapshotBody(snapshot))

      await this.scanWithAll(report, invocations, { type: 'environment' }, 'SCANNING INSTALLED PACKAGES')
    } catch (error) {
      this.logger.error(`Scan aborted: ${errorMessage(error)}`)
      throw new ScanAbortedError(errorMessage(error), report.seal(), { cause: error })
    }

    const summary = this.aggregator.summarize(report)
    report.appendAll(this.aggregator.renderSections(summary, {
      timestamp: formatTimestamp(this.now()),
      repository: this.repository
    }))
    report.seal()

    this.logger.info(
      `Scan complete: ${invocations.length} tool runs, ~${summary.approximateFindingCount} vulnerability references`
    )
    return { report, summary, invocations }
  }

  private async scanWithAll(
    report: ScanReport,
    invocations: ToolInvocation[],
    target: ScanTarget,
    titlePrefix: string
  ): Promise<void> {
    for (const tool of this.tools) {
      const invocation = await this.execute(tool, target, invocations)
      report.append(`${titlePrefix} WITH ${tool.displayName.toUpperCase()}`, toolBody(tool, invocation))
    }
  }

  private async execute(
    tool: ToolSpec,
    target: ScanTarget,
    invocations: ToolInvocation[]
  ): Promise<ToolInvocation> {
    const label = target.type === 'manifest' ? target.path : 'installed packages'
    this.logger.info(`Running ${tool.name} on ${label}`)
    const invocation = await this.runner.run(tool, target)
    invocations.push(invocation)
    if (invocation.exitStatus !== 0) {
      this.logger.warn(`${tool.name} exited with status ${invocation.exitStatus} on ${label}`)
    }
    return invocation
  }
}

function manifestSection(probe: ManifestProbe): [title: string, body: string] {
  const upper = probe.fileName.toUpperCase()
  if (!probe.found) {
    return [`${upper} NOT FOUND`, `No ${probe.fileName} found`]
  }

  const lines = [`Content of ${probe.fileName}:`, probe.content.replace(/\n+$/, '')]
  if (probe.notes.length > 0) {
    lines.push('', ...probe.notes)
  }
  return [`${upper} FOUND`, lines.join('\n')]
}

/**
 * Tool output, followed by a sentinel line when the tool exited non-zero
 * (most scanners do whenever they report findings)
 */
export function toolBody(tool: ToolSpec, invocation: ToolInvocation): string {
  const output = invocation.stdout.replace(/\n+$/, '')
  if (invocation.exitStatus === 0) {
    return output
  }
  const sentinel = `${tool.displayName} scan completed with issues`
  return output ? `${output}\n\n${sentinel}` : sentinel
}

function snapshotBody(invocation: ToolInvocation): string {
  const lines = ['Installed packages:', invocation.stdout.replace(/\n+$/, '')]
  if (invocation.exitStatus !== 0) {
    lines.push(`(${invocation.toolName} exited with status ${invocation.exitStatus})`)
  }
  return lines.join('\n')
}
