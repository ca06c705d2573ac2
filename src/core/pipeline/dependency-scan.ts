import { readFile, rm, writeFile } from 'fs/promises'
import { join } from 'path'
import { ScanOrchestrator } from '../scanner/orchestrator.js'
import { ScanAbortedError, type ScanReport } from '../scanner/report.js'
import { resolveDependencyTools } from '../runner/tools.js'
import { renderDependencyScanMessage } from '../notifier/messages.js'
import { errorMessage } from '../errors.js'
import { RunWorkspace } from '../workspace/run-workspace.js'
import { normalizedBuildUrl, repositoryFor } from './shared.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import type { NotificationDispatcher } from '../notifier/dispatcher.js'
import type { ToolRunner } from '../runner/process-runner.js'
import type { SourceCheckout } from '../workspace/git.js'
import type { EnvironmentProvisioner, ProvisionedEnvironment } from '../workspace/venv.js'
import type { ArtifactArchiver } from '../workspace/archiver.js'
import type { DependencyScanConfig } from '../config/schema.js'
import type { HostContext, PipelineOutcome, ScanSummary } from '../../types/index.js'

export const COUNT_FILE = 'vuln_count.txt'

export interface DependencyScanCollaborators {
  checkout: SourceCheckout
  provisioner: EnvironmentProvisioner
  /** Runner for the scanners installed in `env`, executing in `root` */
  createRunner: (env: ProvisionedEnvironment, root: string) => ToolRunner
  archiver: ArtifactArchiver
  dispatcher: NotificationDispatcher
  createWorkspace?: (logger: Logger) => Promise<RunWorkspace>
  logger?: Logger
}

export interface DependencyScanResult {
  /** Approximate vulnerability references in the report */
  vulnerabilitiesFound: number
  /** Report file name */
  scanReport: string
  successful: boolean
  errorMessage?: string
  reportUrl: string
  outcome: PipelineOutcome
}

/**
 * Check out, provision the scanners, scan every manifest and the installed
 * environment, then publish the report. The report is archived and the
 * notification attempted whatever the outcome, and run-scoped files are
 * always removed.
 */
export async function runDependencyScan(
  config: DependencyScanConfig,
  host: HostContext,
  workspaceRoot: string,
  collaborators: DependencyScanCollaborators
): Promise<DependencyScanResult> {
  const logger = collaborators.logger ?? createLogger('dependency-scan')
  const workspace = await (collaborators.createWorkspace ?? RunWorkspace.create)(logger)

  let projectRoot = workspaceRoot
  let envPath: string | undefined
  let summary: ScanSummary | undefined
  let vulnerabilitiesFound = 0
  let reportWritten = false
  let failure: string | undefined

  try {
    try {
      const source = await collaborators.checkout.checkout({
        workspaceRoot,
        repoUrl: config.repoUrl,
        branch: config.branch
      })
      projectRoot = source.root
      if (source.cloned && config.cleanWorkspace) {
        workspace.track(source.root)
      }

      // Tracked first: a failed pip step leaves a half-built environment behind
      envPath = collaborators.provisioner.pathFor(projectRoot)
      workspace.track(envPath)
      const env = await collaborators.provisioner.provision(projectRoot)

      const orchestrator = new ScanOrchestrator({
        runner: collaborators.createRunner(env, projectRoot),
        tools: resolveDependencyTools(config.tools),
        repository: repositoryFor(config.repoUrl, host, source.repositoryUrl),
        now: host.now,
        logger
      })
      const run = await orchestrator.runAll(projectRoot, workspace.dir)
      summary = run.summary

      await writeFile(join(projectRoot, config.reportName), run.report.render())
      reportWritten = true

      const countFile = workspace.path(COUNT_FILE)
      await writeFile(countFile, String(summary.approximateFindingCount))
      vulnerabilitiesFound = await readCount(countFile)
      await rm(countFile, { force: true })
    } catch (error) {
      failure = errorMessage(error)
      logger.error(`Error during dependency scan: ${failure}`)
      if (error instanceof ScanAbortedError) {
        reportWritten = await writePartialReport(
          join(projectRoot, config.reportName),
          error.partialReport,
          logger
        )
      }
    }

    await archiveReport(
      collaborators.archiver,
      projectRoot,
      config.reportName,
      envPath === undefined ? [] : [envPath],
      logger
    )

    const buildUrl = normalizedBuildUrl(host)
    const reportUrl = buildUrl
      ? `${buildUrl}artifact/${config.reportName}`
      : collaborators.archiver.location(config.reportName)

    const status = failure === undefined ? 'SUCCESS' : 'FAILURE'
    await collaborators.dispatcher.notify(
      renderDependencyScanMessage({
        status,
        projectName: config.projectName,
        reportUrl,
        errorMessage: failure,
        attachment: reportWritten
          ? { filename: config.reportName, path: join(projectRoot, config.reportName) }
          : undefined
      }),
      config.emailRecipients
    )

    return {
      vulnerabilitiesFound,
      scanReport: config.reportName,
      successful: failure === undefined,
      errorMessage: failure,
      reportUrl,
      outcome: { status, summary, errorMessage: failure, reportLocation: reportUrl }
    }
  } finally {
    await workspace.dispose()
  }
}

async function readCount(path: string): Promise<number> {
  const count = Number.parseInt((await readFile(path, 'utf-8')).trim(), 10)
  return Number.isNaN(count) ? 0 : count
}

async function writePartialReport(path: string, report: ScanReport, logger: Logger): Promise<boolean> {
  try {
    await writeFile(path, report.render())
    return true
  } catch (error) {
    logger.error(`Could not write partial report: ${errorMessage(error)}`)
    return false
  }
}

async function archiveReport(
  archiver: ArtifactArchiver,
  root: string,
  reportName: string,
  skip: readonly string[],
  logger: Logger
): Promise<void> {
  try {
    await archiver.archive(root, [reportName], { skip })
  } catch (error) {
    logger.error(`Could not archive ${reportName}: ${errorMessage(error)}`)
  }
}
