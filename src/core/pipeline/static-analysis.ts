import { rm } from 'fs/promises'
import { join } from 'path'
import { buildSonarProperties, sonarScannerTool } from '../runner/sonar.js'
import { renderStaticAnalysisMessage } from '../notifier/messages.js'
import { errorMessage } from '../errors.js'
import { normalizedBuildUrl, repositoryFor } from './shared.js'
import { createLogger, type Logger } from '../../utils/logger.js'
import { formatTimestamp } from '../../utils/format.js'
import type { QualityGateChecker } from '../quality-gate/checker.js'
import type { NotificationDispatcher } from '../notifier/dispatcher.js'
import type { ToolRunner } from '../runner/process-runner.js'
import { UNKNOWN_REPOSITORY, type SourceCheckout } from '../workspace/git.js'
import type { ProjectPreparer } from '../workspace/preparer.js'
import type { StaticAnalysisConfig } from '../config/schema.js'
import type {
  HostContext,
  PipelineStatus,
  QualityGateResult,
  QualityGateStatus
} from '../../types/index.js'

export interface StaticAnalysisCollaborators {
  checkout: SourceCheckout
  /** Runner executing the scanner in `root` */
  createRunner: (root: string) => ToolRunner
  /** Install and test step, used for JavaScript projects */
  preparer?: ProjectPreparer
  createQualityGate: (root: string) => QualityGateChecker
  dispatcher: NotificationDispatcher
  logger?: Logger
}

export interface StaticAnalysisResult {
  status: PipelineStatus
  qualityGate: QualityGateResult
  error?: string
  /** Analysis dashboard, once the scanner succeeded */
  reportUrl?: string
}

const FAILING_GATE: ReadonlySet<QualityGateStatus> = new Set(['FAILED', 'ERROR', 'TIMEOUT'])

/**
 * Check out, optionally prepare, run sonar-scanner and resolve the quality
 * gate. The HTML notification is attempted whatever the outcome.
 */
export async function runStaticAnalysis(
  config: StaticAnalysisConfig,
  host: HostContext,
  workspaceRoot: string,
  collaborators: StaticAnalysisCollaborators
): Promise<StaticAnalysisResult> {
  const logger = collaborators.logger ?? createLogger('static-analysis')

  let root = workspaceRoot
  let cloned = false
  let repositoryUrl = repositoryFor(config.repoUrl, host)
  let qualityGate: QualityGateResult = { status: 'NOT_RUN', source: 'primary' }
  let reportUrl: string | undefined
  let error: string | undefined

  try {
    const source = await collaborators.checkout.checkout({
      workspaceRoot,
      repoUrl: config.repoUrl,
      branch: config.branch
    })
    root = source.root
    cloned = source.cloned
    repositoryUrl = repositoryFor(config.repoUrl, host, source.repositoryUrl)
    logger.info(`Using repository: ${repositoryUrl}`)

    if (config.language === 'javascript' && collaborators.preparer) {
      await collaborators.preparer.prepare(root)
    }

    const scanner = sonarScannerTool(config.scannerPath, buildSonarProperties(config, repositoryUrl))
    const invocation = await collaborators.createRunner(root).run(scanner, { type: 'environment' })
    if (invocation.exitStatus !== 0) {
      error = `sonar-scanner exited with status ${invocation.exitStatus}`
      logger.error(`SonarQube analysis failed: ${error}`)
    } else {
      reportUrl = `${config.sonarUrl.replace(/\/+$/, '')}/dashboard?id=${encodeURIComponent(config.projectKey)}`
      logger.info(`SonarQube report available at: ${reportUrl}`)

      qualityGate = await collaborators.createQualityGate(root).check()
      if (config.qualityGate.failBuild && FAILING_GATE.has(qualityGate.status)) {
        error = `Quality gate status: ${qualityGate.status}`
      }
    }
  } catch (caught) {
    error = errorMessage(caught)
    logger.error(`SonarQube analysis failed: ${error}`)
  }

  const status: PipelineStatus = error === undefined ? 'SUCCESS' : 'FAILURE'
  if (status === 'SUCCESS') {
    logger.info('SonarQube analysis completed successfully')
  }

  await collaborators.dispatcher.notify(
    renderStaticAnalysisMessage({
      projectName: config.projectName,
      repositoryUrl: repositoryUrl === UNKNOWN_REPOSITORY ? undefined : repositoryUrl,
      buildStatus: status,
      gateStatus: qualityGate.status,
      timestamp: formatTimestamp(host.now()),
      buildUrl: normalizedBuildUrl(host),
      dashboardUrl: reportUrl,
      errorMessage: error
    }),
    config.notifyEmail
  )

  if (config.cleanWorkspace) {
    await cleanup(cloned ? [root] : [join(root, '.scannerwork')], logger)
  }

  return { status, qualityGate, error, reportUrl }
}

async function cleanup(paths: string[], logger: Logger): Promise<void> {
  for (const path of paths) {
    try {
      await rm(path, { recursive: true, force: true })
    } catch (caught) {
      logger.warn(`Failed to remove ${path}: ${errorMessage(caught)}`)
    }
  }
}
