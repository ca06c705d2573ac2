import { join } from 'path'
import { QualityGateChecker } from './checker.js'
import { SonarClient, SonarStatusQuery, SonarTaskSignal } from './sonar-api.js'
import type { StaticAnalysisConfig } from '../config/schema.js'
import type { Logger } from '../../utils/logger.js'

export interface SonarQualityGateOptions {
  token?: string
  fetchImpl?: typeof fetch
  logger?: Logger
}

/**
 * Gate checker for an analysis run from `root`, wired to the configured server
 */
export function createSonarQualityGate(
  config: StaticAnalysisConfig,
  root: string,
  options: SonarQualityGateOptions = {}
): QualityGateChecker {
  const client = new SonarClient({
    baseUrl: config.sonarUrl,
    token: options.token,
    fetchImpl: options.fetchImpl
  })

  return new QualityGateChecker({
    enabled: config.qualityGate.enabled,
    primary: new SonarTaskSignal({
      client,
      reportTaskPath: join(root, '.scannerwork', 'report-task.txt'),
      pollIntervalMs: config.qualityGate.pollIntervalSeconds * 1000
    }),
    fallback: new SonarStatusQuery(client, config.projectKey),
    timeoutMs: config.qualityGate.timeoutMinutes * 60 * 1000,
    logger: options.logger
  })
}
