export {
  QualityGateChecker,
  type QualityGateSignal,
  type QualityGateStatusQuery,
  type QualityGateCheckerOptions
} from './checker.js'
export {
  SonarClient,
  SonarTaskSignal,
  SonarStatusQuery,
  parseReportTask,
  classifyStatusResponse,
  type SonarClientOptions,
  type SonarTaskSignalOptions
} from './sonar-api.js'
export { createSonarQualityGate, type SonarQualityGateOptions } from './factory.js'
