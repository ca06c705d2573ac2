export { ProcessToolRunner, type ToolRunner, type ProcessToolRunnerOptions } from './process-runner.js'
export {
  PIP_AUDIT,
  SAFETY,
  PIP_FREEZE,
  DEPENDENCY_TOOLS,
  resolveDependencyTools,
  commandTool,
  assertSafeArgument,
  type ToolSpec
} from './tools.js'
export { buildSonarProperties, toScannerArgs, sonarScannerTool, type SonarProperties } from './sonar.js'
