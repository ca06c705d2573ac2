export {
  runDependencyScan,
  COUNT_FILE,
  type DependencyScanCollaborators,
  type DependencyScanResult
} from './dependency-scan.js'
export {
  runStaticAnalysis,
  type StaticAnalysisCollaborators,
  type StaticAnalysisResult
} from './static-analysis.js'
