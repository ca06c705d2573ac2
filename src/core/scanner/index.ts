export { ScanOrchestrator, toolBody, type ScanOrchestratorOptions, type ScanRun } from './orchestrator.js'
export { ScanReport, ScanAbortedError } from './report.js'
