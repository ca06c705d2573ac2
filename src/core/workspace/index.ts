export {
  GitCheckout,
  UNKNOWN_REPOSITORY,
  type SourceCheckout,
  type CheckoutRequest,
  type CheckoutResult,
  type GitCheckoutOptions
} from './git.js'
export {
  PythonVenvProvisioner,
  type EnvironmentProvisioner,
  type ProvisionedEnvironment,
  type PythonVenvProvisionerOptions
} from './venv.js'
export {
  CommandPreparer,
  type ProjectPreparer,
  type PreparationResult,
  type CommandPreparerOptions
} from './preparer.js'
export {
  FileArchiver,
  type ArtifactArchiver,
  type ArchiveOptions,
  type FileArchiverOptions
} from './archiver.js'
export { RunWorkspace } from './run-workspace.js'
export { execCommand, commandFailure, type CommandExecutor, type CommandOptions, type CommandOutput } from './exec.js'
