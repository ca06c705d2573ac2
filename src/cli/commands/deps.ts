import { resolve } from 'path'
import type { Command } from 'commander'
import type { GlobalOptions } from '../index.js'
import { ExitCode } from '../index.js'
import { hostContextFromEnv, mailerFromEnv } from '../host.js'
import { createLogger, success } from '../../utils/logger.js'
import { ConfigLoadError, errorMessage } from '../../core/errors.js'
import {
  createConfigLoader,
  buildDependencyScanConfig,
  type ConfigLayer,
  type DependencyScanConfig
} from '../../core/config/index.js'
import { runDependencyScan, type DependencyScanCollaborators } from '../../core/pipeline/index.js'
import { ProcessToolRunner } from '../../core/runner/index.js'
import { NotificationDispatcher } from '../../core/notifier/index.js'
import { FileArchiver, GitCheckout, PythonVenvProvisioner } from '../../core/workspace/index.js'

const logger = createLogger('deps')

/**
 * deps command options
 */
export interface DepsOptions {
  reportName?: string
  tools?: string
  recipients?: string
  repo?: string
  branch?: string
  archiveDir?: string
}

function overridesFrom(options: DepsOptions): ConfigLayer {
  return {
    reportName: options.reportName,
    tools: options.tools?.split(',').map(tool => tool.trim()),
    emailRecipients: options.recipients,
    repoUrl: options.repo,
    branch: options.branch,
    archiveDir: options.archiveDir
  }
}

/**
 * Execute the dependency scan for `root`
 */
export async function executeDeps(
  root: string | undefined,
  options: DepsOptions,
  globalOptions: GlobalOptions,
  collaborators: Partial<DependencyScanCollaborators> = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const workspaceRoot = resolve(root ?? '.')

  let config: DependencyScanConfig
  try {
    const file = await createConfigLoader().load(globalOptions.config)
    config = buildDependencyScanConfig(file.dependencyScan, overridesFrom(options), globalOptions.config)
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      logger.error(error.message)
      return ExitCode.ERROR
    }
    logger.error(`Failed to load configuration: ${errorMessage(error)}`)
    return ExitCode.ERROR
  }

  const result = await runDependencyScan(config, hostContextFromEnv(env), workspaceRoot, {
    checkout: collaborators.checkout ?? new GitCheckout(),
    provisioner: collaborators.provisioner ?? new PythonVenvProvisioner({
      venvDir: config.venvDir,
      pythonBin: config.pythonBin,
      packages: config.tools
    }),
    createRunner: collaborators.createRunner ??
      ((venv, projectRoot) => new ProcessToolRunner({ binDir: venv.binDir, cwd: projectRoot })),
    archiver: collaborators.archiver ??
      new FileArchiver({ archiveDir: resolve(workspaceRoot, config.archiveDir) }),
    dispatcher: collaborators.dispatcher ?? new NotificationDispatcher({ mailer: mailerFromEnv(env) }),
    createWorkspace: collaborators.createWorkspace,
    logger: collaborators.logger
  })

  if (result.successful) {
    success(
      `Dependency scan complete: ~${result.vulnerabilitiesFound} vulnerability references, report at ${result.reportUrl}`
    )
    return ExitCode.SUCCESS
  }

  logger.error(`Dependency scan failed: ${result.errorMessage ?? 'unknown error'}`)
  return ExitCode.FAILURE
}

/**
 * Register deps command on the program
 */
export function registerDepsCommand(program: Command): void {
  program
    .command('deps [root]')
    .description('Scan Python dependencies for known vulnerabilities')
    .option('-r, --report-name <file>', 'Report file name')
    .option('-t, --tools <list>', 'Comma-separated scanners (pip-audit,safety)')
    .option('-e, --recipients <list>', 'Comma-separated notification recipients')
    .option('--repo <url>', 'Repository to clone instead of scanning root')
    .option('--branch <name>', 'Branch to clone')
    .option('--archive-dir <dir>', 'Directory receiving the archived report')
    .action(async (root: string | undefined, options: DepsOptions) => {
      const globalOpts = program.opts<GlobalOptions>()
      const exitCode = await executeDeps(root, options, globalOpts)
      process.exit(exitCode)
    })
}
