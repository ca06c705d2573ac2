import { resolve } from 'path'
import type { Command } from 'commander'
import type { GlobalOptions } from '../index.js'
import { ExitCode } from '../index.js'
import { hostContextFromEnv, mailerFromEnv } from '../host.js'
import { createLogger, success } from '../../utils/logger.js'
import { ConfigLoadError, errorMessage } from '../../core/errors.js'
import {
  createConfigLoader,
  buildStaticAnalysisConfig,
  type ConfigLayer,
  type StaticAnalysisConfig
} from '../../core/config/index.js'
import { runStaticAnalysis, type StaticAnalysisCollaborators } from '../../core/pipeline/index.js'
import { ProcessToolRunner } from '../../core/runner/index.js'
import { NotificationDispatcher } from '../../core/notifier/index.js'
import { createSonarQualityGate } from '../../core/quality-gate/index.js'
import { CommandPreparer, GitCheckout } from '../../core/workspace/index.js'

const logger = createLogger('sonar')

/**
 * sonar command options
 */
export interface SonarOptions {
  projectKey?: string
  projectName?: string
  sonarUrl?: string
  language?: string
  repo?: string
  branch?: string
  qualityGate?: boolean
  coverage?: boolean
  notify?: string
}

function overridesFrom(options: SonarOptions): ConfigLayer {
  return {
    projectKey: options.projectKey,
    projectName: options.projectName,
    sonarUrl: options.sonarUrl,
    language: options.language,
    repoUrl: options.repo,
    branch: options.branch,
    notifyEmail: options.notify,
    qualityGate: options.qualityGate ? { enabled: true } : undefined,
    coverage: options.coverage ? { enabled: true } : undefined
  }
}

/**
 * Execute the static analysis for `root`
 */
export async function executeSonar(
  root: string | undefined,
  options: SonarOptions,
  globalOptions: GlobalOptions,
  collaborators: Partial<StaticAnalysisCollaborators> = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const workspaceRoot = resolve(root ?? '.')

  let config: StaticAnalysisConfig
  try {
    const file = await createConfigLoader().load(globalOptions.config)
    config = buildStaticAnalysisConfig(file.staticAnalysis, overridesFrom(options), globalOptions.config)
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      logger.error(error.message)
      return ExitCode.ERROR
    }
    logger.error(`Failed to load configuration: ${errorMessage(error)}`)
    return ExitCode.ERROR
  }

  const host = hostContextFromEnv(env)
  const result = await runStaticAnalysis(config, host, workspaceRoot, {
    checkout: collaborators.checkout ?? new GitCheckout(),
    createRunner: collaborators.createRunner ?? (cwd => new ProcessToolRunner({ cwd })),
    preparer: collaborators.preparer ?? new CommandPreparer({
      installCommand: config.installCommand,
      testCommand: config.testCommand
    }),
    createQualityGate: collaborators.createQualityGate ??
      (analysisRoot => createSonarQualityGate(config, analysisRoot, { token: host.sonarToken })),
    dispatcher: collaborators.dispatcher ?? new NotificationDispatcher({ mailer: mailerFromEnv(env) }),
    logger: collaborators.logger
  })

  logger.info(`Quality gate: ${result.qualityGate.status} (${result.qualityGate.source})`)
  if (result.status === 'SUCCESS') {
    success(`Static analysis complete: ${result.reportUrl ?? 'no dashboard URL'}`)
    return ExitCode.SUCCESS
  }

  logger.error(`Static analysis failed: ${result.error ?? 'unknown error'}`)
  return ExitCode.FAILURE
}

/**
 * Register sonar command on the program
 */
export function registerSonarCommand(program: Command): void {
  program
    .command('sonar [root]')
    .description('Run SonarQube static analysis and check the quality gate')
    .option('-k, --project-key <key>', 'Analysis project key')
    .option('-n, --project-name <name>', 'Display name, defaults to the key')
    .option('-u, --sonar-url <url>', 'Analysis server URL')
    .option('-l, --language <language>', 'Project language (python|javascript)')
    .option('--repo <url>', 'Repository to clone instead of analysing root')
    .option('--branch <name>', 'Branch to clone')
    .option('--quality-gate', 'Wait for the quality gate')
    .option('--coverage', 'Import the coverage report')
    .option('-e, --notify <list>', 'Comma-separated notification recipients')
    .action(async (root: string | undefined, options: SonarOptions) => {
      const globalOpts = program.opts<GlobalOptions>()
      const exitCode = await executeSonar(root, options, globalOpts)
      process.exit(exitCode)
    })
}
