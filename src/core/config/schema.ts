import { z } from 'zod'
import { ConfigLoadError } from '../errors.js'

/**
 * Languages the static-analysis pipeline knows how to configure
 */
export const LanguageSchema = z.enum(['python', 'javascript'])
export type Language = z.infer<typeof LanguageSchema>

/**
 * Dependency scanners the dependency pipeline can run
 */
export const DependencyToolSchema = z.enum(['pip-audit', 'safety'])
export type DependencyTool = z.infer<typeof DependencyToolSchema>

export const DEFAULT_EXCLUSIONS: Record<Language, string[]> = {
  python: [
    '**/venv/**',
    '**/migrations/**',
    '**/*.pyc',
    '**/__pycache__/**',
    '**/tests/**',
    'setup.py'
  ],
  javascript: [
    '**/node_modules/**',
    '**/*.spec.js',
    '**/*.spec.jsx',
    '**/*.spec.ts',
    '**/*.spec.tsx',
    '**/coverage/**',
    '**/build/**',
    '**/dist/**'
  ]
}

export const DEFAULT_COVERAGE_PATH: Record<Language, string> = {
  python: 'coverage.xml',
  javascript: 'coverage/lcov.info'
}

function splitList(value: string | string[]): string[] {
  const items = Array.isArray(value) ? value : value.split(',')
  return items.map(item => item.trim()).filter(item => item.length > 0)
}

/**
 * Comma-separated string or list of email addresses
 */
export const RecipientsSchema = z
  .union([z.string(), z.array(z.string())])
  .transform(splitList)
  .pipe(z.array(z.string().email('Invalid email address')))

/**
 * Glob list, as a comma-separated string or a list
 */
export const GlobListSchema = z
  .union([z.string(), z.array(z.string())])
  .transform(splitList)

/**
 * Command line, as a whitespace-separated string or an argument list.
 * An empty command means the step is skipped.
 */
export const CommandSchema = z
  .union([z.string(), z.array(z.string())])
  .transform(value =>
    typeof value === 'string' ? value.trim().split(/\s+/).filter(arg => arg.length > 0) : value
  )

const PlainFileNameSchema = z
  .string()
  .min(1, 'File name is required')
  .regex(/^[^/\\]+$/, 'Must be a plain file name without directories')

/**
 * Dependency-scan pipeline options
 */
export const DependencyScanConfigSchema = z.object({
  reportName: PlainFileNameSchema
    .default('dependency_scan_report.txt')
    .describe('Report file written to the project root'),
  venvDir: z.string()
    .min(1, 'Virtual environment directory is required')
    .default('venv')
    .describe('Disposable tool environment, relative to the project root'),
  pythonBin: z.string()
    .min(1)
    .default('python3')
    .describe('Interpreter used to create the tool environment'),
  tools: z.array(DependencyToolSchema)
    .min(1, 'At least one scanner is required')
    .default(['pip-audit', 'safety'])
    .describe('Scanners to run, in order'),
  emailRecipients: RecipientsSchema
    .default([])
    .describe('Notification recipients'),
  projectName: z.string()
    .optional()
    .describe('Display name used in notifications'),
  repoUrl: z.string()
    .default('')
    .describe('Repository to clone; empty scans the given project root'),
  branch: z.string()
    .min(1)
    .default('main')
    .describe('Branch to clone when repoUrl is set'),
  archiveDir: z.string()
    .min(1)
    .default('artifacts')
    .describe('Directory receiving archived reports'),
  cleanWorkspace: z.boolean()
    .default(true)
    .describe('Remove a cloned checkout after the run')
}).strict()

export type DependencyScanConfig = Readonly<z.output<typeof DependencyScanConfigSchema>>

const QualityGateSchema = z.object({
  enabled: z.boolean().default(false),
  timeoutMinutes: z.number()
    .positive('Quality gate timeout must be positive')
    .default(5),
  pollIntervalSeconds: z.number()
    .positive('Poll interval must be positive')
    .default(5),
  failBuild: z.boolean()
    .default(true)
    .describe('Report FAILURE when the gate does not pass')
}).strict()

const CoverageSchema = z.object({
  enabled: z.boolean().default(false),
  reportPath: z.string().min(1).optional()
}).strict()

/**
 * Static-analysis pipeline options
 */
export const StaticAnalysisConfigSchema = z.object({
  language: LanguageSchema.default('python'),
  projectKey: z.string({ required_error: 'Project key is required' })
    .min(1, 'Project key is required'),
  projectName: z.string().optional(),
  sonarUrl: z.string()
    .url('Sonar URL must be a valid URL')
    .default('http://localhost:9000'),
  repoUrl: z.string().default(''),
  branch: z.string().min(1).default('main'),
  scannerPath: z.string()
    .min(1)
    .default('sonar-scanner')
    .describe('sonar-scanner executable'),
  qualityGate: QualityGateSchema.default({}),
  cleanWorkspace: z.boolean().default(true),
  notifyEmail: RecipientsSchema.default([]),
  pythonVersion: z.string().min(1).default('3'),
  exclusions: GlobListSchema.optional(),
  coverage: CoverageSchema.default({}),
  typescript: z.boolean().default(false),
  installCommand: CommandSchema.default('npm install'),
  testCommand: CommandSchema.default('npm test')
}).strict().transform(config => ({
  ...config,
  projectName: config.projectName || config.projectKey,
  exclusions: config.exclusions ?? DEFAULT_EXCLUSIONS[config.language],
  coverage: {
    enabled: config.coverage.enabled,
    reportPath: config.coverage.reportPath ?? DEFAULT_COVERAGE_PATH[config.language]
  }
}))

export type StaticAnalysisConfig = Readonly<z.output<typeof StaticAnalysisConfigSchema>>

/**
 * Shape of a configuration file: one optional section per pipeline
 */
export const ConfigFileSchema = z.object({
  dependencyScan: z.record(z.string(), z.unknown()).optional(),
  staticAnalysis: z.record(z.string(), z.unknown()).optional()
}).strict()

export type ConfigFile = z.infer<typeof ConfigFileSchema>

export type ConfigLayer = Record<string, unknown>

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Overlay configuration layers; later layers win, undefined values are skipped,
 * nested objects merge and arrays are replaced
 */
export function mergeLayers(...layers: Array<ConfigLayer | undefined>): ConfigLayer {
  const result: ConfigLayer = {}
  for (const layer of layers) {
    if (!layer) continue
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue
      const existing = result[key]
      result[key] = isPlainObject(existing) && isPlainObject(value)
        ? mergeLayers(existing, value)
        : value
    }
  }
  return result
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested)
    }
    Object.freeze(value)
  }
  return value
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(errors: z.ZodError): string[] {
  return errors.errors.map(err => {
    const path = err.path.join('.')
    return path ? `${path}: ${err.message}` : err.message
  })
}

function build<S extends z.ZodTypeAny>(
  schema: S,
  section: string,
  layers: Array<ConfigLayer | undefined>,
  configPath?: string
): Readonly<z.output<S>> {
  const result = schema.safeParse(mergeLayers(...layers))
  if (!result.success) {
    const errors = formatValidationErrors(result.error)
    throw new ConfigLoadError(
      `Invalid ${section} configuration\n${errors.join('\n')}`,
      configPath,
      errors
    )
  }
  return deepFreeze(result.data)
}

/**
 * Build the dependency-scan configuration from file and caller overrides
 */
export function buildDependencyScanConfig(
  fileSection?: ConfigLayer,
  overrides?: ConfigLayer,
  configPath?: string
): DependencyScanConfig {
  return build(DependencyScanConfigSchema, 'dependencyScan', [fileSection, overrides], configPath)
}

/**
 * Build the static-analysis configuration from file and caller overrides
 */
export function buildStaticAnalysisConfig(
  fileSection?: ConfigLayer,
  overrides?: ConfigLayer,
  configPath?: string
): StaticAnalysisConfig {
  return build(StaticAnalysisConfigSchema, 'staticAnalysis', [fileSection, overrides], configPath)
}
