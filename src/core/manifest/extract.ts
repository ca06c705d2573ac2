import { parse as parseToml } from 'smol-toml'
import { z } from 'zod'
import { errorMessage } from '../errors.js'
import type { ManifestKind, PackageRef, ProjectManifest } from '../../types/index.js'

/**
 * The interpreter itself, listed by some schemas alongside real dependencies
 */
const IMPLICIT_RUNTIME = 'python'

const Pep621Schema = z.object({
  project: z.object({
    dependencies: z.array(z.string())
  })
})

const PoetrySchema = z.object({
  tool: z.object({
    poetry: z.object({
      dependencies: z.record(z.string(), z.unknown())
    })
  })
})

const DirectTableSchema = z.object({
  dependencies: z.record(z.string(), z.unknown())
})

interface SchemaStrategy {
  kind: ManifestKind
  label: string
  extract(data: unknown): PackageRef[]
}

/**
 * Tried in order; the first strategy yielding packages wins
 */
const STRATEGIES: SchemaStrategy[] = [
  {
    kind: 'pep621',
    label: 'Found PEP 621 dependencies',
    extract(data) {
      const result = Pep621Schema.safeParse(data)
      if (!result.success) return []
      return result.data.project.dependencies.map(entry => ({ name: entry, rawLine: entry }))
    }
  },
  {
    kind: 'poetry',
    label: 'Found Poetry dependencies',
    extract(data) {
      const result = PoetrySchema.safeParse(data)
      if (!result.success) return []
      return Object.keys(result.data.tool.poetry.dependencies).map(key => ({ name: key, rawLine: key }))
    }
  },
  {
    kind: 'direct-table',
    label: 'Found direct dependencies',
    extract(data) {
      const result = DirectTableSchema.safeParse(data)
      if (!result.success) return []
      return Object.keys(result.data.dependencies).map(key => ({ name: key, rawLine: key }))
    }
  }
]

/**
 * Project name portion of a specifier such as `requests[socks]>=2.0; python_version>"3"`
 */
export function distributionName(specifier: string): string {
  const match = specifier.trim().match(/^[A-Za-z0-9._-]+/)
  return match ? match[0] : ''
}

function isImplicitRuntime(ref: PackageRef): boolean {
  return distributionName(ref.name).toLowerCase() === IMPLICIT_RUNTIME
}

/**
 * Requirements-style manifest: each non-blank, non-comment line is one
 * dependency, taken as written
 */
export function extractRequirements(content: string, sourcePath: string): ProjectManifest {
  const packages: PackageRef[] = []
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) continue
    packages.push({ name: trimmed, rawLine: line })
  }
  return { kind: 'requirements-txt', sourcePath, packages }
}

export interface PyprojectExtraction {
  manifest: ProjectManifest
  /** Log lines describing what was found, for the report */
  notes: string[]
}

/**
 * Project-metadata manifest. Parse failures and empty results are reported
 * in `notes` and yield zero packages; nothing is thrown.
 */
export function extractPyprojectDependencies(content: string, sourcePath: string): PyprojectExtraction {
  let data: unknown
  try {
    data = parseToml(content)
  } catch (error) {
    return {
      manifest: { kind: null, sourcePath, packages: [] },
      notes: [`Error processing pyproject.toml: ${errorMessage(error)}`]
    }
  }

  for (const strategy of STRATEGIES) {
    const packages = strategy.extract(data).filter(ref => !isImplicitRuntime(ref))
    if (packages.length > 0) {
      return {
        manifest: { kind: strategy.kind, sourcePath, packages },
        notes: [
          strategy.label,
          `Dependencies extracted: ${packages.map(ref => ref.name).join(', ')}`
        ]
      }
    }
  }

  return {
    manifest: { kind: null, sourcePath, packages: [] },
    notes: ['No dependencies found in pyproject.toml']
  }
}
