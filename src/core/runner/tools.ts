import type { DependencyTool } from '../config/schema.js'
import type { ScanTarget } from '../../types/index.js'

/**
 * Definition of an external tool: which binary to run and how to build
 * its argument list for a given target. Arguments are passed to the
 * process directly, never through a shell.
 */
export interface ToolSpec {
  /** Stable identifier, recorded in each invocation */
  name: string
  /** Label used in report titles and sentinel lines */
  displayName: string
  /** Executable name, resolved inside the tool environment when one is set */
  binary: string
  buildArgs(target: ScanTarget): string[]
}

/**
 * Reject values that could be read as something other than a single argument value
 */
export function assertSafeArgument(value: string, label: string): string {
  if (value.length === 0) {
    throw new Error(`${label} must not be empty`)
  }
  if (/[\0\r\n]/.test(value)) {
    throw new Error(`${label} must not contain control characters`)
  }
  if (value.startsWith('-')) {
    throw new Error(`${label} must not start with '-': ${value}`)
  }
  return value
}

export const PIP_AUDIT: ToolSpec = {
  name: 'pip-audit',
  displayName: 'Pip-audit',
  binary: 'pip-audit',
  buildArgs(target) {
    if (target.type === 'environment') {
      return ['--format', 'columns']
    }
    return ['--requirement', assertSafeArgument(target.path, 'requirement file'), '--format', 'columns']
  }
}

export const SAFETY: ToolSpec = {
  name: 'safety',
  displayName: 'Safety',
  binary: 'safety',
  buildArgs(target) {
    if (target.type === 'environment') {
      return ['check', '--output', 'text']
    }
    return ['check', '-r', assertSafeArgument(target.path, 'requirement file'), '--output', 'text']
  }
}

/**
 * Lists the packages installed in the tool environment
 */
export const PIP_FREEZE: ToolSpec = {
  name: 'pip-freeze',
  displayName: 'Pip freeze',
  binary: 'pip',
  buildArgs: () => ['freeze']
}

export const DEPENDENCY_TOOLS: Record<DependencyTool, ToolSpec> = {
  'pip-audit': PIP_AUDIT,
  safety: SAFETY
}

/**
 * Resolve configured scanner names to tool definitions, keeping their order
 */
export function resolveDependencyTools(names: readonly DependencyTool[]): ToolSpec[] {
  return names.map(name => DEPENDENCY_TOOLS[name])
}

/**
 * Wrap a fixed argument vector (e.g. a configured install command) as a tool
 */
export function commandTool(name: string, argv: readonly string[]): ToolSpec {
  if (argv.length === 0) {
    throw new Error(`Command for '${name}' is empty`)
  }
  const [binary, ...args] = argv
  assertSafeArgument(binary, `${name} executable`)
  return {
    name,
    displayName: name,
    binary,
    buildArgs: () => [...args]
  }
}
