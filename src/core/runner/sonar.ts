import type { StaticAnalysisConfig } from '../config/schema.js'
import type { ToolSpec } from './tools.js'
import { assertSafeArgument } from './tools.js'

const PROPERTY_KEY = /^sonar\.[A-Za-z0-9._-]+$/

export type SonarProperties = ReadonlyArray<readonly [key: string, value: string]>

/**
 * Analysis properties for sonar-scanner, in a fixed order
 */
export function buildSonarProperties(
  config: StaticAnalysisConfig,
  repositoryUrl: string
): SonarProperties {
  const properties: Array<[string, string]> = [
    ['sonar.projectKey', config.projectKey],
    ['sonar.projectName', config.projectName],
    ['sonar.sources', '.'],
    ['sonar.sourceEncoding', 'UTF-8'],
    ['sonar.host.url', config.sonarUrl]
  ]

  if (config.language === 'python') {
    properties.push(['sonar.python.version', config.pythonVersion])
  }

  properties.push(
    ['sonar.exclusions', config.exclusions.join(',')],
    ['sonar.links.homepage', repositoryUrl]
  )

  if (config.language === 'javascript' && config.typescript) {
    properties.push(
      ['sonar.typescript.lcov.reportPaths', config.coverage.reportPath],
      ['sonar.typescript.tsconfigPath', 'tsconfig.json']
    )
  }

  if (config.coverage.enabled) {
    const key = config.language === 'python'
      ? 'sonar.python.coverage.reportPaths'
      : 'sonar.javascript.lcov.reportPaths'
    properties.push([key, config.coverage.reportPath])
  }

  return properties
}

/**
 * Turn properties into `-Dkey=value` arguments, one argument per property
 */
export function toScannerArgs(properties: SonarProperties): string[] {
  return properties.map(([key, value]) => {
    if (!PROPERTY_KEY.test(key)) {
      throw new Error(`Invalid analysis property name: ${key}`)
    }
    if (/[\0\r\n]/.test(value)) {
      throw new Error(`Analysis property ${key} must not contain control characters`)
    }
    return `-D${key}=${value}`
  })
}

export function sonarScannerTool(binary: string, properties: SonarProperties): ToolSpec {
  assertSafeArgument(binary, 'scanner executable')
  const args = toScannerArgs(properties)
  return {
    name: 'sonar-scanner',
    displayName: 'SonarScanner',
    binary,
    buildArgs: () => [...args]
  }
}
