/**
 * Tests for sonar command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'fs/promises'
import { fileURLToPath } from 'url'
import { join } from 'path'
import { tmpdir } from 'os'
import { executeSonar } from './sonar.js'
import { ExitCode } from '../index.js'
import { NotificationDispatcher } from '../../core/notifier/index.js'
import { QualityGateChecker } from '../../core/quality-gate/index.js'
import { nullLogger } from '../../utils/logger.js'
import type { StaticAnalysisCollaborators } from '../../core/pipeline/index.js'
import type { ToolRunner, ToolSpec } from '../../core/runner/index.js'
import type { ScanTarget, ToolInvocation } from '../../types/index.js'

const fixturesPath = fileURLToPath(new URL('../__fixtures__', import.meta.url))

class ScannerStub implements ToolRunner {
  readonly argv: string[][] = []

  constructor(private readonly exitStatus: number) {}

  async run(tool: ToolSpec, target: ScanTarget): Promise<ToolInvocation> {
    this.argv.push(tool.buildArgs(target))
    return { toolName: tool.name, manifestKind: null, exitStatus: this.exitStatus, stdout: '', durationMs: 0 }
  }
}

describe('sonar command', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'scanrelay-sonar-test-'))
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(tempDir, { recursive: true, force: true })
  })

  function collaborators(scanner: ScannerStub, gateStatus = 'OK'): Partial<StaticAnalysisCollaborators> {
    return {
      checkout: {
        checkout: async request => ({
          root: request.workspaceRoot,
          repositoryUrl: 'https://git.example.com/acme/demo-app.git',
          cloned: false
        })
      },
      createRunner: () => scanner,
      createQualityGate: () =>
        new QualityGateChecker({
          enabled: true,
          primary: { wait: async () => gateStatus },
          fallback: { fetchStatus: async () => '{}' },
          timeoutMs: 1000,
          logger: nullLogger
        }),
      dispatcher: new NotificationDispatcher({ logger: nullLogger }),
      logger: nullLogger
    }
  }

  it('should return SUCCESS (0) when analysis and gate pass', async () => {
    const scanner = new ScannerStub(0)
    const exitCode = await executeSonar(
      tempDir,
      { projectKey: 'cli-key' },
      { config: join(fixturesPath, 'valid.yaml') },
      collaborators(scanner),
      {}
    )

    expect(exitCode).toBe(ExitCode.SUCCESS)
    expect(scanner.argv[0]).toContain('-Dsonar.projectKey=cli-key')
    expect(scanner.argv[0]).toContain('-Dsonar.host.url=http://sonar.test')
  })

  it('should return FAILURE (1) when the scanner fails', async () => {
    const exitCode = await executeSonar(
      tempDir,
      {},
      { config: join(fixturesPath, 'valid.yaml') },
      collaborators(new ScannerStub(3)),
      {}
    )

    expect(exitCode).toBe(ExitCode.FAILURE)
  })

  it('should return FAILURE (1) when an enabled gate fails', async () => {
    const exitCode = await executeSonar(
      tempDir,
      { qualityGate: true },
      { config: join(fixturesPath, 'valid.yaml') },
      collaborators(new ScannerStub(0), 'ERROR'),
      {}
    )

    expect(exitCode).toBe(ExitCode.FAILURE)
  })

  it('should return ERROR (2) without a project key', async () => {
    const scanner = new ScannerStub(0)
    const exitCode = await executeSonar(
      tempDir,
      {},
      { config: join(fixturesPath, 'deps-only.yaml') },
      collaborators(scanner),
      {}
    )

    expect(exitCode).toBe(ExitCode.ERROR)
    expect(scanner.argv).toEqual([])
  })
})
