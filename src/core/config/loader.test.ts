import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile, readFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import { ConfigLoader, DEFAULT_CONFIG_FILENAME } from './loader.js'
import { ConfigLoadError } from '../errors.js'

describe('ConfigLoader', () => {
  let tempDir: string
  let loader: ConfigLoader

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'scanrelay-config-'))
    loader = new ConfigLoader({ basePath: tempDir })
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  describe('load', () => {
    it('returns an empty configuration when no default file exists', async () => {
      expect(await loader.load()).toEqual({})
    })

    it('picks up the default file', async () => {
      await writeFile(
        join(tempDir, DEFAULT_CONFIG_FILENAME),
        'dependencyScan:\n  reportName: deps.txt\n'
      )

      const file = await loader.load()

      expect(file.dependencyScan).toEqual({ reportName: 'deps.txt' })
    })

    it('throws ConfigLoadError for a missing explicit file', async () => {
      await expect(loader.load('missing.yaml')).rejects.toThrow(ConfigLoadError)
    })

    it('throws ConfigLoadError for unknown top-level sections', async () => {
      await writeFile(join(tempDir, 'bad.yaml'), 'dependencyScans:\n  venvDir: v\n')

      await expect(loader.load('bad.yaml')).rejects.toThrow(ConfigLoadError)
    })

    it('treats an empty file as empty configuration', async () => {
      await writeFile(join(tempDir, 'empty.yaml'), '')

      expect(await loader.load('empty.yaml')).toEqual({})
    })
  })

  describe('loadFromString', () => {
    it('reports YAML syntax errors', () => {
      expect(() => loader.loadFromString('dependencyScan: [unclosed')).toThrow(ConfigLoadError)
    })
  })

  describe('validate', () => {
    it('accepts the bundled default configuration', async () => {
      const bundled = await readFile(
        new URL('../../../config/default.yaml', import.meta.url),
        'utf-8'
      )
      await writeFile(join(tempDir, 'default.yaml'), bundled)

      const result = await loader.validate('default.yaml')

      expect(result).toEqual({ valid: true, errors: [] })
    })

    it('prefixes section errors with the section name', async () => {
      await writeFile(
        join(tempDir, 'invalid.yaml'),
        'staticAnalysis:\n  sonarUrl: http://localhost:9000\n'
      )

      const result = await loader.validate('invalid.yaml')

      expect(result.valid).toBe(false)
      expect(result.errors).toEqual(['staticAnalysis.projectKey: Project key is required'])
    })

    it('reports read failures', async () => {
      const result = await loader.validate('nope.yaml')

      expect(result.valid).toBe(false)
      expect(result.errors).toEqual(['ENOENT'])
    })
  })
})
