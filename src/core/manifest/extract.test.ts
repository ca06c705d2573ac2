import { describe, it, expect } from 'vitest'
import { extractRequirements, extractPyprojectDependencies, distributionName } from './extract.js'

const SOURCE = '/work/pyproject.toml'

describe('extractRequirements', () => {
  it('should keep each dependency line as written', () => {
    const manifest = extractRequirements('flask==0.12\nrequests >= 2.0  \n', '/work/requirements.txt')

    expect(manifest.kind).toBe('requirements-txt')
    expect(manifest.packages).toEqual([
      { name: 'flask==0.12', rawLine: 'flask==0.12' },
      { name: 'requests >= 2.0', rawLine: 'requests >= 2.0  ' }
    ])
  })

  it('should skip blank and comment lines without validating the rest', () => {
    const manifest = extractRequirements('# pinned\n\n-e ./local\nnot a valid requirement!\n', '/r.txt')

    expect(manifest.packages.map(p => p.name)).toEqual(['-e ./local', 'not a valid requirement!'])
  })
})

describe('extractPyprojectDependencies', () => {
  it('should stop at the PEP 621 list when it has entries', () => {
    const content = [
      '[project]',
      'name = "demo"',
      'dependencies = ["requests>=2.0"]',
      '',
      '[tool.poetry.dependencies]',
      'python = "^3.10"',
      'flask = "^2.0"'
    ].join('\n')

    const { manifest, notes } = extractPyprojectDependencies(content, SOURCE)

    expect(manifest.kind).toBe('pep621')
    expect(manifest.packages.map(p => p.name)).toEqual(['requests>=2.0'])
    expect(notes).toEqual(['Found PEP 621 dependencies', 'Dependencies extracted: requests>=2.0'])
  })

  it('should fall through an empty PEP 621 list to the Poetry table', () => {
    const content = [
      '[project]',
      'dependencies = []',
      '',
      '[tool.poetry.dependencies]',
      'python = "^3.10"',
      'flask = "^2.0"',
      'python-dateutil = "*"'
    ].join('\n')

    const { manifest, notes } = extractPyprojectDependencies(content, SOURCE)

    expect(manifest.kind).toBe('poetry')
    expect(manifest.packages.map(p => p.name)).toEqual(['flask', 'python-dateutil'])
    expect(notes[0]).toBe('Found Poetry dependencies')
  })

  it('should read a top-level dependencies table last', () => {
    const content = '[dependencies]\nnumpy = "*"\nPython = "3.11"\n'

    const { manifest, notes } = extractPyprojectDependencies(content, SOURCE)

    expect(manifest.kind).toBe('direct-table')
    expect(manifest.packages).toEqual([{ name: 'numpy', rawLine: 'numpy' }])
    expect(notes).toEqual(['Found direct dependencies', 'Dependencies extracted: numpy'])
  })

  it('should drop the runtime entry from PEP 621 lists too', () => {
    const content = '[project]\ndependencies = ["python>=3.9", "attrs"]\n'

    const { manifest } = extractPyprojectDependencies(content, SOURCE)

    expect(manifest.packages.map(p => p.name)).toEqual(['attrs'])
  })

  it('should report when no schema yields dependencies', () => {
    const content = '[project]\nname = "empty"\n\n[tool.poetry.dependencies]\npython = "^3.10"\n'

    const { manifest, notes } = extractPyprojectDependencies(content, SOURCE)

    expect(manifest.kind).toBeNull()
    expect(manifest.packages).toEqual([])
    expect(notes).toEqual(['No dependencies found in pyproject.toml'])
  })

  it('should record parse errors instead of throwing', () => {
    const { manifest, notes } = extractPyprojectDependencies('[project\nname = ', SOURCE)

    expect(manifest.kind).toBeNull()
    expect(manifest.packages).toEqual([])
    expect(notes).toHaveLength(1)
    expect(notes[0].startsWith('Error processing pyproject.toml: ')).toBe(true)
  })

  it('should ignore a malformed dependencies value', () => {
    const content = '[project]\ndependencies = "requests"\n'

    const { notes } = extractPyprojectDependencies(content, SOURCE)

    expect(notes).toEqual(['No dependencies found in pyproject.toml'])
  })
})

describe('distributionName', () => {
  it('should strip extras, versions and markers', () => {
    expect(distributionName('requests[socks]>=2.0; python_version>"3"')).toBe('requests')
    expect(distributionName('  python ')).toBe('python')
    expect(distributionName('>=1.0')).toBe('')
  })
})
