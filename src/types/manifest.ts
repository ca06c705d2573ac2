/**
 * Dependency manifest schema dialects
 */
export type ManifestKind = 'requirements-txt' | 'pep621' | 'poetry' | 'direct-table'

/**
 * Manifest files probed in the project root, in priority order
 */
export type ManifestFileName = 'requirements.txt' | 'pyproject.toml'

/**
 * A dependency extracted from a manifest
 */
export interface PackageRef {
  /** Dependency name or full specifier, as the scanners will read it */
  name: string

  /** Line or key the entry came from */
  rawLine: string
}

/**
 * Dependencies declared by one manifest file
 */
export interface ProjectManifest {
  /** Schema that produced the packages, null when none matched */
  kind: ManifestKind | null

  /** Absolute path of the manifest file */
  sourcePath: string

  /** Packages in declaration order */
  packages: readonly PackageRef[]
}

/**
 * Outcome of looking for one manifest file
 */
export type ManifestProbe =
  | {
      fileName: ManifestFileName
      found: false
    }
  | {
      fileName: ManifestFileName
      found: true
      /** Raw file content, captured verbatim for the report */
      content: string
      manifest: ProjectManifest
      /** Extraction log lines recorded in the report */
      notes: string[]
      /** File handed to the scanners; absent when nothing can be scanned */
      scanInput?: string
    }
