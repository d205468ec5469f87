export interface TestResultsBuild {
  kind: "test-results"
  name: string
  junit: string[]
  cucumber: string[]
}

export interface SbomFileSpec {
  pattern: string
  /** SBOM flavour, e.g. `cyclonedx` or `spdx`. */
  format: string
}

export interface SbomBuild {
  kind: "sbom"
  name: string
  files: SbomFileSpec[]
}

/** An entry whose `type` this tool does not handle; skipped with a warning. */
export interface UnknownBuild {
  kind: "unknown"
  name: string
  type: string
}

export type BuildDescriptor = TestResultsBuild | SbomBuild | UnknownBuild

export type BuildKind = BuildDescriptor["kind"]
