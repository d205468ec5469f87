export type MissingFileCategory = "JUnit" | "Cucumber" | "SBOM"

export interface MissingFile {
  buildName: string
  category: MissingFileCategory
  pattern: string
}

export const formatMissingFile = (entry: MissingFile): string =>
  `${entry.category} file not found: ${entry.pattern}`

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConfigError"
  }
}

/** Carries every unmatched pattern found across the whole build config. */
export class MissingFileError extends Error {
  constructor(readonly missing: readonly MissingFile[]) {
    super(`Missing files:\n${missing.map((entry) => `  - ${formatMissingFile(entry)}`).join("\n")}`)
    this.name = "MissingFileError"
  }
}

export class UploadError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    message = `Failed to upload artifact: ${body}`,
  ) {
    super(message)
    this.name = "UploadError"
  }
}

export class ReportError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    message = `Failed to report build: ${body}`,
  ) {
    super(message)
    this.name = "ReportError"
  }
}

export class EnvironmentError extends Error {
  constructor(
    readonly missing: readonly string[],
    message = `Missing required environment variables: ${missing.join(", ")}`,
  ) {
    super(message)
    this.name = "EnvironmentError"
  }
}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
