import type { BuildKind } from "../build-config/types.js"
import type { MissingFile } from "../errors.js"
import type { ReportedBuild, UploadListener, UploadedArtifact } from "../ketryx/types.js"

export type RendererMode = "interactive" | "plain"

export interface RunHeader {
  configPath: string
  baseUrl: string
  projectId: string
  buildCount: number
  /** `version 1.2.0` or `commit abc123`, whichever the build records carry. */
  reference: string | null
}

export interface CliRenderer extends UploadListener {
  // --- Setup ---
  header(info: RunHeader): void
  missingFiles(missing: readonly MissingFile[]): void

  // --- Per build ---
  buildStarted(name: string, kind: BuildKind): void
  uploadStarted(filePath: string, contentType: string): void
  uploadFinished(filePath: string, artifact: UploadedArtifact): void
  uploadFailed(filePath: string, error: unknown): void
  buildReported(build: ReportedBuild): void
  unknownBuildType(name: string, type: string): void

  // --- General ---
  logVerbose(scope: string, message: string, elapsedSec: number): void
  runComplete(reported: readonly ReportedBuild[], elapsedSeconds: number): void
  warn(message: string): void
  error(message: string): void
}
