import type { BuildKind } from "../build-config/types.js"
import { formatMissingFile, getErrorMessage, type MissingFile } from "../errors.js"
import type { ReportedBuild, UploadedArtifact } from "../ketryx/types.js"
import type { CliRenderer, RunHeader } from "./types.js"

export class PlainRenderer implements CliRenderer {
  header(info: RunHeader): void {
    console.log("=== Ketryx Build Report ===")
    console.log(`Config:   ${info.configPath}`)
    console.log(`Service:  ${info.baseUrl}`)
    console.log(`Project:  ${info.projectId}`)
    console.log(`Builds:   ${info.buildCount}`)
    console.log(`Ref:      ${info.reference ?? "none"}`)
    console.log("")
  }

  missingFiles(missing: readonly MissingFile[]): void {
    console.error("")
    console.error("Missing files:")
    for (const entry of missing) {
      console.error(`  - ${formatMissingFile(entry)}`)
    }
  }

  buildStarted(name: string, kind: BuildKind): void {
    console.log(`[${name}] ${kind}`)
  }

  uploadStarted(filePath: string, contentType: string): void {
    console.log(`  Uploading ${filePath} (${contentType})`)
  }

  uploadFinished(filePath: string, artifact: UploadedArtifact): void {
    console.log(`  Uploaded ${filePath} -> ${artifact.id} (${artifact.type})`)
  }

  uploadFailed(filePath: string, error: unknown): void {
    console.log(`  Failed ${filePath}: ${getErrorMessage(error)}`)
  }

  buildReported(build: ReportedBuild): void {
    console.log(`Reported ${build.buildName} to Ketryx: ${build.buildId}`)
  }

  unknownBuildType(_name: string, type: string): void {
    console.warn(`Warning: Unknown build type '${type}'`)
  }

  logVerbose(scope: string, message: string, elapsedSec: number): void {
    console.log(`[+${elapsedSec.toFixed(2)}s] [${scope}] ${message}`)
  }

  runComplete(reported: readonly ReportedBuild[], elapsedSeconds: number): void {
    console.log("")
    console.log("=== Done ===")
    console.log(`Duration: ${elapsedSeconds}s`)
    for (const build of reported) {
      console.log(`  ${build.buildName.padEnd(28)} ${build.buildId}`)
    }
  }

  warn(message: string): void {
    console.warn(message)
  }

  error(message: string): void {
    console.error(message)
  }
}
