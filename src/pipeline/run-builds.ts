import type { BuildDescriptor, SbomBuild, TestResultsBuild } from "../build-config/types.js"
import type { ArtifactUploader } from "../ketryx/artifact-uploader.js"
import type { BuildReporter } from "../ketryx/build-reporter.js"
import type { ReportedBuild, UploadedArtifact } from "../ketryx/types.js"
import type { CliRenderer } from "../rendering/types.js"
import { throwIfAborted } from "../utils/cancel.js"

export type VerboseLog = (scope: string, message: string) => void

export interface RunBuildsArgs {
  builds: readonly BuildDescriptor[]
  uploader: Pick<ArtifactUploader, "uploadTestResults" | "uploadSbom">
  reporter: Pick<BuildReporter, "report">
  renderer: Pick<CliRenderer, "buildStarted" | "buildReported" | "unknownBuildType">
  verbose?: VerboseLog
  signal?: AbortSignal
}

/** Every SBOM entry of a build lands in the same record. */
const uploadBuildArtifacts = async (
  build: TestResultsBuild | SbomBuild,
  uploader: RunBuildsArgs["uploader"],
): Promise<UploadedArtifact[]> => {
  switch (build.kind) {
    case "test-results":
      return uploader.uploadTestResults(build.junit, build.cucumber)
    case "sbom": {
      const artifacts: UploadedArtifact[] = []
      for (const file of build.files) {
        artifacts.push(...(await uploader.uploadSbom([file.pattern], file.format)))
      }
      return artifacts
    }
  }
}

/**
 * Processes builds strictly in order: upload, then report, then the next build.
 * The first upload or report failure ends the run; nothing already sent is undone.
 */
export const runBuilds = async (args: RunBuildsArgs): Promise<ReportedBuild[]> => {
  const { builds, uploader, reporter, renderer, verbose, signal } = args
  const reported: ReportedBuild[] = []

  for (const build of builds) {
    throwIfAborted(signal)
    if (build.kind === "unknown") {
      renderer.unknownBuildType(build.name, build.type)
      continue
    }

    renderer.buildStarted(build.name, build.kind)
    const artifacts = await uploadBuildArtifacts(build, uploader)
    verbose?.(build.name, `uploaded ${artifacts.length} artifact(s), reporting build`)

    const buildId = await reporter.report(build.name, artifacts)
    const result: ReportedBuild = { buildName: build.name, buildId }
    renderer.buildReported(result)
    reported.push(result)
  }

  return reported
}
