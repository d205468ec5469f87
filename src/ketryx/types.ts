export type ArtifactType = "junit-xml" | "cucumber-json" | `${string}-json`

/** Reference to a file already stored by the service, as listed in a build record. */
export interface UploadedArtifact {
  id: string
  type: ArtifactType
}

export interface BuildReportPayload {
  project: string
  buildName: string
  artifacts: UploadedArtifact[]
  sourceUrl: string
  repositoryUrls: string[]
  version?: string
  commitSha?: string
}

export interface ReportedBuild {
  buildName: string
  buildId: string
}

export interface UploadListener {
  uploadStarted?: (filePath: string, contentType: string) => void
  uploadFinished?: (filePath: string, artifact: UploadedArtifact) => void
  uploadFailed?: (filePath: string, error: unknown) => void
}

export const ARTIFACTS_PATH = "/api/v1/build-artifacts"
export const BUILDS_PATH = "/api/v1/builds"
