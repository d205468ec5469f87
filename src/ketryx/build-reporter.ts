import { z } from "zod"

import type { ServiceConfig } from "../config.js"
import { ReportError } from "../errors.js"
import { throwIfAborted } from "../utils/cancel.js"
import { bearerHeaders, httpPostJson, parseJsonBody } from "../utils/http.js"
import { BUILDS_PATH, type BuildReportPayload, type UploadedArtifact } from "./types.js"

const reportResponseSchema = z.object({
  buildId: z.union([z.string(), z.number()]).transform((id) => String(id)),
})

export interface BuildReporterOptions {
  signal?: AbortSignal
}

/**
 * Builds the record sent for one build. Exactly one of `version` and
 * `commitSha` is set when either is known; `version` wins.
 */
export const buildReportPayload = (
  config: ServiceConfig,
  buildName: string,
  artifacts: readonly UploadedArtifact[],
): BuildReportPayload => {
  const { serverUrl, repository } = config.source
  const payload: BuildReportPayload = {
    project: config.projectId,
    buildName,
    artifacts: [...artifacts],
    sourceUrl: serverUrl,
    repositoryUrls: [`${serverUrl}/${repository}`],
  }
  if (config.version) {
    payload.version = config.version
  } else if (config.commitSha) {
    payload.commitSha = config.commitSha
  }
  return payload
}

export class BuildReporter {
  constructor(
    private readonly config: ServiceConfig,
    private readonly options: BuildReporterOptions = {},
  ) {}

  /** Registers the build and returns the service-assigned build id. */
  async report(buildName: string, artifacts: readonly UploadedArtifact[]): Promise<string> {
    throwIfAborted(this.options.signal)
    const response = await httpPostJson(
      `${this.config.baseUrl}${BUILDS_PATH}`,
      buildReportPayload(this.config, buildName, artifacts),
      bearerHeaders(this.config.apiKey),
      this.options.signal,
    )
    if (response.status !== 200) {
      throw new ReportError(response.status, response.body)
    }

    const parsed = reportResponseSchema.safeParse(parseJsonBody(response.body))
    if (!parsed.success) {
      throw new ReportError(
        response.status,
        response.body,
        `Failed to report build: response has no build id: ${response.body}`,
      )
    }
    return parsed.data.buildId
  }
}
