import { open } from "node:fs/promises"
import { basename, resolve } from "node:path"

import { z } from "zod"

import type { ServiceConfig } from "../config.js"
import { ConfigError, UploadError, type MissingFileCategory } from "../errors.js"
import { throwIfAborted } from "../utils/cancel.js"
import { expandPattern } from "../utils/glob.js"
import { bearerHeaders, httpPostForm, parseJsonBody } from "../utils/http.js"
import { ARTIFACTS_PATH, type ArtifactType, type UploadListener, type UploadedArtifact } from "./types.js"

const JUNIT_CONTENT_TYPE = "application/xml"
const JSON_CONTENT_TYPE = "application/json"

const uploadResponseSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((id) => String(id)),
})

export interface ArtifactUploaderOptions {
  /** Base directory for relative paths and patterns. Defaults to `process.cwd()`. */
  cwd?: string
  signal?: AbortSignal
  listener?: UploadListener
}

const readWholeFile = async (filePath: string): Promise<Buffer> => {
  const handle = await open(filePath, "r")
  try {
    return await handle.readFile()
  } finally {
    await handle.close()
  }
}

export class ArtifactUploader {
  private readonly cwd: string

  constructor(
    private readonly config: ServiceConfig,
    private readonly options: ArtifactUploaderOptions = {},
  ) {
    this.cwd = options.cwd ?? process.cwd()
  }

  private uploadUrl(): string {
    const url = new URL(`${this.config.baseUrl}${ARTIFACTS_PATH}`)
    url.searchParams.set("project", this.config.projectId)
    return url.toString()
  }

  /** Sends one file and returns the id the service assigned to it. */
  async upload(filePath: string, contentType: string): Promise<string> {
    throwIfAborted(this.options.signal)
    const data = await readWholeFile(resolve(this.cwd, filePath))

    const form = new FormData()
    form.append("file", new Blob([data], { type: contentType }), basename(filePath))

    const response = await httpPostForm(
      this.uploadUrl(),
      form,
      bearerHeaders(this.config.apiKey),
      this.options.signal,
    )
    if (response.status !== 200) {
      throw new UploadError(response.status, response.body)
    }

    const parsed = uploadResponseSchema.safeParse(parseJsonBody(response.body))
    if (!parsed.success) {
      throw new UploadError(
        response.status,
        response.body,
        `Failed to upload artifact: response has no artifact id: ${response.body}`,
      )
    }
    return parsed.data.id
  }

  // A pattern checked before the run can stop matching if files go away meanwhile.
  private async expandOrFail(pattern: string, category: MissingFileCategory): Promise<string[]> {
    const matches = await expandPattern(pattern, { cwd: this.cwd })
    if (matches.length === 0) {
      throw new ConfigError(`${category} file not found: ${pattern}`)
    }
    return matches
  }

  private async uploadMatches(
    patterns: readonly string[],
    category: MissingFileCategory,
    contentType: string,
    type: ArtifactType,
  ): Promise<UploadedArtifact[]> {
    const listener = this.options.listener
    const artifacts: UploadedArtifact[] = []
    for (const pattern of patterns) {
      for (const filePath of await this.expandOrFail(pattern, category)) {
        listener?.uploadStarted?.(filePath, contentType)
        let id: string
        try {
          id = await this.upload(filePath, contentType)
        } catch (error) {
          listener?.uploadFailed?.(filePath, error)
          throw error
        }
        const artifact: UploadedArtifact = { id, type }
        listener?.uploadFinished?.(filePath, artifact)
        artifacts.push(artifact)
      }
    }
    return artifacts
  }

  /** Uploads every JUnit match, then every Cucumber match, each group in pattern order. */
  async uploadTestResults(
    junitPatterns: readonly string[],
    cucumberPatterns: readonly string[],
  ): Promise<UploadedArtifact[]> {
    const junit = await this.uploadMatches(junitPatterns, "JUnit", JUNIT_CONTENT_TYPE, "junit-xml")
    const cucumber = await this.uploadMatches(
      cucumberPatterns,
      "Cucumber",
      JSON_CONTENT_TYPE,
      "cucumber-json",
    )
    return [...junit, ...cucumber]
  }

  async uploadSbom(patterns: readonly string[], sbomFormat: string): Promise<UploadedArtifact[]> {
    return this.uploadMatches(patterns, "SBOM", JSON_CONTENT_TYPE, `${sbomFormat}-json`)
  }
}
