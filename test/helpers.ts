import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises"
import { createServer } from "node:http"
import { tmpdir } from "node:os"
import { dirname, join } from "node:path"

import { vi } from "vitest"

import type { ServiceConfig } from "../src/config.js"

export const makeTempDir = async (): Promise<string> => mkdtemp(join(tmpdir(), "ketryx-reporter-"))

export const cleanTempDir = async (dir: string): Promise<void> => {
  await rm(dir, { recursive: true, force: true })
}

export const writeFiles = async (root: string, files: Record<string, string>): Promise<void> => {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(root, relativePath)
    await mkdir(dirname(target), { recursive: true })
    await writeFile(target, content, "utf-8")
  }
}

export const makeServiceConfig = (overrides: Partial<ServiceConfig> = {}): ServiceConfig => ({
  baseUrl: "https://ketryx.test",
  projectId: "KXPRJ1",
  apiKey: "test-secret",
  commitSha: null,
  version: "1.0.0",
  source: { serverUrl: "https://github.com", repository: "acme/app" },
  ...overrides,
})

export interface UploadedFile {
  name: string
  type: string
  text: string
}

export interface RecordedRequest {
  url: string
  method: string
  headers: Headers
  /** Parsed JSON for JSON posts. */
  json: unknown
  /** The `file` part for multipart posts. */
  file: UploadedFile | null
}

export interface StubResponse {
  status: number
  body: string
}

const requestUrl = (input: string | URL | Request): string => {
  if (typeof input === "string") return input
  if (input instanceof URL) return input.toString()
  return input.url
}

const readJson = (body: unknown): unknown => {
  if (typeof body !== "string") return null
  const parsed: unknown = JSON.parse(body)
  return parsed
}

const readFilePart = async (body: unknown): Promise<UploadedFile | null> => {
  if (!(body instanceof FormData)) {
    return null
  }
  const entry = body.get("file")
  if (entry === null || typeof entry === "string") {
    return null
  }
  return { name: entry.name, type: entry.type, text: await entry.text() }
}

/**
 * Replaces the global `fetch` with a recorder answering through `respond`.
 * Callers restore it with `vi.unstubAllGlobals()`.
 */
export const stubFetch = (
  respond: (request: RecordedRequest, index: number) => StubResponse,
): RecordedRequest[] => {
  const requests: RecordedRequest[] = []
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const body = init?.body
    const request: RecordedRequest = {
      url: requestUrl(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      json: readJson(body),
      file: await readFilePart(body),
    }
    requests.push(request)
    const reply = respond(request, requests.length - 1)
    return new Response(reply.body, { status: reply.status })
  })
  vi.stubGlobal("fetch", fetchMock)
  return requests
}

export const ARTIFACTS_URL = "https://ketryx.test/api/v1/build-artifacts?project=KXPRJ1"
export const BUILDS_URL = "https://ketryx.test/api/v1/builds"

/** Answers uploads with `art-1`, `art-2`, ... and reports with `build-1`, `build-2`, ... */
export const serviceResponder = (): ((request: RecordedRequest) => StubResponse) => {
  let uploads = 0
  let reports = 0
  return (request) => {
    if (request.url === BUILDS_URL) {
      reports += 1
      return { status: 200, body: JSON.stringify({ buildId: `build-${reports}` }) }
    }
    uploads += 1
    return { status: 200, body: JSON.stringify({ id: `art-${uploads}` }) }
  }
}

export interface SilentServer {
  url: string
  close: () => Promise<void>
}

/**
 * Local HTTP server that accepts requests and never answers them, for
 * exercising requests cut off mid-flight. Runs inside the test process.
 */
export const startSilentServer = async (onRequest: () => void): Promise<SilentServer> => {
  const server = createServer(() => {
    onRequest()
  })
  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", resolve)
  })
  const address = server.address()
  if (address === null || typeof address === "string") {
    throw new Error("Server is not listening on a TCP port")
  }
  return {
    url: `http://127.0.0.1:${address.port}`,
    close: async () => {
      server.closeAllConnections()
      await new Promise<void>((resolve) => {
        server.close(() => {
          resolve()
        })
      })
    },
  }
}
