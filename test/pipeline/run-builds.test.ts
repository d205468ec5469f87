import { afterEach, describe, expect, it, vi } from "vitest"

import type { BuildDescriptor } from "../../src/build-config/types.js"
import { UploadError } from "../../src/errors.js"
import { ArtifactUploader } from "../../src/ketryx/artifact-uploader.js"
import { BuildReporter } from "../../src/ketryx/build-reporter.js"
import { runBuilds } from "../../src/pipeline/run-builds.js"
import { CancellationError, SIGINT_REASON, cancelRun } from "../../src/utils/cancel.js"
import {
  BUILDS_URL,
  cleanTempDir,
  makeServiceConfig,
  makeTempDir,
  serviceResponder,
  stubFetch,
  writeFiles,
  type RecordedRequest,
} from "../helpers.js"

afterEach(() => {
  vi.unstubAllGlobals()
})

const makeRenderer = () => ({
  buildStarted: vi.fn(),
  buildReported: vi.fn(),
  unknownBuildType: vi.fn(),
})

const makeServices = (cwd: string) => {
  const config = makeServiceConfig()
  return {
    uploader: new ArtifactUploader(config, { cwd }),
    reporter: new BuildReporter(config),
  }
}

const describeRequest = (request: RecordedRequest): string =>
  request.url === BUILDS_URL ? "report" : `upload ${request.file?.name ?? "?"}`

describe("runBuilds", () => {
  it("uploads one junit file and reports one build", async () => {
    const dir = await makeTempDir()

    try {
      await writeFiles(dir, { "out/a.xml": "<testsuite/>" })
      const requests = stubFetch(serviceResponder())
      const renderer = makeRenderer()

      const reported = await runBuilds({
        builds: [{ kind: "test-results", name: "ci-build", junit: ["out/*.xml"], cucumber: [] }],
        ...makeServices(dir),
        renderer,
      })

      expect(reported).toEqual([{ buildName: "ci-build", buildId: "build-1" }])
      expect(requests).toHaveLength(2)
      expect(requests[0].file?.type).toBe("application/xml")
      expect(requests[1].url).toBe(BUILDS_URL)
      expect(requests[1].json).toMatchObject({
        buildName: "ci-build",
        artifacts: [{ id: "art-1", type: "junit-xml" }],
      })
      expect(renderer.buildReported).toHaveBeenCalledWith({ buildName: "ci-build", buildId: "build-1" })
    } finally {
      await cleanTempDir(dir)
    }
  })

  it("finishes each build before starting the next", async () => {
    const dir = await makeTempDir()

    try {
      await writeFiles(dir, {
        "one/junit.xml": "<one/>",
        "one/cucumber.json": "[]",
        "two/junit.xml": "<two/>",
      })
      const requests = stubFetch(serviceResponder())

      await runBuilds({
        builds: [
          { kind: "test-results", name: "first", junit: ["one/*.xml"], cucumber: ["one/*.json"] },
          { kind: "test-results", name: "second", junit: ["two/*.xml"], cucumber: [] },
        ],
        ...makeServices(dir),
        renderer: makeRenderer(),
      })

      expect(requests.map(describeRequest)).toEqual([
        "upload junit.xml",
        "upload cucumber.json",
        "report",
        "upload junit.xml",
        "report",
      ])
      expect(requests[2].json).toMatchObject({
        buildName: "first",
        artifacts: [
          { id: "art-1", type: "junit-xml" },
          { id: "art-2", type: "cucumber-json" },
        ],
      })
      expect(requests[4].json).toMatchObject({
        buildName: "second",
        artifacts: [{ id: "art-3", type: "junit-xml" }],
      })
    } finally {
      await cleanTempDir(dir)
    }
  })

  it("reports all sbom entries of a build in one record", async () => {
    const dir = await makeTempDir()

    try {
      await writeFiles(dir, { "sbom/app.cdx.json": "{}", "sbom/app.spdx.json": "{}" })
      const requests = stubFetch(serviceResponder())

      await runBuilds({
        builds: [
          {
            kind: "sbom",
            name: "bom",
            files: [
              { pattern: "sbom/app.cdx.json", format: "cyclonedx" },
              { pattern: "sbom/app.spdx.json", format: "spdx" },
            ],
          },
        ],
        ...makeServices(dir),
        renderer: makeRenderer(),
      })

      const reports = requests.filter((request) => request.url === BUILDS_URL)
      expect(reports).toHaveLength(1)
      expect(reports[0].json).toMatchObject({
        buildName: "bom",
        artifacts: [
          { id: "art-1", type: "cyclonedx-json" },
          { id: "art-2", type: "spdx-json" },
        ],
      })
    } finally {
      await cleanTempDir(dir)
    }
  })

  it("warns about unknown build types and keeps going", async () => {
    const dir = await makeTempDir()

    try {
      await writeFiles(dir, { "out/a.xml": "<a/>" })
      const requests = stubFetch(serviceResponder())
      const renderer = makeRenderer()
      const builds: BuildDescriptor[] = [
        { kind: "unknown", name: "mystery", type: "unknown-type" },
        { kind: "test-results", name: "unit", junit: ["out/*.xml"], cucumber: [] },
      ]

      const reported = await runBuilds({ builds, ...makeServices(dir), renderer })

      expect(renderer.unknownBuildType).toHaveBeenCalledWith("mystery", "unknown-type")
      expect(renderer.buildStarted).toHaveBeenCalledTimes(1)
      expect(renderer.buildStarted).toHaveBeenCalledWith("unit", "test-results")
      expect(reported).toEqual([{ buildName: "unit", buildId: "build-1" }])
      expect(requests.filter((request) => request.url === BUILDS_URL)).toHaveLength(1)
    } finally {
      await cleanTempDir(dir)
    }
  })

  it("stops the run on a failed upload without reporting", async () => {
    const dir = await makeTempDir()

    try {
      await writeFiles(dir, { "one/a.xml": "<a/>", "two/b.xml": "<b/>" })
      const requests = stubFetch(() => ({ status: 503, body: "service unavailable" }))
      const renderer = makeRenderer()

      await expect(
        runBuilds({
          builds: [
            { kind: "test-results", name: "first", junit: ["one/*.xml"], cucumber: [] },
            { kind: "test-results", name: "second", junit: ["two/*.xml"], cucumber: [] },
          ],
          ...makeServices(dir),
          renderer,
        }),
      ).rejects.toThrow(new UploadError(503, "service unavailable"))

      expect(requests).toHaveLength(1)
      expect(requests[0].url).not.toBe(BUILDS_URL)
      expect(renderer.buildReported).not.toHaveBeenCalled()
    } finally {
      await cleanTempDir(dir)
    }
  })

  it("does not start once the signal is aborted", async () => {
    const requests = stubFetch(serviceResponder())
    const controller = new AbortController()
    cancelRun(controller)

    await expect(
      runBuilds({
        builds: [{ kind: "test-results", name: "unit", junit: ["out/*.xml"], cucumber: [] }],
        ...makeServices(process.cwd()),
        renderer: makeRenderer(),
        signal: controller.signal,
      }),
    ).rejects.toThrow(new CancellationError(SIGINT_REASON))
    expect(requests).toHaveLength(0)
  })
})
