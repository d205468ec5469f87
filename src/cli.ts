#!/usr/bin/env node
import { Command } from "commander"
import { z } from "zod"

import { loadBuildConfig } from "./build-config/load.js"
import { assertNoMissingFiles, findMissingFiles } from "./build-config/validate.js"
import { loadEnvFile, readEnvConfig, resolveServiceConfig, type ServiceConfig } from "./config.js"
import { MissingFileError, getErrorMessage } from "./errors.js"
import { ArtifactUploader } from "./ketryx/artifact-uploader.js"
import { BuildReporter } from "./ketryx/build-reporter.js"
import { runBuilds, type VerboseLog } from "./pipeline/run-builds.js"
import { createRenderer, defaultRendererMode, type CliRenderer } from "./rendering/index.js"
import { cancelRun, isCancellationError } from "./utils/cancel.js"

interface CliOptions {
  configFile: string
  verbose: boolean
  plain: boolean
}

const createProgram = (): Command => {
  const program = new Command()
  program
    .name("ketryx-build-reporter")
    .description("Upload build artifacts to Ketryx and report the builds that reference them")
    .argument("<config-file>", "Path to the YAML build configuration")
    .option("--verbose", "Show detailed timing logs", false)
    .option("--plain", "Plain line output, no colours or spinners", false)
  return program
}

const cliOptionsSchema = z.object({
  configFile: z.string().min(1),
  verbose: z.boolean().default(false),
  plain: z.boolean().default(false),
})

const parseOptions = (program: Command): CliOptions => {
  const opts = program.opts<Record<string, unknown>>()
  const parsed = cliOptionsSchema.safeParse({
    configFile: program.args[0],
    verbose: opts["verbose"] ?? false,
    plain: opts["plain"] ?? false,
  })
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue.path.join(".")
    throw new Error(`Invalid option${path ? ` (${path})` : ""}: ${issue.message}`)
  }
  return parsed.data
}

const describeReference = (config: ServiceConfig): string | null => {
  if (config.version) return `version ${config.version}`
  if (config.commitSha) return `commit ${config.commitSha}`
  return null
}

interface SigintCancellationHandle {
  signal: AbortSignal
  dispose: () => void
}

const setupSigintCancellation = (renderer: CliRenderer): SigintCancellationHandle => {
  const controller = new AbortController()
  let sigintCount = 0
  const onSigint = () => {
    sigintCount += 1
    if (sigintCount === 1) {
      renderer.warn("\nInterrupted (CTRL+C). Stopping current upload...")
      cancelRun(controller)
      return
    }
    renderer.error("Force exit requested.")
    process.exit(130)
  }
  process.on("SIGINT", onSigint)
  return {
    signal: controller.signal,
    dispose: () => process.off("SIGINT", onSigint),
  }
}

// ── Main ────────────────────────────────────────────────────────────

const main = async (): Promise<number> => {
  const startedAt = Date.now()
  const program = createProgram()
  program.parse(process.argv)
  const options = parseOptions(program)
  const renderer = createRenderer(options.plain ? "plain" : defaultRendererMode())

  loadEnvFile()
  const config = resolveServiceConfig(readEnvConfig())

  const builds = await loadBuildConfig(options.configFile)
  try {
    assertNoMissingFiles(await findMissingFiles(builds))
  } catch (error) {
    if (error instanceof MissingFileError) {
      renderer.missingFiles(error.missing)
      return 1
    }
    throw error
  }

  renderer.header({
    configPath: options.configFile,
    baseUrl: config.baseUrl,
    projectId: config.projectId,
    buildCount: builds.length,
    reference: describeReference(config),
  })

  const verboseLog: VerboseLog | undefined = options.verbose
    ? (scope, message) => {
        renderer.logVerbose(scope, message, (Date.now() - startedAt) / 1000)
      }
    : undefined

  const { signal, dispose } = setupSigintCancellation(renderer)
  try {
    const reported = await runBuilds({
      builds,
      uploader: new ArtifactUploader(config, { signal, listener: renderer }),
      reporter: new BuildReporter(config, { signal }),
      renderer,
      verbose: verboseLog,
      signal,
    })
    renderer.runComplete(reported, Math.round((Date.now() - startedAt) / 1000))
    return 0
  } catch (error) {
    if (signal.aborted && isCancellationError(error, signal)) {
      renderer.warn("Run cancelled by user.")
      return 130
    }
    throw error
  } finally {
    dispose()
  }
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error(`Error: ${getErrorMessage(error)}`)
    process.exitCode = 1
  })
