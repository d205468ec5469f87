import { readFile } from "node:fs/promises"

import yaml from "js-yaml"
import { z } from "zod"

import { ConfigError, getErrorMessage } from "../errors.js"
import type { BuildDescriptor } from "./types.js"

const rawBuildSchema = z.object({
  name: z
    .union([z.string().min(1), z.number()])
    .transform((name) => String(name)),
  type: z.string(),
  artifacts: z.unknown().optional(),
})

const buildConfigSchema = z.object({
  builds: z.array(rawBuildSchema),
})

const testResultsArtifactsSchema = z.object({
  junit: z.array(z.string()).nullish(),
  cucumber: z.array(z.string()).nullish(),
})

const sbomArtifactsSchema = z.array(
  z.object({
    file: z.string(),
    type: z.string(),
  }),
)

type RawBuild = z.infer<typeof rawBuildSchema>

const describeIssue = (error: z.ZodError, prefix: string): string => {
  const issue = error.issues[0]
  const path = [prefix, ...issue.path.map(String)].filter(Boolean).join(".")
  return `${issue.message} (path: ${path || "$"})`
}

const toDescriptor = (build: RawBuild, index: number, source: string): BuildDescriptor => {
  const where = `builds.${index}.artifacts`

  if (build.type === "test-results") {
    const parsed = testResultsArtifactsSchema.safeParse(build.artifacts ?? {})
    if (!parsed.success) {
      throw new ConfigError(`Invalid config file ${source}: ${describeIssue(parsed.error, where)}`)
    }
    return {
      kind: "test-results",
      name: build.name,
      junit: parsed.data.junit ?? [],
      cucumber: parsed.data.cucumber ?? [],
    }
  }

  if (build.type === "sbom") {
    const parsed = sbomArtifactsSchema.safeParse(build.artifacts ?? [])
    if (!parsed.success) {
      throw new ConfigError(`Invalid config file ${source}: ${describeIssue(parsed.error, where)}`)
    }
    return {
      kind: "sbom",
      name: build.name,
      files: parsed.data.map((entry) => ({ pattern: entry.file, format: entry.type })),
    }
  }

  return { kind: "unknown", name: build.name, type: build.type }
}

/**
 * Parses the YAML text of a build config. `source` only labels error messages.
 */
export const parseBuildConfig = (text: string, source = "<inline>"): BuildDescriptor[] => {
  let raw: unknown
  try {
    raw = yaml.load(text)
  } catch (error) {
    throw new ConfigError(`Invalid config file ${source}: ${getErrorMessage(error)}`)
  }

  if (typeof raw !== "object" || raw === null || !("builds" in raw)) {
    throw new ConfigError("Invalid config file: missing 'builds' section")
  }

  const parsed = buildConfigSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${source}: ${describeIssue(parsed.error, "")}`)
  }

  return parsed.data.builds.map((build, index) => toDescriptor(build, index, source))
}

export const loadBuildConfig = async (path: string): Promise<BuildDescriptor[]> => {
  let text: string
  try {
    text = await readFile(path, "utf-8")
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new ConfigError(`Config file not found: ${path}`)
    }
    throw new ConfigError(`Unable to read config file ${path}: ${getErrorMessage(error)}`)
  }
  return parseBuildConfig(text, path)
}
