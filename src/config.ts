import { config as loadDotEnv } from "dotenv"
import { z } from "zod"

import { EnvironmentError } from "./errors.js"

export interface EnvConfig {
  ketryxUrl: string | null
  ketryxProject: string | null
  ketryxApiKey: string | null
  ketryxVersion: string | null
  githubSha: string | null
  githubServerUrl: string | null
  githubRepository: string | null
}

/** Where the build ran; both parts may be empty outside CI. */
export interface SourceContext {
  serverUrl: string
  repository: string
}

export interface ServiceConfig {
  readonly baseUrl: string
  readonly projectId: string
  readonly apiKey: string
  readonly commitSha: string | null
  readonly version: string | null
  readonly source: SourceContext
}

/** Loads `.env` from the working directory; variables already set win. */
export const loadEnvFile = (): void => {
  loadDotEnv()
}

const nonEmpty = (value: string | undefined): string | null =>
  value === undefined || value.trim() === "" ? null : value

export const readEnvConfig = (env: NodeJS.ProcessEnv = process.env): EnvConfig => ({
  ketryxUrl: nonEmpty(env.KETRYX_URL),
  ketryxProject: nonEmpty(env.KETRYX_PROJECT),
  ketryxApiKey: nonEmpty(env.KETRYX_API_KEY),
  ketryxVersion: nonEmpty(env.KETRYX_VERSION),
  githubSha: nonEmpty(env.GITHUB_SHA),
  githubServerUrl: nonEmpty(env.GITHUB_SERVER_URL),
  githubRepository: nonEmpty(env.GITHUB_REPOSITORY),
})

const REQUIRED_VARIABLES = [
  ["ketryxUrl", "KETRYX_URL"],
  ["ketryxProject", "KETRYX_PROJECT"],
  ["ketryxApiKey", "KETRYX_API_KEY"],
  ["ketryxVersion", "KETRYX_VERSION"],
] as const

const serviceEnvSchema = z.object({
  ketryxUrl: z.string().url(),
  ketryxProject: z.string(),
  ketryxApiKey: z.string(),
  ketryxVersion: z.string(),
  githubSha: z.string().nullable(),
  githubServerUrl: z.string().nullable(),
  githubRepository: z.string().nullable(),
})

export const resolveServiceConfig = (env: EnvConfig): ServiceConfig => {
  const missing = REQUIRED_VARIABLES.filter(([key]) => env[key] === null).map(([, name]) => name)
  if (missing.length > 0) {
    throw new EnvironmentError(missing)
  }

  const parsed = serviceEnvSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const key = issue.path[0]
    const variable = REQUIRED_VARIABLES.find(([field]) => field === key)?.[1] ?? String(key)
    throw new EnvironmentError([], `Invalid environment variable ${variable}: ${issue.message}`)
  }

  return {
    baseUrl: parsed.data.ketryxUrl.replace(/\/+$/, ""),
    projectId: parsed.data.ketryxProject,
    apiKey: parsed.data.ketryxApiKey,
    commitSha: parsed.data.githubSha,
    version: parsed.data.ketryxVersion,
    source: {
      serverUrl: parsed.data.githubServerUrl ?? "",
      repository: parsed.data.githubRepository ?? "",
    },
  }
}
