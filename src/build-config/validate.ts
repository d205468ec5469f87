import { MissingFileError, type MissingFile, type MissingFileCategory } from "../errors.js"
import { expandPattern, type ExpandOptions } from "../utils/glob.js"
import type { BuildDescriptor } from "./types.js"

interface PatternCheck {
  category: MissingFileCategory
  pattern: string
}

const patternsOf = (build: BuildDescriptor): PatternCheck[] => {
  switch (build.kind) {
    case "test-results":
      return [
        ...build.junit.map((pattern): PatternCheck => ({ category: "JUnit", pattern })),
        ...build.cucumber.map((pattern): PatternCheck => ({ category: "Cucumber", pattern })),
      ]
    case "sbom":
      return build.files.map((file): PatternCheck => ({ category: "SBOM", pattern: file.pattern }))
    case "unknown":
      return []
  }
}

/**
 * Expands every pattern of every build and lists the ones matching nothing.
 * Touches only the filesystem; the whole config is scanned before returning.
 */
export const findMissingFiles = async (
  builds: readonly BuildDescriptor[],
  options: ExpandOptions = {},
): Promise<MissingFile[]> => {
  const missing: MissingFile[] = []
  for (const build of builds) {
    for (const check of patternsOf(build)) {
      const matches = await expandPattern(check.pattern, options)
      if (matches.length === 0) {
        missing.push({ buildName: build.name, ...check })
      }
    }
  }
  return missing
}

export const assertNoMissingFiles = (missing: readonly MissingFile[]): void => {
  if (missing.length > 0) {
    throw new MissingFileError(missing)
  }
}
