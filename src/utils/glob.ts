import { glob } from "glob"

export interface ExpandOptions {
  cwd?: string
}

/**
 * Expands one pattern into the files it matches, relative to `cwd`. Directories
 * are never returned. Matches come back sorted so repeated runs upload in the
 * same order.
 */
export const expandPattern = async (pattern: string, options: ExpandOptions = {}): Promise<string[]> => {
  const matches = await glob(pattern, {
    cwd: options.cwd ?? process.cwd(),
    nodir: true,
    absolute: false,
    posix: true,
  })
  return matches.sort()
}
