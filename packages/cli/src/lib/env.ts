/**
 * Environment and configuration resolution
 */

/**
 * Check if running in verbose mode
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.BOOKSHELF_CLI_DEBUG === "1";
}
