/**
 * Output mode detection for determining how to render CLI output.
 */

export type OutputMode = "tty" | "static" | "json";

/**
 * Detect the appropriate output mode based on environment and flags.
 *
 * - `tty`: Interactive terminal with a live spinner
 * - `static`: Plain line output (for CI, pipes, non-interactive)
 * - `json`: Structured JSON output for scripting
 */
export function getOutputMode(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true
): OutputMode {
  if (argv.includes("--json") || env.REGET_JSON === "1" || env.REGET_JSON === "true") {
    return "json";
  }

  if (env.CI || !isTTY || env.TERM === "dumb") {
    return "static";
  }

  return "tty";
}
