/**
 * Global CLI context for shared flags.
 * Parsed once from argv and the environment before commands run.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress lines */
  quiet: boolean;
  /** Explicit config file passed with --config */
  configPath?: string;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function isTruthy(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json") || isTruthy(env.REGET_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q") || isTruthy(env.REGET_QUIET)) {
    currentContext.quiet = true;
  }

  const configIdx = argv.findIndex((arg) => arg === "--config" || arg === "-c");
  const configValue = configIdx === -1 ? undefined : argv[configIdx + 1];
  if (configValue && !configValue.startsWith("-")) {
    currentContext.configPath = configValue;
  } else if (env.REGET_CONFIG) {
    currentContext.configPath = env.REGET_CONFIG;
  }

  return currentContext;
}

export function getContext(): CLIContext {
  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
