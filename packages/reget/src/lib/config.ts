import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir, tmpdir } from "os";
import { join, resolve } from "path";
import { invalidConfig } from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";
import type { LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path */
export const SYSTEM_CONFIG_PATH = "/etc/reget/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "reget", "config.yaml");

/** Default values for options that don't depend on the working directory */
export const CONFIG_DEFAULTS = {
  tempDir: join(tmpdir(), "reget"),
  userAgent: "reget/0.1",
  progressIntervalMs: 100,
  retryAttempts: 0,
  retryDelayMs: 5000,
  logLevel: "warn",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

/** Complete configuration file schema */
export const ConfigFileSchema = z
  .object({
    download: z
      .object({
        dir: z.string().min(1).optional(),
        tempDir: z.string().min(1).optional(),
        userAgent: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    state: z
      .object({
        dir: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    progress: z
      .object({
        intervalMs: z.number().int().min(0).max(10000).optional(),
      })
      .strict()
      .optional(),
    retry: z
      .object({
        attempts: z.number().int().min(0).max(10).optional(),
        delayMs: z.number().int().min(100).max(300000).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: LogLevelSchema.optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  downloadDir: string;
  tempDir: string;
  userAgent: string;
  /** Directory for the persisted resume record; conf's default when unset */
  stateDir?: string;
  progressIntervalMs: number;
  retryAttempts: number;
  retryDelayMs: number;
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

/**
 * Load a YAML config file from disk.
 * Returns undefined if the file doesn't exist; throws if it is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${errorMessage(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${errorMessage(err)}`]);
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`
    );
    throw invalidConfig(path, issues);
  }

  return result.data;
}

/**
 * Apply values from a config file; only explicitly set values override.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.download?.dir !== undefined) {
    target.downloadDir = resolve(expandHome(source.download.dir));
  }
  if (source.download?.tempDir !== undefined) {
    target.tempDir = resolve(expandHome(source.download.tempDir));
  }
  if (source.download?.userAgent !== undefined) {
    target.userAgent = source.download.userAgent;
  }
  if (source.state?.dir !== undefined) {
    target.stateDir = resolve(expandHome(source.state.dir));
  }
  if (source.progress?.intervalMs !== undefined) {
    target.progressIntervalMs = source.progress.intervalMs;
  }
  if (source.retry?.attempts !== undefined) {
    target.retryAttempts = source.retry.attempts;
  }
  if (source.retry?.delayMs !== undefined) {
    target.retryDelayMs = source.retry.delayMs;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  cwd: string = process.cwd()
): ResolvedConfig {
  const config: ResolvedConfig = {
    downloadDir: cwd,
    tempDir: CONFIG_DEFAULTS.tempDir,
    userAgent: CONFIG_DEFAULTS.userAgent,
    progressIntervalMs: CONFIG_DEFAULTS.progressIntervalMs,
    retryAttempts: CONFIG_DEFAULTS.retryAttempts,
    retryDelayMs: CONFIG_DEFAULTS.retryDelayMs,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Config file given on the command line; replaces the user config
 * @returns The resolved config and the files that were actually read
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {}
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig);

  return { config, sources };
}
