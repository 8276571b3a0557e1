import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import { getContext } from "../lib/cli-context.js";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { errorMessage } from "../lib/errors/types.js";
import { maybeOutputJson, type ConfigShowJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

const EXAMPLE_CONFIG = `# reget configuration
# Place at ~/.config/reget/config.yaml (user) or /etc/reget/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. User config (~/.config/reget/config.yaml)
# 3. System config (/etc/reget/config.yaml)
# 4. Built-in defaults

download:
  # Where finished files are saved (default: the current directory)
  # dir: "~/Downloads"

  # Where partial files live until they are complete
  # tempDir: "/var/tmp/reget"

  # userAgent: "reget/0.1"

state:
  # Directory holding the resume record (default: the per-user config dir)
  # dir: "~/.local/state/reget"

progress:
  # Minimum gap between progress updates (ms)
  intervalMs: 100

retry:
  # Automatic restarts after an interrupted or failed download (0 = never)
  attempts: 0

  # Base delay between restarts (exponential backoff applied)
  delayMs: 5000

logging:
  # Log level: debug, info, warn, error, silent
  level: warn

  # Output JSON logs
  json: false
`;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage reget configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/reget/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(
          chalk.red(`Failed to create config: ${errorMessage(error)}`)
        );
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s); honours --config")
    .action(() => {
      const explicit = getContext().configPath;
      const pathsToCheck = explicit
        ? [explicit]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (explicit) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid: ${errorMessage(error)}`));
          hasErrors = true;
        }
      }

      if (!foundAny && !explicit) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'reget config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .action(() => {
      try {
        const { config: resolved, sources } = loadConfig(getContext().configPath);

        const json: ConfigShowJson = { effective: { ...resolved }, sources };
        if (maybeOutputJson(json)) return;

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));

        if (sources.length > 0) {
          console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
        } else {
          console.log(chalk.gray("Sources: (defaults only)"));
        }

        console.log();
        console.log(chalk.bold("Download:"));
        console.log(`  dir:            ${resolved.downloadDir}`);
        console.log(`  tempDir:        ${resolved.tempDir}`);
        console.log(`  userAgent:      ${resolved.userAgent}`);

        console.log();
        console.log(chalk.bold("State:"));
        console.log(`  dir:            ${resolved.stateDir ?? "(default)"}`);

        console.log();
        console.log(chalk.bold("Progress & Retry:"));
        console.log(`  intervalMs:     ${resolved.progressIntervalMs}`);
        console.log(`  retryAttempts:  ${resolved.retryAttempts}`);
        console.log(`  retryDelayMs:   ${resolved.retryDelayMs}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:          ${resolved.logLevel}`);
        console.log(`  json:           ${resolved.logJson}`);
      } catch (error) {
        console.error(
          chalk.red(`Failed to load config: ${errorMessage(error)}`)
        );
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
