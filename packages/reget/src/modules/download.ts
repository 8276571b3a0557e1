import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { resolve } from "path";
import { createProcessSignalHandler } from "../lib/adapters/process-signals.js";
import { getContext, isJsonMode } from "../lib/cli-context.js";
import { loadConfig, type ResolvedConfig } from "../lib/config.js";
import { cancelled, nothingToResume, resumable, unrecoverable } from "../lib/errors/catalog.js";
import {
  maybeOutputJson,
  outputNdjson,
  type ProgressEventJson,
  type StatusResultJson,
} from "../lib/json-output.js";
import { createLogger, type Logger } from "../lib/logger.js";
import type { SignalHandler } from "../lib/ports/signal-handler.js";
import { createSpinner } from "../lib/spinner.js";
import { createDownloadManager, type DownloadManager } from "../engine/manager.js";
import { formatMegabytes, type DownloadStatus } from "../engine/publisher.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StartOptions {
  outputDir?: string;
}

/** Collaborators a command needs; tests swap them for fakes */
export interface DownloadCommandDeps {
  loadConfig(cliOptions: Partial<ResolvedConfig>): ResolvedConfig;
  createManager(config: ResolvedConfig, logger: Logger): DownloadManager;
  signals(): SignalHandler;
}

const defaultDeps: DownloadCommandDeps = {
  loadConfig: (cliOptions) => loadConfig(getContext().configPath, cliOptions).config,
  createManager: createDownloadManager,
  signals: createProcessSignalHandler,
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function openManager(deps: DownloadCommandDeps, cliOptions: Partial<ResolvedConfig> = {}): DownloadManager {
  const config = deps.loadConfig(cliOptions);
  const logger = createLogger({ level: config.logLevel, json: config.logJson });
  return deps.createManager(config, logger);
}

function toEvent(type: ProgressEventJson["type"], status: DownloadStatus): ProgressEventJson {
  return {
    type,
    timestamp: new Date().toISOString(),
    data: {
      state: status.state,
      status: status.status,
      progress: status.progress,
      downloadedBytes: status.downloadedBytes,
      totalBytes: status.totalBytes,
      ...(status.savedPath !== undefined && { savedPath: status.savedPath }),
    },
  };
}

/**
 * Resolve with the first status that ends the transfer, ignoring
 * interruptions an automatic retry is about to pick up.
 */
export function waitForSettled(manager: DownloadManager): Promise<DownloadStatus> {
  return new Promise((resolvePromise) => {
    const unsubscribe = manager.subscribe((status) => {
      if (status.state === "active") return;
      if ((status.state === "interrupted" || status.state === "failed") && manager.retryPending()) return;
      unsubscribe();
      resolvePromise(status);
    });
  });
}

export function toStatusJson(status: DownloadStatus): StatusResultJson {
  return {
    state: status.state,
    status: status.status,
    resumable: status.resumable,
    ...(status.sourceUrl !== undefined && { sourceUrl: status.sourceUrl }),
    downloadedBytes: status.downloadedBytes,
    totalBytes: status.totalBytes,
    progress: status.progress,
    ...(status.savedPath !== undefined && { savedPath: status.savedPath }),
  };
}

function formatBytes(status: DownloadStatus): string {
  const done = `${formatMegabytes(status.downloadedBytes)} MB`;
  return status.totalBytes > 0 ? `${done} of ${formatMegabytes(status.totalBytes)} MB` : done;
}

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

/**
 * Download `url`, or resume the interrupted download when no URL is given.
 * Resolves once the transfer completed; throws when it failed or stopped.
 */
export async function runStart(
  url: string | undefined,
  options: StartOptions,
  deps: DownloadCommandDeps = defaultDeps
): Promise<DownloadStatus> {
  const manager = openManager(deps, {
    downloadDir: options.outputDir !== undefined ? resolve(options.outputDir) : undefined,
  });

  if (url === undefined && !manager.status().resumable) {
    throw nothingToResume();
  }

  const spinner = createSpinner();
  const unsubscribe = manager.subscribe((status) => {
    spinner.update(status);
    if (isJsonMode()) outputNdjson(toEvent("status", status));
  });

  const settled = waitForSettled(manager);
  const signals = deps.signals();
  signals.onShutdown(async () => {
    // pausing flushes the resume token to the state store
    await manager.shutdown();
    await settled;
  });

  let final: DownloadStatus;
  try {
    manager.start(url);
    final = await settled;
  } catch (error) {
    spinner.stop();
    throw error;
  } finally {
    unsubscribe();
    signals.removeAll();
  }

  await manager.shutdown();

  if (isJsonMode()) outputNdjson(toEvent("done", final));

  switch (final.state) {
    case "completed":
      return final;
    case "interrupted":
    case "paused":
      if (final.resumable) throw resumable(final.status);
      throw unrecoverable(final.status);
    case "idle":
      throw cancelled();
    default:
      throw unrecoverable(final.error?.message ?? final.status);
  }
}

/**
 * Forget the interrupted download and delete its partial payload.
 */
export async function runCancel(deps: DownloadCommandDeps = defaultDeps): Promise<void> {
  const manager = openManager(deps);
  const before = manager.status();

  await manager.cancel();
  await manager.shutdown();

  const discarded = before.state !== "idle";
  if (maybeOutputJson({ cancelled: discarded, ...(before.sourceUrl !== undefined && { sourceUrl: before.sourceUrl }) })) {
    return;
  }

  if (!discarded) {
    console.log(chalk.gray("Nothing to cancel."));
    return;
  }
  console.log(chalk.green(`✓ Discarded ${before.sourceUrl ?? "download"}`));
}

/**
 * Show the download an earlier run left behind.
 */
export async function runStatus(deps: DownloadCommandDeps = defaultDeps): Promise<void> {
  const manager = openManager(deps);
  const status = manager.status();
  await manager.shutdown();

  if (maybeOutputJson(toStatusJson(status))) return;

  if (status.state === "idle") {
    console.log(chalk.gray("No download in progress."));
    return;
  }

  const table = new CliTable3();
  table.push(
    { [chalk.cyan("Status")]: status.status },
    { [chalk.cyan("URL")]: status.sourceUrl ?? "-" },
    { [chalk.cyan("Received")]: formatBytes(status) },
    { [chalk.cyan("Resumable")]: status.resumable ? "yes" : "no" }
  );
  console.log(table.toString());

  if (status.resumable) {
    console.log(chalk.gray("Run 'reget start' to continue, or 'reget cancel' to discard it."));
  }
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDownloadCommands(program: Command, deps: DownloadCommandDeps = defaultDeps): void {
  program
    .command("start")
    .alias("get")
    .argument("[url]", "URL to download; omit to resume the interrupted download")
    .option("-o, --output-dir <dir>", "Directory for the finished file")
    .description("Start a download, or resume the interrupted one")
    .action(async (url: string | undefined, options: StartOptions) => {
      await runStart(url, options, deps);
    });

  program
    .command("cancel")
    .description("Discard the interrupted download and its partial data")
    .action(async () => {
      await runCancel(deps);
    });

  program
    .command("status")
    .description("Show the interrupted download, if any")
    .action(async () => {
      await runStatus(deps);
    });
}
