#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { z } from "zod";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDownloadCommands } from "./modules/download.js";

const PackageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return PackageSchema.parse(raw).version;
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("reget")
    .description("Resumable file downloads")
    .version(readVersion())
    .option("--json", "Output machine-readable JSON")
    .option("-q, --quiet", "Suppress progress output")
    .option("-c, --config <path>", "Config file to use instead of the user config");

  registerDownloadCommands(program);
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
