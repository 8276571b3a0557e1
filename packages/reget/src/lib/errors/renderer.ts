import chalk from "chalk";
import { unknownError } from "./catalog.js";
import { isDownloadError, type DownloadError } from "./types.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";

const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Build the human-readable lines for an error.
 */
export function formatStaticError(error: DownloadError): string[] {
  const output: string[] = [""];

  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(error.message)}`);

  if (error.details) {
    output.push("");
    for (const line of error.details.split("\n")) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion) {
    output.push("");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  if (error.example) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
  }

  output.push("");
  return output;
}

/**
 * JSON shape of a rendered error; undefined fields are dropped.
 */
export function formatJsonError(error: DownloadError): Record<string, unknown> {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    example: error.example,
    details: error.details,
  };

  return Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );
}

/**
 * Render an error to stderr based on the current output mode.
 */
export function renderError(error: DownloadError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  if (outputMode === "json") {
    console.error(JSON.stringify(formatJsonError(error), null, 2));
    return;
  }

  for (const line of formatStaticError(error)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a DownloadError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  if (isDownloadError(error)) {
    renderError(error, mode);
    return;
  }
  renderError(unknownError(error), mode);
}
