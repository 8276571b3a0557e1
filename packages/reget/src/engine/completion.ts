import { basename, join } from "path";
import { finalizeFailed } from "../lib/errors/catalog.js";
import { errorMessage } from "../lib/errors/types.js";
import type { Logger } from "../lib/logger.js";
import type { FileSystem } from "../lib/ports/file-system.js";

export const DEFAULT_FILENAME = "file.dat";

/**
 * File name for a download: the URL's last path segment, percent-decoded.
 * Falls back to DEFAULT_FILENAME when the path ends in a slash or the
 * segment cannot be used as a plain file name.
 */
export function destinationName(sourceUrl: string): string {
  let pathname: string;
  try {
    pathname = new URL(sourceUrl).pathname;
  } catch {
    return DEFAULT_FILENAME;
  }

  const segment = decodeSegment(pathname.slice(pathname.lastIndexOf("/") + 1));

  // A decoded %2F must not smuggle in a directory
  const name = basename(segment.replace(/\\/g, "/"));
  if (name === "" || name === "." || name === "..") {
    return DEFAULT_FILENAME;
  }
  return name;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/**
 * Places a fully received payload at its final location.
 */
export class CompletionHandler {
  constructor(
    private readonly fs: FileSystem,
    private readonly downloadDir: string,
    private readonly logger: Logger
  ) {}

  /**
   * Move `tempLocation` to `<downloadDir>/<name from sourceUrl>`, replacing any
   * previous file of that name. Returns the destination, or undefined when the
   * move failed (the failure is logged, never thrown).
   */
  async finalize(tempLocation: string, sourceUrl: string): Promise<string | undefined> {
    const destination = join(this.downloadDir, destinationName(sourceUrl));

    try {
      await this.fs.ensureDir(this.downloadDir);
      await this.fs.remove(destination);
      await this.fs.move(tempLocation, destination);
    } catch (error) {
      const failure = finalizeFailed(destination, errorMessage(error));
      this.logger.error(failure.message, {
        code: failure.code,
        from: tempLocation,
        error: failure.details,
      });
      return undefined;
    }

    this.logger.info("Saved download", { path: destination });
    return destination;
  }
}
