import { copyFile, mkdir, rename, rm } from "fs/promises";
import type { FileSystem } from "../ports/file-system.js";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * FileSystem backed by fs/promises.
 * `move` renames, falling back to copy + unlink when the temp directory
 * lives on another device.
 */
export const nodeFileSystem: FileSystem = {
  async ensureDir(path) {
    await mkdir(path, { recursive: true });
  },

  async remove(path) {
    await rm(path, { force: true });
  },

  async move(from, to) {
    try {
      await rename(from, to);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== "EXDEV") throw error;
      await copyFile(from, to);
      await rm(from, { force: true });
    }
  },
};
