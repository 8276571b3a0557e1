/**
 * The few filesystem primitives the completion step needs.
 * Allows testing finalization without touching the disk.
 */
export interface FileSystem {
  /** Create a directory (and parents) if missing */
  ensureDir(path: string): Promise<void>;
  /** Remove a file; missing files are not an error */
  remove(path: string): Promise<void>;
  /** Move a file, replacing nothing: the destination must not exist */
  move(from: string, to: string): Promise<void>;
}
