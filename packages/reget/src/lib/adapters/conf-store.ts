import Conf from "conf";
import type { KeyValueStore } from "../ports/key-value-store.js";

export type StoredValues = Partial<Record<string, string>>;

export interface ConfStoreOptions {
  /** Directory for the state file; conf's per-user config dir when unset */
  cwd?: string;
}

/**
 * KeyValueStore persisted by conf as a JSON file of base64 strings.
 */
export class ConfKeyValueStore implements KeyValueStore {
  private readonly conf: Conf<StoredValues>;

  constructor(options: ConfStoreOptions = {}) {
    this.conf = new Conf<StoredValues>({
      projectName: "reget",
      configName: "state",
      ...(options.cwd !== undefined && { cwd: options.cwd }),
    });
  }

  /** Location of the backing file */
  get path(): string {
    return this.conf.path;
  }

  read(key: string): Uint8Array | undefined {
    const encoded = this.conf.get(key);
    if (typeof encoded !== "string") return undefined;
    return new Uint8Array(Buffer.from(encoded, "base64"));
  }

  write(key: string, value: Uint8Array): void {
    this.conf.set(key, Buffer.from(value).toString("base64"));
  }

  delete(key: string): void {
    this.conf.delete(key);
  }
}
