import type { KeyValueStore } from "../lib/ports/key-value-store.js";
import { UNKNOWN_TOTAL, type PersistedRecord } from "./job.js";

export const STATE_KEYS = {
  sourceUrl: "sourceUrl",
  resumeToken: "resumeToken",
  downloadedBytes: "downloadedBytes",
  totalBytes: "totalBytes",
} as const;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function readString(store: KeyValueStore, key: string): string | undefined {
  const bytes = store.read(key);
  return bytes === undefined ? undefined : decoder.decode(bytes);
}

function readInteger(store: KeyValueStore, key: string, fallback: number): number {
  const text = readString(store, key);
  if (text === undefined) return fallback;
  const value = Number.parseInt(text, 10);
  return Number.isNaN(value) ? fallback : value;
}

/**
 * Durable record of the one download that can be resumed.
 * Survives process restarts through the injected key-value store.
 */
export class PersistentStateStore {
  constructor(private readonly store: KeyValueStore) {}

  /** Read the record; there is none unless a source URL was stored */
  load(): PersistedRecord | undefined {
    const sourceUrl = readString(this.store, STATE_KEYS.sourceUrl);
    if (!sourceUrl) return undefined;

    const token = this.store.read(STATE_KEYS.resumeToken);
    return {
      sourceUrl,
      resumeToken: token !== undefined && token.byteLength > 0 ? token : undefined,
      downloadedBytes: Math.max(0, readInteger(this.store, STATE_KEYS.downloadedBytes, 0)),
      totalBytes: readInteger(this.store, STATE_KEYS.totalBytes, UNKNOWN_TOTAL),
    };
  }

  save(record: PersistedRecord): void {
    this.store.write(STATE_KEYS.sourceUrl, encoder.encode(record.sourceUrl));
    if (record.resumeToken) {
      this.store.write(STATE_KEYS.resumeToken, record.resumeToken);
    } else {
      this.store.delete(STATE_KEYS.resumeToken);
    }
    this.store.write(STATE_KEYS.downloadedBytes, encoder.encode(String(record.downloadedBytes)));
    this.store.write(STATE_KEYS.totalBytes, encoder.encode(String(record.totalBytes)));
  }

  clear(): void {
    for (const key of Object.values(STATE_KEYS)) {
      this.store.delete(key);
    }
  }
}
