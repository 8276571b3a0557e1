/**
 * Durable byte storage keyed by name.
 * Must survive process termination; no atomicity across keys is expected.
 */
export interface KeyValueStore {
  read(key: string): Uint8Array | undefined;
  write(key: string, value: Uint8Array): void;
  delete(key: string): void;
}
