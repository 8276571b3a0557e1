import { describe, it, expect, vi } from "vitest";
import { ConfKeyValueStore } from "./conf-store.js";

vi.mock("conf", () => {
  class FakeConf {
    private readonly values = new Map<string, unknown>();
    readonly path: string;

    constructor(options: { projectName: string; configName: string; cwd?: string }) {
      const dir = options.cwd ?? `/home/tester/.config/${options.projectName}`;
      this.path = `${dir}/${options.configName}.json`;
    }

    get(key: string): unknown {
      return this.values.get(key);
    }

    set(key: string, value: unknown): void {
      this.values.set(key, value);
    }

    delete(key: string): void {
      this.values.delete(key);
    }
  }
  return { default: FakeConf };
});

describe("ConfKeyValueStore", () => {
  it("round-trips binary values", () => {
    const store = new ConfKeyValueStore();
    const value = new Uint8Array([0, 255, 10, 13, 128]);

    store.write("resumeToken", value);

    expect(store.read("resumeToken")).toEqual(value);
  });

  it("returns undefined for missing keys", () => {
    expect(new ConfKeyValueStore().read("sourceUrl")).toBeUndefined();
  });

  it("deletes keys", () => {
    const store = new ConfKeyValueStore();
    store.write("sourceUrl", new TextEncoder().encode("https://example.com/a"));

    store.delete("sourceUrl");

    expect(store.read("sourceUrl")).toBeUndefined();
  });

  it("keeps its state file in the reget project", () => {
    expect(new ConfKeyValueStore().path).toBe("/home/tester/.config/reget/state.json");
  });

  it("honours a custom state directory", () => {
    expect(new ConfKeyValueStore({ cwd: "/var/lib/reget" }).path).toBe("/var/lib/reget/state.json");
  });
});
