import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  resolveConfig,
  loadConfig,
  loadConfigFile,
  expandHome,
  ConfigFileSchema,
  CONFIG_DEFAULTS,
  USER_CONFIG_PATH,
} from "./config.js";
import { DownloadError } from "./errors/types.js";

// Mock fs module
vi.mock("fs", () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import { existsSync, readFileSync } from "fs";

function captureError(fn: () => unknown): DownloadError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DownloadError) return error;
    throw error;
  }
  throw new Error("expected a DownloadError");
}

describe("config", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe("resolveConfig", () => {
    it("returns defaults when no config provided", () => {
      const config = resolveConfig({}, undefined, undefined, "/work");

      expect(config).toEqual({
        downloadDir: "/work",
        tempDir: CONFIG_DEFAULTS.tempDir,
        userAgent: "reget/0.1",
        progressIntervalMs: 100,
        retryAttempts: 0,
        retryDelayMs: 5000,
        logLevel: "warn",
        logJson: false,
      });
    });

    it("user config overrides system config", () => {
      const systemConfig = { retry: { attempts: 3 } };
      const userConfig = { retry: { attempts: 5 } };

      const config = resolveConfig({}, userConfig, systemConfig);

      expect(config.retryAttempts).toBe(5);
    });

    it("CLI options override all configs", () => {
      const userConfig = { download: { dir: "/srv/files" } };

      const config = resolveConfig({ downloadDir: "/tmp/out" }, userConfig);

      expect(config.downloadDir).toBe("/tmp/out");
    });

    it("ignores CLI options that are undefined", () => {
      const userConfig = { download: { dir: "/srv/files" } };

      const config = resolveConfig({ downloadDir: undefined }, userConfig);

      expect(config.downloadDir).toBe("/srv/files");
    });

    it("preserves other defaults when overriding one value", () => {
      const config = resolveConfig({}, { progress: { intervalMs: 250 } });

      expect(config.progressIntervalMs).toBe(250);
      expect(config.retryDelayMs).toBe(CONFIG_DEFAULTS.retryDelayMs);
      expect(config.userAgent).toBe(CONFIG_DEFAULTS.userAgent);
    });

    it("applies download, state and logging sections", () => {
      const userConfig = {
        download: { tempDir: "/var/tmp/parts", userAgent: "test-agent" },
        state: { dir: "/var/lib/reget" },
        logging: { level: "debug" as const, json: true },
      };

      const config = resolveConfig({}, userConfig);

      expect(config.tempDir).toBe("/var/tmp/parts");
      expect(config.userAgent).toBe("test-agent");
      expect(config.stateDir).toBe("/var/lib/reget");
      expect(config.logLevel).toBe("debug");
      expect(config.logJson).toBe(true);
    });
  });

  describe("expandHome", () => {
    it("expands a leading tilde", () => {
      expect(expandHome("~/Downloads", "/home/tester")).toBe("/home/tester/Downloads");
      expect(expandHome("~", "/home/tester")).toBe("/home/tester");
    });

    it("leaves other paths alone", () => {
      expect(expandHome("/data/~/x", "/home/tester")).toBe("/data/~/x");
      expect(expandHome("~other/x", "/home/tester")).toBe("~other/x");
    });
  });

  describe("ConfigFileSchema", () => {
    it("validates a complete config", () => {
      const input = {
        download: { dir: "~/Downloads", tempDir: "/tmp/reget", userAgent: "reget/0.1" },
        state: { dir: "/var/lib/reget" },
        progress: { intervalMs: 0 },
        retry: { attempts: 2, delayMs: 1000 },
        logging: { level: "info", json: false },
      };

      expect(ConfigFileSchema.safeParse(input).success).toBe(true);
    });

    it("validates empty config", () => {
      expect(ConfigFileSchema.safeParse({}).success).toBe(true);
    });

    it("rejects too many retry attempts", () => {
      expect(ConfigFileSchema.safeParse({ retry: { attempts: 11 } }).success).toBe(false);
    });

    it("rejects a retry delay below 100ms", () => {
      expect(ConfigFileSchema.safeParse({ retry: { delayMs: 50 } }).success).toBe(false);
    });

    it("rejects invalid logging level", () => {
      expect(ConfigFileSchema.safeParse({ logging: { level: "verbose" } }).success).toBe(false);
    });

    it("rejects unknown sections", () => {
      expect(ConfigFileSchema.safeParse({ proxy: {} }).success).toBe(false);
    });
  });

  describe("loadConfigFile", () => {
    it("returns undefined for non-existent file", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(loadConfigFile("/path/to/config.yaml")).toBeUndefined();
    });

    it("loads and parses valid YAML file", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(`
retry:
  attempts: 4
logging:
  level: debug
`);

      const result = loadConfigFile("/path/to/config.yaml");

      expect(result?.retry?.attempts).toBe(4);
      expect(result?.logging?.level).toBe("debug");
    });

    it("handles empty YAML file", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("");

      expect(loadConfigFile("/path/to/config.yaml")).toEqual({});
    });

    it("throws CONFIG_INVALID on invalid YAML syntax", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(`
retry:
  attempts: [invalid
`);

      const error = captureError(() => loadConfigFile("/path/to/config.yaml"));

      expect(error.code).toBe("CONFIG_INVALID");
      expect(error.message).toBe("Config file /path/to/config.yaml has errors");
      expect(error.details).toMatch(/^invalid YAML: /);
    });

    it("reports schema failures with their path", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(`
retry:
  attempts: 99
`);

      const error = captureError(() => loadConfigFile("/path/to/config.yaml"));

      expect(error.code).toBe("CONFIG_INVALID");
      expect(error.details).toMatch(/^retry\.attempts: /);
    });

    it("reports unknown top-level keys against the root", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("proxy: {}\n");

      const error = captureError(() => loadConfigFile("/path/to/config.yaml"));

      expect(error.details).toMatch(/^\(root\): /);
    });
  });

  describe("loadConfig", () => {
    it("uses defaults when no files exist", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      const { config, sources } = loadConfig();

      expect(sources).toEqual([]);
      expect(config.retryAttempts).toBe(0);
    });

    it("reads only the explicit file when one is given", () => {
      vi.mocked(existsSync).mockImplementation((path) => path === "/custom/reget.yaml");
      vi.mocked(readFileSync).mockReturnValue("progress:\n  intervalMs: 500\n");

      const { config, sources } = loadConfig("/custom/reget.yaml");

      expect(sources).toEqual(["/custom/reget.yaml"]);
      expect(config.progressIntervalMs).toBe(500);
      expect(existsSync).not.toHaveBeenCalledWith(USER_CONFIG_PATH);
    });
  });
});
