import { describe, it, expect, afterEach } from "vitest";
import { getContext, initContext, isJsonMode, isQuietMode, resetContext } from "./cli-context.js";

describe("cli-context", () => {
  afterEach(() => {
    resetContext();
  });

  it("defaults to human, non-quiet output", () => {
    expect(initContext(["node", "reget", "status"], {})).toEqual({ json: false, quiet: false });
  });

  it("--json implies quiet", () => {
    initContext(["node", "reget", "status", "--json"], {});

    expect(isJsonMode()).toBe(true);
    expect(isQuietMode()).toBe(true);
  });

  it("reads flags from the environment", () => {
    initContext(["node", "reget"], { REGET_QUIET: "true", REGET_CONFIG: "/env/config.yaml" });

    expect(getContext()).toEqual({ json: false, quiet: true, configPath: "/env/config.yaml" });
  });

  it("prefers --config over REGET_CONFIG", () => {
    initContext(["node", "reget", "-c", "/flag.yaml"], { REGET_CONFIG: "/env.yaml" });

    expect(getContext().configPath).toBe("/flag.yaml");
  });

  it("ignores --config without a value", () => {
    initContext(["node", "reget", "--config", "--json"], {});

    expect(getContext().configPath).toBeUndefined();
  });
});
