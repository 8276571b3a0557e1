import { describe, it, expect } from "vitest";
import { getOutputMode } from "./mode.js";

describe("getOutputMode", () => {
  it("uses json for --json", () => {
    expect(getOutputMode(["node", "reget", "status", "--json"], {}, true)).toBe("json");
  });

  it("uses json when REGET_JSON is set", () => {
    expect(getOutputMode([], { REGET_JSON: "1" }, true)).toBe("json");
  });

  it("uses static output in CI, pipes and dumb terminals", () => {
    expect(getOutputMode([], { CI: "true" }, true)).toBe("static");
    expect(getOutputMode([], {}, false)).toBe("static");
    expect(getOutputMode([], { TERM: "dumb" }, true)).toBe("static");
  });

  it("uses tty otherwise", () => {
    expect(getOutputMode([], {}, true)).toBe("tty");
  });
});
