import { describe, it, expect, vi, afterEach } from "vitest";
import { formatJsonError, formatStaticError, renderError, renderUnknownError } from "./renderer.js";
import { DownloadError } from "./types.js";

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => {
  const identity = (s: string) => s;
  return {
    default: {
      red: Object.assign(identity, { bold: identity }),
      yellow: identity,
      dim: identity,
      cyan: identity,
    },
  };
});

describe("error renderer", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("formatStaticError", () => {
    it("renders message, details, suggestion and example", () => {
      const error = new DownloadError("NOTHING_TO_RESUME", "Nothing here", {
        details: "line one\nline two",
        suggestion: "Pass a URL",
        example: "reget start https://example.com/a.bin",
      });

      expect(formatStaticError(error)).toEqual([
        "",
        "✗ Nothing here",
        "",
        "  line one",
        "  line two",
        "",
        "  → Pass a URL",
        "",
        "  Try: reget start https://example.com/a.bin",
        "",
      ]);
    });

    it("renders a bare message", () => {
      expect(formatStaticError(new DownloadError("CANCELLED", "Download cancelled"))).toEqual([
        "",
        "✗ Download cancelled",
        "",
      ]);
    });
  });

  describe("formatJsonError", () => {
    it("drops undefined fields", () => {
      const error = new DownloadError("UNRECOVERABLE", "HTTP 500", { suggestion: "Retry later" });

      expect(formatJsonError(error)).toEqual({
        error: true,
        code: "UNRECOVERABLE",
        message: "HTTP 500",
        suggestion: "Retry later",
      });
    });
  });

  describe("renderError", () => {
    it("writes JSON to stderr in json mode", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});

      renderError(new DownloadError("CANCELLED", "Download cancelled"), "json");

      expect(spy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(spy.mock.calls[0]?.[0]))).toEqual({
        error: true,
        code: "CANCELLED",
        message: "Download cancelled",
      });
    });

    it("wraps foreign errors as UNKNOWN_ERROR", () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});

      renderUnknownError(new Error("disk on fire"), "json");

      expect(JSON.parse(String(spy.mock.calls[0]?.[0]))).toEqual({
        error: true,
        code: "UNKNOWN_ERROR",
        message: "disk on fire",
      });
    });
  });
});
