import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { realTimerService } from "../lib/adapters/real-timers.js";
import { DownloadError } from "../lib/errors/types.js";
import { createNoopLogger } from "../lib/logger.js";
import {
  MemoryFileSystem,
  MemoryKeyValueStore,
  ScriptedTransport,
  encode,
  syncScheduler,
} from "../testing/fakes.js";
import { CompletionHandler } from "./completion.js";
import { ResumeCoordinator, restoreJob, type RetryPolicy } from "./coordinator.js";
import { createIdleJob, type PersistedRecord } from "./job.js";
import { ProgressPublisher, type DownloadStatus } from "./publisher.js";
import { PersistentStateStore } from "./state-store.js";

const URL_A = "https://example.com/a.iso";
const URL_B = "https://example.com/b.iso";

function createHarness(options: { record?: PersistedRecord; retry?: RetryPolicy } = {}) {
  const transport = new ScriptedTransport();
  const stateStore = new PersistentStateStore(new MemoryKeyValueStore());
  if (options.record) stateStore.save(options.record);

  const logger = createNoopLogger();
  const publisher = new ProgressPublisher(createIdleJob(), {
    scheduler: syncScheduler,
    timers: realTimerService,
    intervalMs: 0,
    logger,
  });
  const statuses: DownloadStatus[] = [];
  publisher.subscribe((status) => statuses.push(status));

  const coordinator = new ResumeCoordinator({
    transport,
    stateStore,
    completion: new CompletionHandler(new MemoryFileSystem(), "/downloads", logger),
    publisher,
    timers: realTimerService,
    retry: options.retry ?? { attempts: 0, delayMs: 1000 },
    logger,
  });

  return { transport, stateStore, coordinator, statuses };
}

describe("restoreJob", () => {
  it("starts idle without a record", () => {
    expect(restoreJob(undefined)).toEqual(createIdleJob());
  });

  it("starts idle when the record has no token", () => {
    expect(restoreJob({ sourceUrl: URL_A, downloadedBytes: 10, totalBytes: 100 })).toEqual(createIdleJob());
  });

  it("offers a record with a token as an interrupted, resumable job", () => {
    const token = encode("partial");

    expect(restoreJob({ sourceUrl: URL_A, resumeToken: token, downloadedBytes: 250, totalBytes: 1000 })).toEqual({
      ...createIdleJob(),
      state: "interrupted",
      sourceUrl: URL_A,
      resumeToken: token,
      downloadedBytes: 250,
      totalBytes: 1000,
      progress: 0.25,
      resumable: true,
    });
  });
});

describe("ResumeCoordinator", () => {
  describe("restore", () => {
    it("publishes the restored job right away", () => {
      const token = encode("partial");
      const { coordinator, statuses } = createHarness({
        record: { sourceUrl: URL_A, resumeToken: token, downloadedBytes: 250, totalBytes: 1000 },
      });

      expect(coordinator.job.state).toBe("interrupted");
      expect(statuses).toHaveLength(1);
      expect(statuses[0]).toMatchObject({ status: "Interrupted (resumable)", resumable: true, sourceUrl: URL_A });
    });

    it("forgets a record that has no token", () => {
      const { coordinator, stateStore } = createHarness({
        record: { sourceUrl: URL_A, downloadedBytes: 10, totalBytes: 100 },
      });

      expect(coordinator.job.state).toBe("idle");
      expect(stateStore.load()).toBeUndefined();
    });
  });

  describe("start", () => {
    it("finishes the stored download before accepting a new URL", () => {
      const token = encode("partial");
      const { coordinator, transport } = createHarness({
        record: { sourceUrl: URL_A, resumeToken: token, downloadedBytes: 250, totalBytes: 1000 },
      });

      coordinator.start(URL_B);

      expect(transport.issued).toEqual([{ identity: 1, kind: "resumed", token }]);
      expect(coordinator.job).toMatchObject({ state: "active", sourceUrl: URL_A, downloadedBytes: 250 });
    });

    it("rejects a start with no URL and nothing stored", () => {
      const { coordinator, transport } = createHarness();

      expect(() => coordinator.start()).toThrow(DownloadError);
      expect(transport.issued).toEqual([]);
      expect(coordinator.job.state).toBe("failed");
    });

    it("returns the live identity when already downloading", () => {
      const { coordinator, transport } = createHarness();

      expect(coordinator.start(URL_A)).toBe(1);
      expect(coordinator.start(URL_B)).toBe(1);
      expect(transport.issued).toHaveLength(1);
    });

    it("reuses the last URL after a failure", () => {
      const { coordinator, transport } = createHarness();
      coordinator.start(URL_A);
      transport.fail(1, { kind: "error", message: "HTTP 503 Service Unavailable: server error" });

      coordinator.start();

      expect(transport.issued[1]).toEqual({ identity: 2, kind: "new", url: URL_A });
    });
  });

  describe("reconnect", () => {
    it("adopts the newest live transfer and cancels the rest", async () => {
      const { coordinator, transport } = createHarness();
      transport.live = [3, 5];
      const onReady = vi.fn();

      await coordinator.reconnect(onReady);

      expect(coordinator.session.activeIdentity).toBe(5);
      expect(coordinator.job.state).toBe("active");
      expect(transport.cancelled).toEqual([{ identity: 3, produceToken: false }]);
      expect(onReady).toHaveBeenCalledTimes(1);
    });

    it("leaves the current transfer alone", async () => {
      const { coordinator, transport } = createHarness();
      coordinator.start(URL_A);

      await coordinator.reconnect(() => {});

      expect(coordinator.session.activeIdentity).toBe(1);
      expect(transport.cancelled).toEqual([]);
    });

    it("calls onReady when nothing is live", async () => {
      const { coordinator } = createHarness();
      const onReady = vi.fn();

      await coordinator.reconnect(onReady);

      expect(onReady).toHaveBeenCalledTimes(1);
      expect(coordinator.job.state).toBe("idle");
    });

    it("calls onReady when the transport cannot list transfers", async () => {
      const { coordinator, transport } = createHarness();
      vi.spyOn(transport, "liveTransfers").mockRejectedValue(new Error("gone"));
      const onReady = vi.fn();

      await coordinator.reconnect(onReady);

      expect(onReady).toHaveBeenCalledTimes(1);
    });
  });

  describe("shutdown", () => {
    it("pauses a live transfer so its token is stored", async () => {
      const { coordinator, transport, stateStore } = createHarness();
      coordinator.start(URL_A);
      transport.progress(1, 100, 1000);

      await coordinator.shutdown();

      expect(transport.cancelled).toEqual([{ identity: 1, produceToken: true }]);
      expect(coordinator.job.state).toBe("paused");
      expect(stateStore.load()?.downloadedBytes).toBe(100);
    });
  });

  describe("automatic retry", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("resumes after an interruption with exponential backoff", () => {
      const { coordinator, transport } = createHarness({ retry: { attempts: 2, delayMs: 1000 } });
      const token = encode("partial");
      coordinator.start(URL_A);

      transport.fail(1, { kind: "error", message: "socket hang up", resumeToken: token });
      expect(coordinator.retryPending).toBe(true);

      vi.advanceTimersByTime(999);
      expect(transport.issued).toHaveLength(1);
      vi.advanceTimersByTime(1);
      expect(transport.issued[1]).toEqual({ identity: 2, kind: "resumed", token });
      expect(coordinator.retryPending).toBe(false);

      transport.fail(2, { kind: "error", message: "socket hang up", resumeToken: token });
      vi.advanceTimersByTime(1999);
      expect(transport.issued).toHaveLength(2);
      vi.advanceTimersByTime(1);
      expect(transport.issued).toHaveLength(3);

      transport.fail(3, { kind: "error", message: "socket hang up", resumeToken: token });
      expect(coordinator.retryPending).toBe(false);
      expect(coordinator.job.state).toBe("interrupted");
    });

    it("restarts a failed download from the stored URL", () => {
      const { coordinator, transport } = createHarness({ retry: { attempts: 1, delayMs: 500 } });
      coordinator.start(URL_A);
      transport.fail(1, { kind: "error", message: "HTTP 502 Bad Gateway: server error" });

      vi.advanceTimersByTime(500);

      expect(transport.issued[1]).toEqual({ identity: 2, kind: "new", url: URL_A });
    });

    it("is called off by a pause", async () => {
      const { coordinator, transport } = createHarness({ retry: { attempts: 1, delayMs: 500 } });
      coordinator.start(URL_A);
      transport.fail(1, { kind: "error", message: "socket hang up", resumeToken: encode("partial") });

      await coordinator.pause();
      vi.advanceTimersByTime(500);

      expect(coordinator.retryPending).toBe(false);
      expect(transport.issued).toHaveLength(1);
    });

    it("is called off by a cancel", async () => {
      const { coordinator, transport } = createHarness({ retry: { attempts: 1, delayMs: 500 } });
      coordinator.start(URL_A);
      transport.fail(1, { kind: "error", message: "socket hang up", resumeToken: encode("partial") });

      await coordinator.cancel();
      vi.advanceTimersByTime(500);

      expect(transport.issued).toHaveLength(1);
      expect(coordinator.job.state).toBe("idle");
    });

    it("never schedules with zero attempts", () => {
      const { coordinator, transport } = createHarness();
      coordinator.start(URL_A);
      transport.fail(1, { kind: "error", message: "socket hang up", resumeToken: encode("partial") });

      expect(coordinator.retryPending).toBe(false);
    });
  });
});
