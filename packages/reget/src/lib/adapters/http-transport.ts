import fetch from "node-fetch";
import { randomUUID } from "crypto";
import { createWriteStream } from "fs";
import { mkdir, rm, stat } from "fs/promises";
import { dirname, join } from "path";
import { Transform } from "stream";
import { pipeline } from "stream/promises";
import { z } from "zod";
import { fromHttpStatus, unrecoverable } from "../errors/catalog.js";
import { errorMessage, isDownloadError } from "../errors/types.js";
import type { Logger } from "../logger.js";
import type {
  ResumeToken,
  TransferEventListener,
  TransferFailure,
  TransferIdentity,
  TransferTransport,
} from "../ports/transport.js";

// ---------------------------------------------------------------------------
// Resume tokens
// ---------------------------------------------------------------------------

const CheckpointSchema = z.object({
  version: z.literal(1),
  url: z.string().url(),
  tempPath: z.string().endsWith(".part"),
  offset: z.number().int().min(0),
  totalBytes: z.number().int().min(-1),
  etag: z.string().optional(),
  lastModified: z.string().optional(),
});

/** What an HTTP resume token carries: where the partial file is and how far it got */
export type TransferCheckpoint = z.infer<typeof CheckpointSchema>;

export function encodeCheckpoint(checkpoint: TransferCheckpoint): ResumeToken {
  return new TextEncoder().encode(JSON.stringify(checkpoint));
}

/**
 * Read a token produced by this transport. Throws on anything else.
 */
export function decodeCheckpoint(token: ResumeToken): TransferCheckpoint {
  let raw: unknown;
  try {
    raw = JSON.parse(new TextDecoder().decode(token));
  } catch (error) {
    throw unrecoverable("Resume token is not readable", error);
  }
  const result = CheckpointSchema.safeParse(raw);
  if (!result.success) {
    throw unrecoverable("Resume token was not produced by the HTTP transport");
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Header parsing
// ---------------------------------------------------------------------------

export interface ContentRange {
  /** First byte of the body, undefined for the unsatisfied-range form */
  start?: number;
  /** Full resource length, undefined when the server sent `*` */
  total?: number;
}

/**
 * Parse `Content-Range: bytes 100-199/1000`, or the `bytes *\/1000` form a 416 carries.
 */
export function parseContentRange(header: string | null): ContentRange | undefined {
  if (!header) return undefined;
  const match = header.trim().match(/^bytes\s+(?:(\d+)-\d+|\*)\/(\d+|\*)$/i);
  if (!match) return undefined;
  const [, start, total] = match;
  return {
    start: start !== undefined ? Number(start) : undefined,
    total: total !== undefined && total !== "*" ? Number(total) : undefined,
  };
}

function parseLength(header: string | null): number | undefined {
  if (header === null) return undefined;
  const value = Number(header);
  return Number.isInteger(value) && value >= 0 ? value : undefined;
}

/** If-Range needs a strong validator; weak ETags can't be used */
function strongEtag(header: string | null): string | undefined {
  if (!header || header.startsWith("W/")) return undefined;
  return header;
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export interface HttpTransportOptions {
  /** Where partial payloads are written */
  tempDir: string;
  userAgent: string;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

interface TransferStart {
  url: string;
  tempPath: string;
  offset: number;
  totalBytes: number;
  etag?: string;
  lastModified?: string;
}

interface ActiveTransfer {
  identity: TransferIdentity;
  url: string;
  tempPath: string;
  /** Bytes in the partial file so far */
  received: number;
  totalBytes: number;
  etag?: string;
  lastModified?: string;
  /** Server answered a range request or advertised `Accept-Ranges: bytes` */
  rangeCapable: boolean;
  /** Claimed by cancel(); the task reports nothing further */
  cancelled: boolean;
  controller: AbortController;
  /** Settles (never rejects) once the task stopped touching the partial file */
  done: Promise<void>;
}

/**
 * TransferTransport over HTTP(S) range requests.
 *
 * Every transfer streams into `<tempDir>/<uuid>.part`. A resumed transfer
 * asks for the remaining bytes with `Range` + `If-Range`, so a changed
 * resource comes back as a plain 200 and the file is rewritten from zero.
 */
export class HttpRangeTransport implements TransferTransport {
  private listener: TransferEventListener | undefined;
  private nextIdentity = 1;
  private readonly transfers = new Map<TransferIdentity, ActiveTransfer>();

  private readonly tempDir: string;
  private readonly userAgent: string;
  private readonly logger: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpTransportOptions) {
    this.tempDir = options.tempDir;
    this.userAgent = options.userAgent;
    this.logger = options.logger.child({ component: "http" });
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  bind(listener: TransferEventListener): void {
    this.listener = listener;
  }

  issueNewTransfer(url: URL): TransferIdentity {
    return this.launch({
      url: url.href,
      tempPath: join(this.tempDir, `${randomUUID()}.part`),
      offset: 0,
      totalBytes: -1,
    });
  }

  issueResumedTransfer(token: ResumeToken): TransferIdentity {
    const checkpoint = decodeCheckpoint(token);
    return this.launch(checkpoint);
  }

  async cancel(identity: TransferIdentity, produceToken: boolean): Promise<ResumeToken | undefined> {
    const transfer = this.transfers.get(identity);
    if (!transfer) return undefined;

    this.transfers.delete(identity);
    transfer.cancelled = true;
    transfer.controller.abort();
    await transfer.done;

    if (produceToken) {
      const size = await this.partialSize(transfer.tempPath);
      // nothing received yet is still resumable, from offset zero
      if (size === 0 || transfer.rangeCapable) {
        this.logger.debug("Cancelled with resume token", { identity, offset: size });
        return encodeCheckpoint(this.checkpoint(transfer, size));
      }
    }

    await this.removePartial(transfer.tempPath);
    this.logger.debug("Cancelled", { identity });
    return undefined;
  }

  async liveTransfers(): Promise<TransferIdentity[]> {
    return [...this.transfers.keys()].sort((a, b) => a - b);
  }

  async discard(token: ResumeToken): Promise<void> {
    let checkpoint: TransferCheckpoint;
    try {
      checkpoint = decodeCheckpoint(token);
    } catch (error) {
      this.logger.debug("Nothing to discard for unreadable token", { error: errorMessage(error) });
      return;
    }
    await this.removePartial(checkpoint.tempPath);
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private launch(start: TransferStart): TransferIdentity {
    const identity = this.nextIdentity++;
    const transfer: ActiveTransfer = {
      identity,
      url: start.url,
      tempPath: start.tempPath,
      received: start.offset,
      totalBytes: start.totalBytes,
      etag: start.etag,
      lastModified: start.lastModified,
      rangeCapable: start.offset > 0,
      cancelled: false,
      controller: new AbortController(),
      done: Promise.resolve(),
    };
    this.transfers.set(identity, transfer);

    // never report anything from inside issue*
    transfer.done = new Promise<void>((resolve) => setImmediate(resolve)).then(() => this.run(transfer));
    this.logger.debug("Issued transfer", { identity, url: start.url, offset: start.offset });
    return identity;
  }

  private async run(transfer: ActiveTransfer): Promise<void> {
    if (transfer.cancelled) return;

    try {
      await this.download(transfer);
    } catch (error) {
      if (transfer.cancelled) return;
      this.transfers.delete(transfer.identity);
      const failure = await this.failureFor(transfer, error);
      try {
        this.listener?.onFailure(transfer.identity, failure);
      } catch (listenerError) {
        this.logger.error("Failure listener failed", {
          identity: transfer.identity,
          error: errorMessage(listenerError),
        });
      }
      return;
    }

    if (transfer.cancelled) return;
    this.transfers.delete(transfer.identity);
    this.logger.debug("Transfer finished", { identity: transfer.identity, bytes: transfer.received });

    try {
      await this.listener?.onComplete(transfer.identity, transfer.tempPath);
    } catch (error) {
      this.logger.error("Completion listener failed", { identity: transfer.identity, error: errorMessage(error) });
    }
  }

  private async download(transfer: ActiveTransfer): Promise<void> {
    const { identity, controller } = transfer;

    if (transfer.received > 0) {
      // the file on disk is the truth; a crash may have left it shorter or longer
      const onDisk = await this.partialSize(transfer.tempPath);
      if (onDisk !== transfer.received) {
        this.logger.debug("Partial payload size differs from token", { identity, token: transfer.received, onDisk });
        transfer.received = onDisk;
      }
    }
    const resuming = transfer.received > 0;

    // offsets count bytes on the wire, so the body must never be decoded
    const headers: Record<string, string> = { "User-Agent": this.userAgent, "Accept-Encoding": "identity" };
    if (resuming) {
      headers.Range = `bytes=${transfer.received}-`;
      const validator = transfer.etag ?? transfer.lastModified;
      if (validator) headers["If-Range"] = validator;
    }

    const response = await this.fetchImpl(transfer.url, { headers, compress: false, signal: controller.signal });

    if (response.status === 416) {
      const total = parseContentRange(response.headers.get("content-range"))?.total ?? transfer.totalBytes;
      if (resuming && total >= 0 && transfer.received >= total) {
        transfer.totalBytes = total;
        this.logger.debug("Range not satisfiable, payload already complete", { identity, total });
        return;
      }
    }

    if (!response.ok) {
      throw fromHttpStatus(response.status, response.statusText);
    }

    const length = parseLength(response.headers.get("content-length"));
    let append: boolean;

    if (response.status === 206) {
      const range = parseContentRange(response.headers.get("content-range"));
      if (range?.start !== undefined && range.start !== transfer.received) {
        throw unrecoverable(`Server sent bytes from ${range.start}, expected ${transfer.received}`);
      }
      append = true;
      transfer.rangeCapable = true;
      transfer.totalBytes = range?.total ?? (length !== undefined ? transfer.received + length : -1);
    } else {
      if (resuming) {
        this.logger.debug("Server ignored the range, restarting from zero", { identity });
      }
      append = false;
      transfer.received = 0;
      transfer.rangeCapable = response.headers.get("accept-ranges")?.toLowerCase() === "bytes";
      transfer.totalBytes = length ?? -1;
    }

    transfer.etag = strongEtag(response.headers.get("etag")) ?? (append ? transfer.etag : undefined);
    transfer.lastModified = response.headers.get("last-modified") ?? (append ? transfer.lastModified : undefined);

    if (!response.body) {
      throw new Error("Response has no body");
    }

    await mkdir(dirname(transfer.tempPath), { recursive: true });
    this.listener?.onProgress(identity, transfer.received, transfer.totalBytes);

    const counter = new Transform({
      transform: (chunk: Buffer, _encoding, callback) => {
        transfer.received += chunk.length;
        if (!transfer.cancelled) {
          this.listener?.onProgress(identity, transfer.received, transfer.totalBytes);
        }
        callback(null, chunk);
      },
    });

    await pipeline(
      response.body,
      counter,
      createWriteStream(transfer.tempPath, { flags: append ? "a" : "w" }),
      { signal: controller.signal }
    );

    if (transfer.totalBytes >= 0 && transfer.received < transfer.totalBytes) {
      throw new Error(`Connection closed after ${transfer.received} of ${transfer.totalBytes} bytes`);
    }
  }

  /** Classify a failed task; keeps the partial file only when it can be continued */
  private async failureFor(transfer: ActiveTransfer, error: unknown): Promise<TransferFailure> {
    const message = errorMessage(error);

    if (!isDownloadError(error) || error.code === "RESUMABLE") {
      const size = await this.partialSize(transfer.tempPath);
      if (transfer.rangeCapable && size > 0) {
        this.logger.debug("Transfer failed with resumable payload", { identity: transfer.identity, offset: size });
        return {
          kind: "error",
          message,
          resumeToken: encodeCheckpoint(this.checkpoint(transfer, size)),
          cause: error,
        };
      }
    }

    await this.removePartial(transfer.tempPath);
    return { kind: "error", message, cause: error };
  }

  private checkpoint(transfer: ActiveTransfer, offset: number): TransferCheckpoint {
    return {
      version: 1,
      url: transfer.url,
      tempPath: transfer.tempPath,
      offset,
      totalBytes: transfer.totalBytes,
      ...(transfer.etag !== undefined && { etag: transfer.etag }),
      ...(transfer.lastModified !== undefined && { lastModified: transfer.lastModified }),
    };
  }

  private async partialSize(path: string): Promise<number> {
    try {
      return (await stat(path)).size;
    } catch (error) {
      this.logger.debug("No partial payload on disk", { path, error: errorMessage(error) });
      return 0;
    }
  }

  private async removePartial(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (error) {
      this.logger.warn("Failed to remove partial payload", { path, error: errorMessage(error) });
    }
  }
}
