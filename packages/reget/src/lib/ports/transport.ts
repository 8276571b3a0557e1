/**
 * Abstraction over the network layer that actually moves bytes.
 * The engine never speaks HTTP itself; any client that honours this
 * contract (range requests, resumable cancellation) can drive it.
 */

/** Opaque blob that lets a transport continue a partial transfer. */
export type ResumeToken = Uint8Array;

/** Strictly increasing handle for one live transfer task. */
export type TransferIdentity = number;

export type TransferFailure =
  | { kind: "cancelled" }
  | {
      kind: "error";
      message: string;
      /** Present when the partial payload can be continued later */
      resumeToken?: ResumeToken;
      cause?: unknown;
    };

/**
 * Event channel from the transport back to the engine.
 * Implementations must never call these synchronously from `issue*`, and
 * must not emit progress for an identity after its completion or failure.
 */
export interface TransferEventListener {
  onProgress(identity: TransferIdentity, bytesReceived: number, bytesExpected: number): void;
  onFailure(identity: TransferIdentity, failure: TransferFailure): void;
  onComplete(identity: TransferIdentity, location: string): void | Promise<void>;
}

export interface TransferTransport {
  /** Route all future events to `listener` (replaces any previous one) */
  bind(listener: TransferEventListener): void;
  issueNewTransfer(url: URL): TransferIdentity;
  /** Throws when the token is unreadable or was produced by another transport */
  issueResumedTransfer(token: ResumeToken): TransferIdentity;
  /**
   * Stop a live transfer. With `produceToken` the partial payload is kept and
   * a token describing it is returned (when the transfer can be continued).
   */
  cancel(identity: TransferIdentity, produceToken: boolean): Promise<ResumeToken | undefined>;
  /** Identities of transfers still running, oldest first */
  liveTransfers(): Promise<TransferIdentity[]>;
  /** Drop the partial payload a token refers to */
  discard(token: ResumeToken): Promise<void>;
}
