/**
 * Multi-transfer engine contract.
 *
 * The engine runs many HTTP transfers at once without blocking: perform()
 * advances every transfer as far as it can go right now, completions are
 * read back one at a time, and wait() suspends until socket activity or a
 * timeout gives perform() something new to do.
 */
import type { Buffer } from "node:buffer";

export interface TransferRequest {
  url: string;
  /** Written in order after Host and Accept */
  headers: ReadonlyArray<readonly [string, string]>;
  /** Whole-transfer timeout in ms, counted from add(). 0 disables it. */
  timeoutMs: number;
}

/** Engine-assigned identity of one transfer; compare by reference */
export class TransferHandle {
  readonly serial: number;

  constructor(serial: number) {
    this.serial = serial;
  }

  toString(): string {
    return `transfer#${this.serial}`;
  }
}

export type TransferCode =
  | "ok"
  | "operation-timedout"
  | "couldnt-connect"
  | "couldnt-resolve-host"
  | "send-error"
  | "recv-error"
  | "got-nothing"
  | "weird-server-reply";

export interface Completion {
  handle: TransferHandle;
  code: TransferCode;
  /** Present when code is "ok" */
  status?: number;
  headers?: Record<string, string>;
  body?: Buffer;
  /** Underlying cause for any other code */
  error?: Error;
}

/**
 * "ready": something happened that perform() should look at.
 * "timeout": the timeout elapsed quietly.
 * "interrupted": the wait ended without any transfer work to do.
 */
export type WaitOutcome = "ready" | "timeout" | "interrupted";

export interface TransferEngine {
  add(request: TransferRequest): TransferHandle;
  /** Non-blocking pump; returns the number of transfers still active */
  perform(): number;
  /** Pop one completion, or null when none is available */
  readCompletion(): Completion | null;
  /** Ms until perform() is due regardless of socket activity; -1 when never */
  timeoutHint(): number;
  /** Rejects with WaitError on a hard failure */
  wait(timeoutMs: number): Promise<WaitOutcome>;
  close(): void;
}
