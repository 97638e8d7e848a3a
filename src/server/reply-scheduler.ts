/**
 * Per-connection reply queue with head-of-line ordering.
 *
 * Replies leave the queue strictly in the order they were enqueued. A reply
 * carrying a delay holds back every reply behind it until its timer fires.
 * Writes are issued without waiting for earlier writes to complete: bytes on
 * one socket go out in the order the writes were issued.
 */
import type { Buffer } from "node:buffer";

export interface PendingReply {
  readonly sequence: number;
  readonly payload: Buffer;
  readonly delayMs: number;
  /** Owning connection; timers and writes refer to it by id only */
  readonly connectionId: number;
  /** True until the reply's delay has elapsed */
  gated: boolean;
}

/** Cancels a started timer */
export type CancelTimer = () => void;

export interface ReplySink {
  /** Issue the write for a dequeued reply. Completion is reported elsewhere. */
  write(reply: PendingReply): void;
  /** Start the delay timer for a gated reply; it must end in `wake(sequence)` */
  startTimer(reply: PendingReply): CancelTimer;
}

export class ReplyScheduler {
  private readonly queue: PendingReply[] = [];
  private readonly timers = new Map<number, CancelTimer>();
  private lastSequence = 0;
  private _closed = false;
  private readonly connectionId: number;
  private readonly sink: ReplySink;

  constructor(connectionId: number, sink: ReplySink) {
    this.connectionId = connectionId;
    this.sink = sink;
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Number of replies not yet written */
  get size(): number {
    return this.queue.length;
  }

  /** Sequence number of the most recently enqueued reply (0 before the first) */
  get sequence(): number {
    return this.lastSequence;
  }

  /** Snapshot of the queue, head first */
  pending(): ReadonlyArray<Readonly<PendingReply>> {
    return [...this.queue];
  }

  /**
   * Append a reply rendered for the next sequence number and write whatever
   * has become eligible. Returns null once the scheduler is closed.
   */
  enqueue(delayMs: number, render: (sequence: number) => Buffer): PendingReply | null {
    if (this._closed) return null;

    const sequence = ++this.lastSequence;
    const reply: PendingReply = {
      sequence,
      payload: render(sequence),
      delayMs,
      connectionId: this.connectionId,
      gated: delayMs > 0,
    };
    this.queue.push(reply);
    if (reply.gated) {
      this.timers.set(sequence, this.sink.startTimer(reply));
    }
    this.flush();
    return reply;
  }

  /**
   * Write replies from the head of the queue until it is empty or its head is
   * still waiting on a delay. Returns the number of replies written.
   */
  flush(): number {
    let written = 0;
    while (!this._closed && this.queue.length > 0) {
      const head = this.queue[0];
      if (head.gated) break;
      this.queue.shift();
      this.sink.write(head);
      written++;
    }
    return written;
  }

  /** A delay timer fired: release that reply and resume delivery */
  wake(sequence: number): number {
    if (this._closed) return 0;
    this.timers.delete(sequence);
    const reply = this.queue.find(r => r.sequence === sequence);
    if (!reply) return 0;
    reply.gated = false;
    return this.flush();
  }

  /** Cancel every timer and drop every queued reply without writing it */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    for (const cancel of this.timers.values()) cancel();
    this.timers.clear();
    this.queue.length = 0;
  }
}
