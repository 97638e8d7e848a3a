/**
 * One accepted client connection.
 *
 * Incoming bytes are fed one at a time to the end-of-request matcher and the
 * header/control parser. Control headers seen before the blank line set the
 * delay and echoed id for that request; the blank line enqueues its reply.
 * Reading never stops while replies are pending: that is what lets a client
 * pipeline.
 */
import type { Buffer } from "node:buffer";
import { REQUEST_ID_HEADER, SLEEP_HEADER, isControlHeader, parseControlValue } from "../http1/control.js";
import type { ScenarioLog } from "../utils/log.js";
import { READING_PREFIX, WRITING_PREFIX, formatWireLines } from "../utils/wire.js";
import type { ConnectionEvent } from "./events.js";
import { HeaderLineParser } from "./header-parser.js";
import { renderReply } from "./reply.js";
import { ReplyScheduler, type CancelTimer, type PendingReply } from "./reply-scheduler.js";
import { TerminatorMatcher } from "./terminator.js";

/** Socket and timer operations a connection needs; all results come back as events */
export interface ConnectionIo {
  write(payload: Buffer, sequence: number): void;
  startTimer(sequence: number, delayMs: number): CancelTimer;
  close(): void;
}

export interface ConnectionOptions {
  log: ScenarioLog;
  /** Dump every chunk read and reply written. Default: true */
  verbose?: boolean;
}

/** Control values recorded for the request currently being read */
interface RequestControls {
  delayMs: number;
  requestId: number;
}

export class PipelineConnection {
  readonly id: number;
  private readonly io: ConnectionIo;
  private readonly log: ScenarioLog;
  private readonly verbose: boolean;
  private readonly matcher = new TerminatorMatcher();
  private readonly header = new HeaderLineParser();
  private readonly scheduler: ReplyScheduler;
  private controls: RequestControls = { delayMs: 0, requestId: 0 };
  private _closed = false;

  constructor(id: number, io: ConnectionIo, options: ConnectionOptions) {
    this.id = id;
    this.io = io;
    this.log = options.log;
    this.verbose = options.verbose ?? true;
    this.scheduler = new ReplyScheduler(id, {
      write: reply => this.writeReply(reply),
      startTimer: reply => this.io.startTimer(reply.sequence, reply.delayMs),
    });
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Replies enqueued but not yet written */
  get pendingReplies(): number {
    return this.scheduler.size;
  }

  /** Number of requests completed on this connection so far */
  get requestCount(): number {
    return this.scheduler.sequence;
  }

  start(): void {
    this.log.line("Accepted a new client.");
  }

  handle(event: ConnectionEvent): void {
    switch (event.type) {
      case "data":
        this.receive(event.chunk);
        break;
      case "wake":
        this.scheduler.wake(event.sequence);
        break;
      case "written":
        this.log.line(`Wrote ${event.bytes} bytes.`);
        break;
      case "write-error":
        this.log.line(`Error ${event.error.message} writing data.`);
        break;
      case "end":
        this.log.line("End of input. Closing connection.");
        this.close();
        break;
      case "read-error":
        // Aborted reads are our own shutdown, not a peer failure
        if (event.error.code !== "ECONNABORTED") {
          this.log.line(`Error ${event.error.code ?? event.error.message}. Closing connection.`);
        }
        this.close();
        break;
    }
  }

  /** Feed one chunk read from the socket */
  receive(chunk: Buffer): void {
    if (this._closed) return;
    if (this.verbose) {
      this.log.line(`Read ${chunk.length} bytes:`);
      this.log.raw(...formatWireLines(chunk, READING_PREFIX));
    }

    for (const byte of chunk) {
      this.matcher.feed(byte);
      this.header.feed(byte);

      if (this.matcher.matched) {
        this.matcher.reset();
        this.header.reset();
        this.queueReply(this.controls);
        this.controls = { delayMs: 0, requestId: 0 };
        continue;
      }

      const field = this.header.field;
      if (field === null) continue;
      if (isControlHeader(field.key, SLEEP_HEADER)) {
        this.controls.delayMs = parseControlValue(field.value);
      } else if (isControlHeader(field.key, REQUEST_ID_HEADER)) {
        this.controls.requestId = parseControlValue(field.value);
      }
    }
  }

  /** Drop every queued reply and timer, then close the socket */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.scheduler.close();
    this.io.close();
  }

  private queueReply(controls: RequestControls): void {
    this.scheduler.enqueue(controls.delayMs, sequence =>
      renderReply({ sequence, connectionId: this.id, requestId: controls.requestId }),
    );
  }

  private writeReply(reply: PendingReply): void {
    if (this.verbose) {
      this.log.line("Writing reply:");
      this.log.raw(...formatWireLines(reply.payload, WRITING_PREFIX));
    }
    this.io.write(reply.payload, reply.sequence);
  }
}
