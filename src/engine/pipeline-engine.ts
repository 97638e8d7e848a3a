/**
 * HTTP/1.1 multi-transfer engine over node:net with request pipelining.
 *
 * Each origin gets one persistent connection. Until that connection has
 * answered once with a reusable HTTP/1.1 response, only one request is written
 * to it; after that, queued requests are written back to back (up to
 * maxPipelineLength unanswered) and responses are matched to them in write
 * order.
 *
 * Socket callbacks only record what happened and wake wait(); all parsing,
 * completion and timeout handling runs inside perform().
 */
import { Buffer } from "node:buffer";
import net, { type Socket } from "node:net";
import { WaitError } from "../errors.js";
import { ChunkedDecoder } from "../http1/chunked.js";
import { MalformedResponseError, parseResponseHead, type ParsedResponse } from "../http1/parser.js";
import { hostHeader, serializeRequestHead } from "../http1/request.js";
import { originKey, parseUrl, type ParsedUrl } from "../utils/url.js";
import {
  TransferHandle,
  type Completion,
  type TransferCode,
  type TransferEngine,
  type TransferRequest,
  type WaitOutcome,
} from "./types.js";

export interface PipelineEngineOptions {
  /** Max written-but-unanswered requests per connection. Default: 5 */
  maxPipelineLength?: number;
  /** Trace connection activity with console.debug. Default: false */
  verbose?: boolean;
}

/** A transfer is written at most this many times before its loss is final */
const MAX_ATTEMPTS = 2;

// Limit header size to 80KB to prevent memory exhaustion
const MAX_HEAD_SIZE = 81920;

interface Transfer {
  readonly handle: TransferHandle;
  readonly target: ParsedUrl;
  readonly origin: string;
  readonly head: Buffer;
  readonly timeoutMs: number;
  readonly deadline: number;
  attempts: number;
  connection: OriginConnection | null;
}

interface ResponseInProgress {
  parsed: ParsedResponse;
  body: Buffer[];
  received: number;
  chunked: ChunkedDecoder | null;
}

interface OriginConnection {
  readonly id: number;
  readonly origin: string;
  readonly socket: Socket;
  phase: "connecting" | "open" | "closed";
  /** Written requests awaiting their responses, oldest first */
  sent: Transfer[];
  buffer: Buffer;
  response: ResponseInProgress | null;
  /** The server answered with a reusable HTTP/1.1 response */
  pipelining: boolean;
  /** The server announced it will close after the current response */
  retiring: boolean;
  ended: boolean;
  error: NodeJS.ErrnoException | null;
  writeFailed: boolean;
}

export class HttpPipelineEngine implements TransferEngine {
  private readonly transfers = new Map<TransferHandle, Transfer>();
  private readonly connections = new Map<string, OriginConnection>();
  private readonly completions: Completion[] = [];
  private queue: Transfer[] = [];
  private waiter: ((outcome: WaitOutcome) => void) | null = null;
  private dirty = false;
  private closed = false;
  private nextSerial = 1;
  private nextConnectionId = 1;
  private readonly maxPipelineLength: number;
  private readonly verbose: boolean;

  constructor(options: PipelineEngineOptions = {}) {
    const maxPipelineLength = options.maxPipelineLength ?? 5;
    if (!Number.isInteger(maxPipelineLength) || maxPipelineLength < 1) {
      throw new Error(`Invalid maxPipelineLength: ${maxPipelineLength}`);
    }
    this.maxPipelineLength = maxPipelineLength;
    this.verbose = options.verbose ?? false;
  }

  /** Number of transfers added and not yet completed */
  get activeCount(): number {
    return this.transfers.size;
  }

  /** Number of open (or opening) connections */
  get connectionCount(): number {
    return this.connections.size;
  }

  add(request: TransferRequest): TransferHandle {
    if (this.closed) throw new Error("Engine is closed");

    const target = parseUrl(request.url);
    const head = serializeRequestHead({
      method: "GET",
      path: target.path,
      host: hostHeader(target.hostname, target.port),
      headers: request.headers,
    });
    const handle = new TransferHandle(this.nextSerial++);
    const transfer: Transfer = {
      handle,
      target,
      origin: originKey(target.hostname, target.port),
      head,
      timeoutMs: request.timeoutMs,
      deadline: request.timeoutMs > 0 ? Date.now() + request.timeoutMs : Infinity,
      attempts: 0,
      connection: null,
    };
    this.transfers.set(handle, transfer);
    this.queue.push(transfer);
    this.dirty = true;
    return handle;
  }

  perform(): number {
    if (this.closed) return 0;
    this.dirty = false;

    for (const connection of [...this.connections.values()]) {
      this.service(connection);
    }
    this.expire(Date.now());
    this.dispatch();

    return this.transfers.size;
  }

  readCompletion(): Completion | null {
    return this.completions.shift() ?? null;
  }

  timeoutHint(): number {
    if (this.dirty) return 0;
    let earliest = Infinity;
    for (const transfer of this.transfers.values()) {
      earliest = Math.min(earliest, transfer.deadline);
    }
    if (earliest === Infinity) return -1;
    return Math.max(0, earliest - Date.now());
  }

  async wait(timeoutMs: number): Promise<WaitOutcome> {
    if (this.closed) throw new WaitError("wait() called on a closed engine");
    if (this.waiter) throw new WaitError("wait() is already in progress");
    if (this.dirty) return "ready";

    return new Promise<WaitOutcome>(resolve => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve("timeout");
      }, Math.max(0, timeoutMs));
      this.waiter = outcome => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(outcome);
      };
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const connection of [...this.connections.values()]) {
      this.destroyConnection(connection);
    }
    this.transfers.clear();
    this.queue = [];
    this.waiter?.("interrupted");
  }

  private notify(outcome: WaitOutcome): void {
    if (outcome === "ready") this.dirty = true;
    this.waiter?.(outcome);
  }

  private debug(message: string): void {
    if (this.verbose) console.debug(`[engine] ${message}`);
  }

  // ── Dispatch ──

  private dispatch(): void {
    const waiting: Transfer[] = [];
    for (const transfer of this.queue) {
      const connection = this.connectionFor(transfer);
      if (!this.canAccept(connection)) {
        waiting.push(transfer);
        continue;
      }
      this.send(connection, transfer);
    }
    this.queue = waiting;
  }

  private connectionFor(transfer: Transfer): OriginConnection {
    return this.connections.get(transfer.origin) ?? this.openConnection(transfer);
  }

  private canAccept(connection: OriginConnection): boolean {
    if (connection.phase === "closed" || connection.retiring) return false;
    if (connection.sent.length === 0) return true;
    return connection.pipelining && connection.sent.length < this.maxPipelineLength;
  }

  private send(connection: OriginConnection, transfer: Transfer): void {
    transfer.attempts++;
    transfer.connection = connection;
    connection.sent.push(transfer);
    this.debug(
      `conn ${connection.id}: write ${transfer.handle} (${connection.sent.length} in pipeline)`,
    );
    connection.socket.write(transfer.head, err => {
      if (err && connection.phase !== "closed") {
        connection.error ??= err;
        connection.writeFailed = true;
        this.notify("ready");
      }
    });
  }

  private openConnection(transfer: Transfer): OriginConnection {
    const socket = net.connect({ host: transfer.target.hostname, port: transfer.target.port });
    socket.setNoDelay(true);

    const connection: OriginConnection = {
      id: this.nextConnectionId++,
      origin: transfer.origin,
      socket,
      phase: "connecting",
      sent: [],
      buffer: Buffer.alloc(0),
      response: null,
      pipelining: false,
      retiring: false,
      ended: false,
      error: null,
      writeFailed: false,
    };
    this.debug(`conn ${connection.id}: connect(${transfer.origin})`);

    socket.on("connect", () => {
      if (connection.phase !== "connecting") return;
      connection.phase = "open";
      this.notify("ready");
    });
    socket.on("data", (chunk: Buffer) => {
      if (connection.phase === "closed") return;
      connection.buffer =
        connection.buffer.length > 0 ? Buffer.concat([connection.buffer, chunk]) : chunk;
      this.notify("ready");
    });
    socket.on("end", () => {
      if (connection.phase === "closed") return;
      connection.ended = true;
      this.notify("ready");
    });
    socket.on("error", (err: NodeJS.ErrnoException) => {
      if (connection.phase === "closed") return;
      connection.error ??= err;
      this.notify("ready");
    });
    socket.on("close", () => {
      if (connection.phase === "closed") return;
      connection.ended = true;
      this.notify("ready");
    });
    socket.on("drain", () => this.notify("interrupted"));

    this.connections.set(connection.origin, connection);
    return connection;
  }

  // ── Reading ──

  private service(connection: OriginConnection): void {
    if (connection.phase === "closed") return;

    if (!this.readResponses(connection)) return;

    if (connection.error || connection.ended) {
      this.teardown(connection);
    } else if (connection.retiring && connection.sent.length === 0) {
      this.debug(`conn ${connection.id}: retired by server`);
      this.destroyConnection(connection);
    }
  }

  /**
   * Parse as many complete responses as the buffer holds.
   * Returns false when the connection was torn down along the way.
   */
  private readResponses(connection: OriginConnection): boolean {
    for (;;) {
      if (!connection.response) {
        if (connection.buffer.length === 0) return true;

        let result: ReturnType<typeof parseResponseHead>;
        try {
          result = parseResponseHead(connection.buffer);
        } catch (err) {
          if (!(err instanceof MalformedResponseError)) throw err;
          this.failHead(connection, "weird-server-reply", err);
          return false;
        }

        if (!result) {
          if (connection.buffer.length > MAX_HEAD_SIZE) {
            this.failHead(
              connection,
              "weird-server-reply",
              new Error("Response headers too large (>80KB)"),
            );
            return false;
          }
          return true; // need more data for headers
        }

        // Skip 100 Continue intermediate responses
        if (result.response.status === 100) {
          connection.buffer = connection.buffer.subarray(result.bodyStart);
          continue;
        }

        if (connection.sent.length === 0) {
          this.debug(`conn ${connection.id}: response with no request outstanding`);
          this.teardownWith(connection, new Error("Unsolicited response"));
          return false;
        }

        connection.buffer = connection.buffer.subarray(result.bodyStart);
        connection.response = {
          parsed: result.response,
          body: [],
          received: 0,
          chunked: result.response.bodyMode === "chunked" ? new ChunkedDecoder() : null,
        };
      }

      const response = connection.response;
      if (!this.readBody(connection, response)) return connection.phase !== "closed";
      this.finishResponse(connection, response);
    }
  }

  /** Returns true once the body of the current response is complete */
  private readBody(connection: OriginConnection, response: ResponseInProgress): boolean {
    const { parsed } = response;

    if (parsed.bodyMode === "content-length") {
      const remaining = parsed.contentLength - response.received;
      const take = Math.min(remaining, connection.buffer.length);
      if (take > 0) {
        response.body.push(connection.buffer.subarray(0, take));
        response.received += take;
        connection.buffer = connection.buffer.subarray(take);
      }
      return response.received >= parsed.contentLength;
    }

    if (response.chunked) {
      if (connection.buffer.length === 0) return false;
      const decoder = response.chunked;
      try {
        decoder.feed(connection.buffer);
      } catch (err) {
        this.failHead(
          connection,
          "weird-server-reply",
          err instanceof Error ? err : new Error(String(err)),
        );
        return false;
      }
      connection.buffer = Buffer.alloc(0);
      for (const chunk of decoder.getChunks()) {
        response.body.push(chunk);
        response.received += chunk.length;
      }
      if (!decoder.done) return false;
      connection.buffer = decoder.remainder;
      return true;
    }

    // "close" mode: everything until the connection ends
    if (connection.buffer.length > 0) {
      response.body.push(connection.buffer);
      response.received += connection.buffer.length;
      connection.buffer = Buffer.alloc(0);
    }
    return false;
  }

  private finishResponse(connection: OriginConnection, response: ResponseInProgress): void {
    connection.response = null;
    const transfer = connection.sent.shift();
    if (!transfer) return;

    if (response.parsed.keepAlive) {
      if (!connection.pipelining) this.debug(`conn ${connection.id}: pipelining confirmed`);
      connection.pipelining = true;
    } else {
      connection.retiring = true;
    }

    this.complete(transfer, "ok", {
      status: response.parsed.status,
      headers: response.parsed.headers,
      body: Buffer.concat(response.body),
    });
  }

  // ── Failure handling ──

  /** Fail the transfer at the head of the pipeline and drop the connection */
  private failHead(connection: OriginConnection, code: TransferCode, error: Error): void {
    const head = connection.sent.shift();
    connection.response = null;
    if (head) this.complete(head, code, { error });
    this.teardownWith(connection, error);
  }

  private teardownWith(connection: OriginConnection, error: Error): void {
    connection.error ??= error;
    this.teardown(connection);
  }

  /** The connection is gone: settle or re-queue everything written to it */
  private teardown(connection: OriginConnection): void {
    const { error } = connection;
    const response = connection.response;

    if (!error && response && response.parsed.bodyMode === "close") {
      this.finishResponse(connection, response);
    }

    const connectFailed = connection.phase === "connecting" && error !== null;
    const partial = connection.response !== null;
    const pending = connection.sent.splice(0);
    this.debug(
      `conn ${connection.id}: lost (${error?.code ?? error?.message ?? "eof"}), ${pending.length} unanswered`,
    );
    this.destroyConnection(connection);

    pending.forEach((transfer, index) => {
      if (connectFailed && error) {
        this.complete(transfer, connectErrorCode(error), { error });
      } else if (index === 0 && partial) {
        this.complete(transfer, "recv-error", {
          error: error ?? new Error("Connection closed mid-response"),
        });
      } else {
        const lostCode: TransferCode = !error
          ? "got-nothing"
          : connection.writeFailed
            ? "send-error"
            : "recv-error";
        this.requeue(transfer, lostCode, error ?? new Error("Empty reply from server"));
      }
    });
  }

  private requeue(transfer: Transfer, lostCode: TransferCode, error: Error): void {
    transfer.connection = null;
    if (transfer.attempts >= MAX_ATTEMPTS) {
      this.complete(transfer, lostCode, { error });
      return;
    }
    this.queue.push(transfer);
    this.queue.sort((a, b) => a.handle.serial - b.handle.serial);
    this.dirty = true;
  }

  private expire(now: number): void {
    for (const transfer of [...this.transfers.values()]) {
      if (transfer.deadline > now) continue;

      const connection = transfer.connection;
      this.complete(transfer, "operation-timedout", {
        error: new Error(`Operation timed out after ${transfer.timeoutMs} ms`),
      });

      // Its response would otherwise be taken as the answer to the next request
      if (connection && connection.phase !== "closed") {
        const others = connection.sent.splice(0);
        this.debug(`conn ${connection.id}: dropped after timeout of ${transfer.handle}`);
        this.destroyConnection(connection);
        for (const other of others) {
          this.requeue(other, "recv-error", new Error("Pipeline reset after a timeout"));
        }
      }
    }
  }

  private complete(
    transfer: Transfer,
    code: TransferCode,
    detail: Omit<Completion, "handle" | "code">,
  ): void {
    if (!this.transfers.delete(transfer.handle)) return;

    const connection = transfer.connection;
    if (connection) {
      const index = connection.sent.indexOf(transfer);
      if (index !== -1) connection.sent.splice(index, 1);
    }
    transfer.connection = null;

    const queued = this.queue.indexOf(transfer);
    if (queued !== -1) this.queue.splice(queued, 1);

    this.debug(`${transfer.handle} done: ${code}`);
    this.completions.push({ handle: transfer.handle, code, ...detail });
  }

  private destroyConnection(connection: OriginConnection): void {
    connection.phase = "closed";
    connection.response = null;
    connection.socket.destroy();
    if (this.connections.get(connection.origin) === connection) {
      this.connections.delete(connection.origin);
    }
  }
}

function connectErrorCode(error: NodeJS.ErrnoException): TransferCode {
  return error.code === "ENOTFOUND" || error.code === "EAI_AGAIN"
    ? "couldnt-resolve-host"
    : "couldnt-connect";
}
