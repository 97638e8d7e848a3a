/**
 * Accept loop for the pipelining server.
 *
 * Connections live in a table keyed by instance id. Socket callbacks and
 * reply timers are turned into ConnectionEvents carrying that id and routed
 * through dispatch(); once a connection has left the table its late events
 * are ignored.
 */
import type { Buffer } from "node:buffer";
import net, { type AddressInfo, type Server, type Socket } from "node:net";
import { ScenarioLog } from "../utils/log.js";
import { PipelineConnection } from "./connection.js";
import type { ConnectionEvent } from "./events.js";

export interface ServerOptions {
  /** Default: 9001. 0 picks an ephemeral port. */
  port?: number;
  /** Default: all interfaces */
  host?: string;
  /** Dump request and reply bytes. Default: true */
  verbose?: boolean;
  log?: ScenarioLog;
}

export const DEFAULT_SERVER_PORT = 9001;

// setTimeout fires almost at once for delays past this
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export class PipelineServer {
  private readonly server: Server;
  private readonly connections = new Map<number, PipelineConnection>();
  private readonly log: ScenarioLog;
  private readonly verbose: boolean;
  private readonly requestedPort: number;
  private readonly host: string | undefined;
  private instanceCount = 0;

  constructor(options: ServerOptions = {}) {
    this.requestedPort = options.port ?? DEFAULT_SERVER_PORT;
    this.host = options.host;
    this.verbose = options.verbose ?? true;
    this.log = options.log ?? new ScenarioLog();
    this.server = net.createServer(socket => this.accept(socket));
  }

  /** Start listening; resolves with the bound address */
  listen(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.server.once("error", onError);
      this.server.listen({ port: this.requestedPort, host: this.host }, () => {
        this.server.removeListener("error", onError);
        this.server.on("error", err => this.log.line(`Server error: ${err.message}`));
        const address = this.address();
        this.log.line(`Listening on port ${address.port}...`);
        resolve(address);
      });
    });
  }

  address(): AddressInfo {
    const address = this.server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port");
    }
    return address;
  }

  /** Number of connections currently open */
  get connectionCount(): number {
    return this.connections.size;
  }

  connection(id: number): PipelineConnection | undefined {
    return this.connections.get(id);
  }

  /** Route an event to its connection; events for unknown ids are dropped */
  dispatch(event: ConnectionEvent): void {
    this.connections.get(event.connectionId)?.handle(event);
  }

  /** Stop accepting, close every connection and wait for the listener to shut */
  close(): Promise<void> {
    for (const connection of [...this.connections.values()]) {
      connection.close();
    }
    return new Promise((resolve, reject) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close(err => (err ? reject(err) : resolve()));
    });
  }

  private accept(socket: Socket): void {
    const id = ++this.instanceCount;
    socket.setNoDelay(true);

    const connection = new PipelineConnection(
      id,
      {
        write: (payload: Buffer, sequence: number) => {
          socket.write(payload, err => {
            this.dispatch(
              err
                ? { type: "write-error", connectionId: id, sequence, error: err }
                : { type: "written", connectionId: id, sequence, bytes: payload.length },
            );
          });
        },
        startTimer: (sequence: number, delayMs: number) => {
          const timer = setTimeout(
            () => this.dispatch({ type: "wake", connectionId: id, sequence }),
            Math.min(delayMs, MAX_TIMER_DELAY_MS),
          );
          return () => clearTimeout(timer);
        },
        close: () => {
          socket.destroy();
          this.forget(id);
        },
      },
      { log: this.log.child(`#${id}: `), verbose: this.verbose },
    );

    this.connections.set(id, connection);

    socket.on("data", (chunk: Buffer) => this.dispatch({ type: "data", connectionId: id, chunk }));
    socket.on("end", () => this.dispatch({ type: "end", connectionId: id }));
    socket.on("error", (error: NodeJS.ErrnoException) =>
      this.dispatch({ type: "read-error", connectionId: id, error }),
    );
    socket.on("close", () => {
      this.connections.get(id)?.close();
      this.forget(id);
    });

    connection.start();
  }

  private forget(id: number): void {
    this.connections.delete(id);
  }
}
