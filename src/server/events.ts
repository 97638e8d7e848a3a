/**
 * Completion events delivered to connections.
 *
 * Socket callbacks and reply timers never hold a connection object; they
 * carry its id and are routed through the server's connection table, so an
 * event for a connection that has already gone away is simply dropped.
 */
import type { Buffer } from "node:buffer";

export type ConnectionEvent =
  | { type: "data"; connectionId: number; chunk: Buffer }
  | { type: "end"; connectionId: number }
  | { type: "read-error"; connectionId: number; error: NodeJS.ErrnoException }
  | { type: "written"; connectionId: number; sequence: number; bytes: number }
  | { type: "write-error"; connectionId: number; sequence: number; error: Error }
  | { type: "wake"; connectionId: number; sequence: number };

export type ConnectionEventType = ConnectionEvent["type"];
