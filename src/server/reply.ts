/**
 * Fixed reply template for the pipelining server.
 */
import { Buffer } from "node:buffer";

export interface ReplyFields {
  /** Per-connection reply sequence number, starting at 1 */
  sequence: number;
  connectionId: number;
  requestId: number;
}

export function renderReplyBody({ sequence, connectionId, requestId }: ReplyFields): string {
  return `<html><body>Reply ${sequence} on connection ${connectionId} for request #${requestId}</body></html>\n`;
}

/**
 * Render the complete response bytes. Content-Length counts the body bytes
 * after the blank line, trailing newline included.
 */
export function renderReply(fields: ReplyFields): Buffer {
  const body = renderReplyBody(fields);
  const head =
    "HTTP/1.1 200 OK\r\n" +
    "Keep-Alive: timeout=10 max=400\r\n" +
    `Content-Length: ${Buffer.byteLength(body, "latin1")}\r\n` +
    "Content-Type: text/html\r\n" +
    `X-Connection: ${fields.connectionId}\r\n` +
    `X-Request: ${fields.requestId}\r\n` +
    `X-Reply: ${fields.sequence}\r\n` +
    "\r\n";
  return Buffer.from(head + body, "latin1");
}
