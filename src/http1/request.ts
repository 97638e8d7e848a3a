/**
 * HTTP/1.1 request serialization for pipelined GET transfers.
 */
import { Buffer } from "node:buffer";
import { serializeHttp1Headers, validateMethod, validatePath } from "../utils/headers.js";

export interface Http1RequestHead {
  method: string;
  path: string;
  /** Host header value, including a non-default port */
  host: string;
  /** Additional headers, written in order after Host and Accept */
  headers: ReadonlyArray<readonly [string, string]>;
}

/**
 * Render a request head. The head ends with the blank line that the
 * pipelining server treats as the end of one request.
 */
export function serializeRequestHead(request: Http1RequestHead): Buffer {
  validateMethod(request.method);
  validatePath(request.path);

  const lines: Array<readonly [string, string]> = [["Host", request.host]];
  const hasAccept = request.headers.some(([name]) => name.toLowerCase() === "accept");
  if (!hasAccept) {
    lines.push(["Accept", "*/*"]);
  }
  lines.push(...request.headers.filter(([name]) => name.toLowerCase() !== "host"));

  const requestLine = `${request.method.toUpperCase()} ${request.path} HTTP/1.1\r\n`;
  return Buffer.from(`${requestLine}${serializeHttp1Headers(lines)}\r\n`, "latin1");
}

/** Host header value: the port is omitted when it is the http default */
export function hostHeader(hostname: string, port: number): string {
  const host = hostname.includes(":") ? `[${hostname}]` : hostname;
  return port === 80 ? host : `${host}:${port}`;
}
