/**
 * URL parsing utility.
 * Only plain `http:` targets are accepted: the probe speaks HTTP/1.1 over TCP.
 */

export interface ParsedUrl {
  hostname: string;
  port: number;
  path: string; // includes query string, e.g. "/status?verbose=1"
}

/**
 * Parse a URL string into its components.
 */
export function parseUrl(url: string): ParsedUrl {
  const parsed = new URL(url);
  if (parsed.protocol !== "http:") {
    throw new Error(`Unsupported protocol: ${JSON.stringify(parsed.protocol)} (only http: is supported)`);
  }

  // IPv6 literals come back bracketed ("[::1]"); net.connect wants them bare
  const hostname = parsed.hostname.replace(/^\[(.*)\]$/, "$1");
  const port = parsed.port ? parseInt(parsed.port, 10) : 80;
  const path = parsed.pathname + parsed.search;

  return { hostname, port, path: path || "/" };
}

/** Key identifying the single pipelined connection used for an origin */
export function originKey(hostname: string, port: number): string {
  return `${hostname}:${port}`;
}

/** Build the target URL for a host/port pair, bracketing IPv6 literals */
export function formatUrl(hostname: string, port: number, path: string = "/"): string {
  const host = hostname.includes(":") ? `[${hostname}]` : hostname;
  return `http://${host}:${port}${path}`;
}
