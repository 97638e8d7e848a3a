/**
 * Client scenario configuration.
 *
 * Defaults reproduce the reference scenario: ten requests, four in flight,
 * request 0 warms the connection up without a delay, request 1 is held by the
 * server for 1.1 s (past its 1 s timeout), request 3 gets a 10 s timeout, and
 * every other request is delayed 100 ms.
 */
import { ConfigError } from "../errors.js";
import { validateHeaderName, validateHeaderValue } from "../utils/headers.js";

export type HeaderList = ReadonlyArray<readonly [string, string]>;

export interface ClientConfig {
  host: string;
  port: number;
  /** Total number of requests N */
  total: number;
  /** Pipeline window length W */
  window: number;
  /** Default per-request timeout in ms */
  timeoutMs: number;
  /** Per-request timeout overrides, by request id */
  timeouts: ReadonlyMap<number, number>;
  /** X-Sleep for requests without an override; null sends no X-Sleep */
  defaultSleepMs: number | null;
  /** Per-request X-Sleep overrides; null suppresses the header */
  sleeps: ReadonlyMap<number, number | null>;
  /** Extra headers sent with individual requests */
  extraHeaders: ReadonlyMap<number, HeaderList>;
  /** Engine cap on unanswered requests per connection; defaults to total */
  maxPipelineLength: number;
  verbose: boolean;
}

export const DEFAULT_CLIENT_CONFIG: Omit<ClientConfig, "maxPipelineLength"> = {
  host: "localhost",
  port: 9001,
  total: 10,
  window: 4,
  timeoutMs: 1000,
  timeouts: new Map<number, number>([[3, 10_000]]),
  defaultSleepMs: 100,
  sleeps: new Map<number, number | null>([
    [0, null],
    [1, 1100],
  ]),
  extraHeaders: new Map<number, HeaderList>(),
  verbose: false,
};

function requireInteger(name: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`Invalid ${name}: ${value} (expected an integer from ${min} to ${max})`);
  }
}

function requireRequestId(name: string, id: number, total: number): void {
  if (!Number.isInteger(id) || id < 0 || id >= total) {
    throw new ConfigError(`Invalid ${name} request id: ${id} (expected 0..${total - 1})`);
  }
}

/** Merge overrides onto the defaults and validate the result */
export function resolveClientConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  const config: ClientConfig = {
    ...DEFAULT_CLIENT_CONFIG,
    maxPipelineLength: overrides.total ?? DEFAULT_CLIENT_CONFIG.total,
    ...overrides,
  };

  if (config.host.length === 0) throw new ConfigError("Invalid host: empty");
  requireInteger("port", config.port, 1, 65535);
  requireInteger("total", config.total, 1);
  requireInteger("window", config.window, 1);
  requireInteger("timeout", config.timeoutMs, 0);
  requireInteger("maxPipelineLength", config.maxPipelineLength, 1);
  if (config.defaultSleepMs !== null) requireInteger("sleep", config.defaultSleepMs, 0);

  for (const [id, timeout] of config.timeouts) {
    requireRequestId("timeout", id, config.total);
    requireInteger(`timeout for request #${id}`, timeout, 0);
  }
  for (const [id, sleep] of config.sleeps) {
    requireRequestId("sleep", id, config.total);
    if (sleep !== null) requireInteger(`sleep for request #${id}`, sleep, 0);
  }
  for (const [id, headers] of config.extraHeaders) {
    requireRequestId("header", id, config.total);
    for (const [name, value] of headers) {
      try {
        validateHeaderName(name);
        validateHeaderValue(name, value);
      } catch (err) {
        throw new ConfigError(err instanceof Error ? err.message : String(err));
      }
    }
  }

  return config;
}

/** X-Sleep value for a request, or null when it sends none */
export function sleepFor(config: ClientConfig, id: number): number | null {
  const override = config.sleeps.get(id);
  return override !== undefined ? override : config.defaultSleepMs;
}

export function timeoutFor(config: ClientConfig, id: number): number {
  return config.timeouts.get(id) ?? config.timeoutMs;
}
