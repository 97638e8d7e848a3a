import { describe, it, expect } from "vitest";
import { resolveClientConfig, sleepFor, timeoutFor } from "../../../src/client/config.js";
import { ConfigError } from "../../../src/errors.js";

describe("resolveClientConfig", () => {
  it("should default to the reference scenario", () => {
    const config = resolveClientConfig();
    expect(config.host).toBe("localhost");
    expect(config.port).toBe(9001);
    expect(config.total).toBe(10);
    expect(config.window).toBe(4);
    expect(config.timeoutMs).toBe(1000);
    expect(config.maxPipelineLength).toBe(10);
    expect(config.verbose).toBe(false);
  });

  it("should let the pipeline cap follow the total", () => {
    expect(resolveClientConfig({ total: 6 }).maxPipelineLength).toBe(6);
    expect(resolveClientConfig({ total: 6, maxPipelineLength: 2 }).maxPipelineLength).toBe(2);
  });

  it("should reject a zero window", () => {
    expect(() => resolveClientConfig({ window: 0 })).toThrow(ConfigError);
    expect(() => resolveClientConfig({ window: 0 })).toThrow("Invalid window: 0");
  });

  it("should reject an out-of-range port", () => {
    expect(() => resolveClientConfig({ port: 70000 })).toThrow(
      "Invalid port: 70000 (expected an integer from 1 to 65535)",
    );
  });

  it("should reject overrides for requests that do not exist", () => {
    expect(() => resolveClientConfig({ total: 2 })).toThrow("Invalid timeout request id: 3 (expected 0..1)");
    expect(() =>
      resolveClientConfig({ total: 2, timeouts: new Map(), sleeps: new Map([[5, 10]]) }),
    ).toThrow("Invalid sleep request id: 5 (expected 0..1)");
  });

  it("should reject extra headers that cannot be sent", () => {
    const extraHeaders = new Map([[0, [["Bad Name", "x"]] as const]]);
    expect(() => resolveClientConfig({ extraHeaders })).toThrow(ConfigError);
    expect(() => resolveClientConfig({ extraHeaders })).toThrow('Invalid header name: "Bad Name"');
  });
});

describe("per-request lookups", () => {
  const config = resolveClientConfig();

  it("should apply sleep overrides and the default", () => {
    expect(sleepFor(config, 0)).toBeNull();
    expect(sleepFor(config, 1)).toBe(1100);
    expect(sleepFor(config, 2)).toBe(100);
    expect(sleepFor(config, 9)).toBe(100);
  });

  it("should apply timeout overrides and the default", () => {
    expect(timeoutFor(config, 3)).toBe(10_000);
    expect(timeoutFor(config, 1)).toBe(1000);
  });

  it("should send no X-Sleep at all when the default is null", () => {
    const quiet = resolveClientConfig({ defaultSleepMs: null, sleeps: new Map() });
    expect(sleepFor(quiet, 4)).toBeNull();
  });
});
