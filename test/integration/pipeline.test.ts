import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolveClientConfig } from "../../src/client/config.js";
import { runPipeline } from "../../src/client/controller.js";
import { buildRequestDescriptors } from "../../src/client/descriptors.js";
import { createScenarioObserver } from "../../src/client/report.js";
import { HttpPipelineEngine } from "../../src/engine/pipeline-engine.js";
import { ConnectionRefusedError } from "../../src/errors.js";
import { PipelineServer } from "../../src/server/server.js";
import { closedPort } from "../helpers/scripted-server.js";
import { recordingLog, silentLog } from "../helpers/log.js";

function header(body: string | undefined, pattern: RegExp): string | undefined {
  return body === undefined ? undefined : pattern.exec(body)?.[1];
}

describe("client against server", () => {
  let server: PipelineServer;
  let port: number;
  let engine: HttpPipelineEngine;

  beforeEach(async () => {
    server = new PipelineServer({ port: 0, host: "127.0.0.1", verbose: false, log: silentLog() });
    port = (await server.listen()).port;
  });

  afterEach(async () => {
    engine.close();
    await server.close();
  });

  it("should pipeline every request over one connection and keep replies in order", async () => {
    const config = resolveClientConfig({
      host: "127.0.0.1",
      port,
      total: 6,
      window: 3,
      timeoutMs: 2000,
      timeouts: new Map(),
      defaultSleepMs: 20,
      sleeps: new Map([
        [0, null],
        [1, 150],
      ]),
    });
    engine = new HttpPipelineEngine({ maxPipelineLength: config.maxPipelineLength });

    const result = await runPipeline(engine, buildRequestDescriptors(config), { window: config.window });

    expect(result.ok).toBe(true);
    expect(result.maxRunning).toBe(3);
    expect(result.completions.map(t => t.id)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(result.completions.every(t => t.outcome === "success")).toBe(true);

    const bodies = result.completions.map(t => t.completion.body?.toString());
    expect(bodies.map(b => header(b, /connection (\d+)/))).toEqual(["1", "1", "1", "1", "1", "1"]);
    expect(bodies.map(b => header(b, /request #(\d+)/))).toEqual(["0", "1", "2", "3", "4", "5"]);
    expect(bodies.map(b => header(b, /Reply (\d+)/))).toEqual(["1", "2", "3", "4", "5", "6"]);
    expect(result.completions[0].completion.headers?.["x-request"]).toBe("0");
  });

  it("should time out a held request and finish the rest on a new connection", async () => {
    const config = resolveClientConfig({
      host: "127.0.0.1",
      port,
      total: 4,
      window: 4,
      timeoutMs: 300,
      timeouts: new Map([[3, 3000]]),
      defaultSleepMs: 10,
      sleeps: new Map([
        [0, null],
        [1, 600],
      ]),
    });
    engine = new HttpPipelineEngine({ maxPipelineLength: config.maxPipelineLength });
    const { log, lines } = recordingLog();

    const result = await runPipeline(engine, buildRequestDescriptors(config), {
      window: config.window,
      observer: createScenarioObserver(log),
    });

    const outcomes = new Map(result.completions.map(t => [t.id, t.outcome]));
    expect(result.ok).toBe(true);
    expect(outcomes.get(0)).toBe("success");
    expect(outcomes.get(1)).toBe("timeout");
    expect(outcomes.get(3)).toBe("success");
    expect(lines).toContain("Request    #1 TIMED OUT! [now running: 2]");
  });

  it("should stop with ConnectionRefusedError when nothing listens", async () => {
    const config = resolveClientConfig({ host: "127.0.0.1", port: await closedPort() });
    engine = new HttpPipelineEngine();

    await expect(
      runPipeline(engine, buildRequestDescriptors(config), { window: config.window }),
    ).rejects.toBeInstanceOf(ConnectionRefusedError);
  });
});
