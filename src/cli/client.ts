#!/usr/bin/env node
/**
 * pipeline-client: run the pipelining scenario against a server.
 */
import { buildRequestDescriptors } from "../client/descriptors.js";
import { runPipeline } from "../client/controller.js";
import { createScenarioObserver } from "../client/report.js";
import { HttpPipelineEngine } from "../engine/pipeline-engine.js";
import { ConfigError, ConnectionRefusedError } from "../errors.js";
import { ScenarioLog } from "../utils/log.js";
import { formatUrl } from "../utils/url.js";
import { CLIENT_USAGE, getArgv, parseClientArgs } from "./args.js";

async function main(): Promise<number> {
  let parsed: ReturnType<typeof parseClientArgs>;
  try {
    parsed = parseClientArgs(getArgv());
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    process.stderr.write(`${err.message}\n${CLIENT_USAGE}`);
    return 2;
  }
  if (parsed.help) {
    process.stdout.write(CLIENT_USAGE);
    return 0;
  }

  const { config } = parsed;
  console.log(`Connecting to '${formatUrl(config.host, config.port)}'...`);

  const engine = new HttpPipelineEngine({
    maxPipelineLength: config.maxPipelineLength,
    verbose: config.verbose,
  });
  try {
    const result = await runPipeline(engine, buildRequestDescriptors(config), {
      window: config.window,
      observer: createScenarioObserver(new ScenarioLog()),
    });
    return result.ok ? 0 : 1;
  } catch (err) {
    if (!(err instanceof ConnectionRefusedError)) throw err;
    console.log("\n\nERROR: connection refused. Are you sure the server is running?");
    return 1;
  } finally {
    engine.close();
  }
}

main().then(
  code => process.exit(code),
  (err: unknown) => {
    console.error(err);
    process.exit(1);
  },
);
