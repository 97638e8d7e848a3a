#!/usr/bin/env node
/**
 * pipeline-server: answer every request on a connection in arrival order,
 * honouring X-Sleep delays without ever letting a later reply overtake.
 */
import { ConfigError } from "../errors.js";
import { PipelineServer } from "../server/server.js";
import { SERVER_USAGE, getArgv, parseServerArgs } from "./args.js";

async function main(): Promise<number> {
  let parsed: ReturnType<typeof parseServerArgs>;
  try {
    parsed = parseServerArgs(getArgv());
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    process.stderr.write(`${err.message}\n${SERVER_USAGE}`);
    return 2;
  }
  if (parsed.help) {
    process.stdout.write(SERVER_USAGE);
    return 0;
  }

  const server = new PipelineServer(parsed.options);
  await server.listen();

  return new Promise<number>(resolve => {
    const shutdown = () => {
      server.close().then(
        () => resolve(0),
        (err: unknown) => {
          console.error(err);
          resolve(1);
        },
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });
}

main().then(
  code => process.exit(code),
  (err: unknown) => {
    console.error(err);
    process.exit(1);
  },
);
