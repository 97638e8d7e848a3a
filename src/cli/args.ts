/**
 * Command-line parsing for the two executables.
 */
import { DEFAULT_CLIENT_CONFIG, resolveClientConfig, type ClientConfig } from "../client/config.js";
import { ConfigError } from "../errors.js";
import { DEFAULT_SERVER_PORT, type ServerOptions } from "../server/server.js";

export const CLIENT_USAGE =
  "usage: pipeline-client [-p port] [-n total] [-w window] [-t timeout-ms]\n" +
  "                       [-s id=sleep-ms|id=none]... [-T id=timeout-ms]...\n" +
  "                       [-H id=Name:value]... [-l max-pipeline] [-v] [host]\n";

export const SERVER_USAGE = "usage: pipeline-server [-p port] [-H host] [-q]\n";

export function getArgv(): string[] {
  const argv = process.argv.slice(2);
  // Some package managers forward an extra "--".
  if (argv[0] === "--") return argv.slice(1);
  return argv;
}

function requireValue(argv: readonly string[], index: number, flag: string): string {
  if (index >= argv.length) throw new ConfigError(`Option ${flag} requires an argument.`);
  return argv[index];
}

function parseInteger(flag: string, text: string): number {
  if (!/^\d+$/.test(text)) {
    throw new ConfigError(`Option ${flag} expects a non-negative integer, got ${JSON.stringify(text)}`);
  }
  return Number.parseInt(text, 10);
}

/** Split "id=rest" into its request id and the rest */
function parseAssignment(flag: string, text: string): [number, string] {
  const eq = text.indexOf("=");
  if (eq <= 0) {
    throw new ConfigError(`Option ${flag} expects id=value, got ${JSON.stringify(text)}`);
  }
  return [parseInteger(flag, text.substring(0, eq)), text.substring(eq + 1)];
}

export interface ParsedClientArgs {
  config: ClientConfig;
  help: boolean;
}

export function parseClientArgs(argv: readonly string[]): ParsedClientArgs {
  const overrides: Partial<ClientConfig> = {};
  const sleeps = new Map<number, number | null>();
  const timeouts = new Map<number, number>();
  const extraHeaders = new Map<number, Array<readonly [string, string]>>();
  const positional: string[] = [];
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "-h":
      case "--help":
        help = true;
        break;
      case "-p":
      case "--port":
        overrides.port = parseInteger(arg, requireValue(argv, ++i, arg));
        break;
      case "-n":
      case "--total":
        overrides.total = parseInteger(arg, requireValue(argv, ++i, arg));
        break;
      case "-w":
      case "--window":
        overrides.window = parseInteger(arg, requireValue(argv, ++i, arg));
        break;
      case "-t":
      case "--timeout":
        overrides.timeoutMs = parseInteger(arg, requireValue(argv, ++i, arg));
        break;
      case "-l":
      case "--max-pipeline":
        overrides.maxPipelineLength = parseInteger(arg, requireValue(argv, ++i, arg));
        break;
      case "-s":
      case "--sleep": {
        const [id, value] = parseAssignment(arg, requireValue(argv, ++i, arg));
        sleeps.set(id, value === "none" ? null : parseInteger(arg, value));
        break;
      }
      case "-T":
      case "--request-timeout": {
        const [id, value] = parseAssignment(arg, requireValue(argv, ++i, arg));
        timeouts.set(id, parseInteger(arg, value));
        break;
      }
      case "-H":
      case "--header": {
        const [id, header] = parseAssignment(arg, requireValue(argv, ++i, arg));
        const colon = header.indexOf(":");
        if (colon <= 0) {
          throw new ConfigError(`Option ${arg} expects id=Name:value, got ${JSON.stringify(header)}`);
        }
        const list = extraHeaders.get(id) ?? [];
        list.push([header.substring(0, colon).trim(), header.substring(colon + 1).trim()]);
        extraHeaders.set(id, list);
        break;
      }
      case "-v":
      case "--verbose":
        overrides.verbose = true;
        break;
      default:
        if (arg.startsWith("-")) throw new ConfigError(`Unknown option \`${arg}'.`);
        positional.push(arg);
    }
  }

  if (positional.length > 1) {
    throw new ConfigError(`Unexpected arguments: ${positional.slice(1).join(" ")}`);
  }
  if (positional.length === 1) overrides.host = positional[0];

  // Command-line assignments extend the default scenario rather than replace it
  const total = overrides.total ?? DEFAULT_CLIENT_CONFIG.total;
  const inRange = <T>(map: ReadonlyMap<number, T>): Array<[number, T]> =>
    [...map].filter(([id]) => id < total);
  overrides.sleeps = new Map([...inRange(DEFAULT_CLIENT_CONFIG.sleeps), ...sleeps]);
  overrides.timeouts = new Map([...inRange(DEFAULT_CLIENT_CONFIG.timeouts), ...timeouts]);
  if (extraHeaders.size > 0) overrides.extraHeaders = extraHeaders;

  return { config: resolveClientConfig(overrides), help };
}

export interface ParsedServerArgs {
  options: Required<Pick<ServerOptions, "port" | "verbose">> & Pick<ServerOptions, "host">;
  help: boolean;
}

export function parseServerArgs(argv: readonly string[]): ParsedServerArgs {
  let port = DEFAULT_SERVER_PORT;
  let host: string | undefined;
  let verbose = true;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "-h":
      case "--help":
        help = true;
        break;
      case "-p":
      case "--port":
        port = parseInteger(arg, requireValue(argv, ++i, arg));
        if (port > 65535) throw new ConfigError(`Invalid port: ${port}`);
        break;
      case "-H":
      case "--host":
        host = requireValue(argv, ++i, arg);
        break;
      case "-q":
      case "--quiet":
        verbose = false;
        break;
      default:
        throw new ConfigError(`Unknown option \`${arg}'.`);
    }
  }

  return { options: { port, host, verbose }, help };
}
