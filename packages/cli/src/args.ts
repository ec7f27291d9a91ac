import { isLogLevel, LOG_LEVELS, type LogLevel } from "@plainhttp/engine";

export interface CliArgs {
  root: string;
  port: number;
  host: string;
  backlog: number;
  bufferSize: number;
  timeoutMs: number;
  strict: boolean;
  lf: boolean;
  quiet: boolean;
  logLevel: LogLevel;
  help: boolean;
  version: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith("-")) {
    throw new CliUsageError(`Missing value for ${flag}`);
  }
  return value;
}

function parseInteger(
  raw: string,
  flag: string,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || String(value) !== raw || value < min || value > max) {
    throw new CliUsageError(`Invalid value for ${flag}: ${raw}`);
  }
  return value;
}

export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {
    root: ".",
    port: 8080,
    host: "0.0.0.0",
    backlog: 10,
    bufferSize: 3000,
    timeoutMs: 5000,
    strict: false,
    lf: false,
    quiet: false,
    logLevel: "info",
    help: false,
    version: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p") {
      parsed.port = parseInteger(requireValue(args, ++i, arg), arg, 0, 65535);
    } else if (arg === "--host" || arg === "-H") {
      parsed.host = requireValue(args, ++i, arg);
    } else if (arg === "--backlog") {
      parsed.backlog = parseInteger(requireValue(args, ++i, arg), arg, 1);
    } else if (arg === "--buffer-size") {
      parsed.bufferSize = parseInteger(requireValue(args, ++i, arg), arg, 1);
    } else if (arg === "--timeout") {
      parsed.timeoutMs = parseInteger(requireValue(args, ++i, arg), arg, 1);
    } else if (arg === "--log-level") {
      const level = requireValue(args, ++i, arg);
      if (!isLogLevel(level)) {
        throw new CliUsageError(
          `Invalid log level: ${level} (expected one of ${LOG_LEVELS.join(", ")})`,
        );
      }
      parsed.logLevel = level;
    } else if (arg === "--strict") {
      parsed.strict = true;
    } else if (arg === "--lf") {
      parsed.lf = true;
    } else if (arg === "--quiet" || arg === "-q") {
      parsed.quiet = true;
    } else if (arg === "--version" || arg === "-v") {
      parsed.version = true;
    } else if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else if (!arg.startsWith("-")) {
      parsed.root = arg;
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return parsed;
}

export const HELP_TEXT = `
plainhttp - answer a fixed set of routes over HTTP/1.1

Usage: plainhttp [site-directory] [options]

Options:
  --port, -p <port>      Port to listen on (default: 8080)
  --host, -H <host>      Host to bind (default: 0.0.0.0)
  --backlog <n>          Pending-connection queue length (default: 10)
  --buffer-size <bytes>  Max bytes read per request (default: 3000)
  --timeout <ms>         Time allowed to receive a request (default: 5000)
  --strict               Close malformed requests instead of routing them
  --lf                   Terminate response lines with \\n instead of \\r\\n
  --log-level <level>    debug, info, warn or error (default: info)
  --quiet, -q            Only log warnings and errors
  --version, -v          Show version
  --help, -h             Show this help
`;
