#!/usr/bin/env node
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  basicLogger,
  createNodeServer,
  defaultConfig,
  filteredLogger,
  type ServerConfig,
} from "@plainhttp/engine";
import { type CliArgs, CliUsageError, HELP_TEXT, parseArgs } from "./args.js";

async function readVersion(): Promise<string> {
  const packageJson = new URL("../package.json", import.meta.url);
  const parsed: unknown = JSON.parse(await fs.readFile(packageJson, "utf8"));
  if (
    parsed &&
    typeof parsed === "object" &&
    "version" in parsed &&
    typeof parsed.version === "string"
  ) {
    return parsed.version;
  }
  return "unknown";
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    console.error(err.message);
    console.log(HELP_TEXT);
    process.exitCode = 1;
    return;
  }

  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }
  if (args.version) {
    console.log(await readVersion());
    return;
  }

  const root = path.resolve(args.root);
  const logger = filteredLogger(args.quiet ? "warn" : args.logLevel, basicLogger());

  const config: ServerConfig = {
    ...defaultConfig(root),
    port: args.port,
    host: args.host,
    backlog: args.backlog,
    readBufferSize: args.bufferSize,
    requestTimeoutMs: args.timeoutMs,
    strictParsing: args.strict,
    lineEnding: args.lf ? "\n" : "\r\n",
    quiet: args.quiet,
  };

  const server = createNodeServer({ config, logger });
  const port = await server.start();

  console.log(`\n  plainhttp serving ${root}\n`);
  console.log(`  Local:   http://localhost:${port}`);
  console.log();

  const shutdown = () => {
    console.log("\nShutting down...");
    server.stop().then(() => process.exit(0), fatal);
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

function fatal(err: unknown): never {
  console.error("Fatal error:", err);
  process.exit(1);
}

main().catch(fatal);
