#!/usr/bin/env node
import { FileServer, type FileServerOptions } from "../src/file-server";
import { ProxyServer, type ProxyServerOptions } from "../src/proxy-server";
import type { MultiplexServer } from "../src/multiplex-server";
import { MuxClient } from "../src/mux-client";
import type { FrameEncoding } from "../src/frame-protocol";
import { parseDebugList, type DebugFlag, type DebugLogFn } from "../src/debug";

type CommonArgs = {
  host?: string;
  port?: number;
  frameEncoding?: FrameEncoding;
  idleTimeoutMs?: number;
  debug?: DebugFlag[];
};

type ServeArgs = CommonArgs & {
  root?: string;
  defaultFile?: string;
  restricted: string[];
};

type ProxyArgs = CommonArgs & {
  origin?: string;
  upstreamTimeoutMs?: number;
};

type GetArgs = {
  host: string;
  port: number;
  paths: string[];
  headers: Record<string, string>;
};

function renderCliError(err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(message);
}

function usage() {
  console.log("Usage: holmux <command> [options]");
  console.log("Commands:");
  console.log("  serve        Serve files, multiplexing STREAM-ID requests");
  console.log("  proxy        Forward requests to their origin, multiplexing STREAM-ID requests");
  console.log("  get          Fetch paths over one multiplexed connection");
  console.log("  help         Show this help");
  console.log("\nRun holmux <command> --help for command-specific flags.");
}

function commonUsage(defaultPort: number) {
  console.log("  --host HOST                 Address to bind (default 127.0.0.1)");
  console.log(`  --port PORT                 Port to bind (default ${defaultPort})`);
  console.log("  --framing MODE              length-prefixed (default) or delimited");
  console.log("  --idle-timeout MS           Close idle connections after MS (0 = never)");
  console.log("  --debug LIST                Debug components: http,conn,frame,relay or all");
  console.log("                              (also read from HOLMUX_DEBUG)");
}

function serveUsage() {
  console.log("Usage: holmux serve [options]");
  console.log();
  console.log("Options:");
  commonUsage(8080);
  console.log("  --root DIR                  Directory to serve (default .)");
  console.log("  --default-file NAME         File served for / (default test.html)");
  console.log("  --restrict PATH             Answer PATH with 403 (can repeat,");
  console.log("                              default private.html)");
}

function proxyUsage() {
  console.log("Usage: holmux proxy [options]");
  console.log();
  console.log("Options:");
  commonUsage(8081);
  console.log("  --origin HOST:PORT          Origin for requests without Host (default 127.0.0.1:8080)");
  console.log("  --upstream-timeout MS       Upstream connect/idle deadline (default 10000)");
}

function getUsage() {
  console.log("Usage: holmux get [options] PATH [PATH...]");
  console.log();
  console.log("Options:");
  console.log("  --host HOST                 Server address (default 127.0.0.1)");
  console.log("  --port PORT                 Server port (default 8080)");
  console.log("  --header 'NAME: VALUE'      Extra request header (can repeat)");
}

function parseNumber(flag: string, raw: string | undefined, fail: (message: string) => never): number {
  const value = Number(raw);
  if (raw === undefined || !Number.isFinite(value)) fail(`${flag} must be a number`);
  return value;
}

function parseFraming(raw: string | undefined, fail: (message: string) => never): FrameEncoding {
  if (raw === "length-prefixed" || raw === "delimited") return raw;
  return fail("--framing must be length-prefixed or delimited");
}

/**
 * Parses a flag shared by serve and proxy. Returns false when `arg` is not
 * one of them.
 */
function parseCommonArg(
  args: CommonArgs,
  arg: string,
  next: () => string | undefined,
  fail: (message: string) => never,
): boolean {
  switch (arg) {
    case "--host":
      args.host = next() ?? fail("--host requires a value");
      return true;
    case "--port":
      args.port = parseNumber("--port", next(), fail);
      return true;
    case "--framing":
      args.frameEncoding = parseFraming(next(), fail);
      return true;
    case "--idle-timeout":
      args.idleTimeoutMs = parseNumber("--idle-timeout", next(), fail);
      return true;
    case "--debug":
      args.debug = [...parseDebugList(next())];
      return true;
    default:
      return false;
  }
}

function parseServeArgs(argv: string[]): ServeArgs {
  const args: ServeArgs = { restricted: [] };
  const fail = (message: string): never => {
    console.error(message);
    serveUsage();
    process.exit(1);
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = () => argv[++i];
    if (parseCommonArg(args, arg, next, fail)) continue;

    switch (arg) {
      case "--root":
        args.root = next() ?? fail("--root requires a value");
        break;
      case "--default-file":
        args.defaultFile = next() ?? fail("--default-file requires a value");
        break;
      case "--restrict":
        args.restricted.push(next() ?? fail("--restrict requires a value"));
        break;
      case "--help":
      case "-h":
        serveUsage();
        process.exit(0);
      default:
        fail(`Unknown argument: ${arg}`);
    }
  }

  return args;
}

function parseProxyArgs(argv: string[]): ProxyArgs {
  const args: ProxyArgs = {};
  const fail = (message: string): never => {
    console.error(message);
    proxyUsage();
    process.exit(1);
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = () => argv[++i];
    if (parseCommonArg(args, arg, next, fail)) continue;

    switch (arg) {
      case "--origin":
        args.origin = next() ?? fail("--origin requires a value");
        break;
      case "--upstream-timeout":
        args.upstreamTimeoutMs = parseNumber("--upstream-timeout", next(), fail);
        break;
      case "--help":
      case "-h":
        proxyUsage();
        process.exit(0);
      default:
        fail(`Unknown argument: ${arg}`);
    }
  }

  return args;
}

function parseGetArgs(argv: string[]): GetArgs {
  const args: GetArgs = { host: "127.0.0.1", port: 8080, paths: [], headers: {} };
  const fail = (message: string): never => {
    console.error(message);
    getUsage();
    process.exit(1);
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "--host":
        args.host = argv[++i] ?? fail("--host requires a value");
        break;
      case "--port":
        args.port = parseNumber("--port", argv[++i], fail);
        break;
      case "--header": {
        const raw = argv[++i] ?? fail("--header requires a value");
        const idx = raw.indexOf(":");
        if (idx <= 0) fail("--header must be NAME: VALUE");
        args.headers[raw.slice(0, idx).trim()] = raw.slice(idx + 1).trim();
        break;
      }
      case "--help":
      case "-h":
        getUsage();
        process.exit(0);
      default:
        if (arg.startsWith("-")) fail(`Unknown argument: ${arg}`);
        args.paths.push(arg);
    }
  }

  if (args.paths.length === 0) fail("at least one PATH is required");
  return args;
}

const printDebug: DebugLogFn = (component, message) => {
  process.stderr.write(`[${component}] ${message}\n`);
};

async function runServer(server: MultiplexServer, label: string) {
  server.on("debug", printDebug);

  const address = await server.listen();
  console.log(`${label} listening on http://${address.host}:${address.port}`);

  const shutdown = async () => {
    await server.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown();
  });

  process.on("SIGTERM", () => {
    void shutdown();
  });
}

async function runServe(argv: string[]) {
  const args = parseServeArgs(argv);
  const options: FileServerOptions = {
    host: args.host,
    port: args.port,
    frameEncoding: args.frameEncoding,
    idleTimeoutMs: args.idleTimeoutMs,
    debug: args.debug,
    root: args.root,
    defaultFile: args.defaultFile,
    restricted: args.restricted.length > 0 ? args.restricted : undefined,
  };
  const server = FileServer.create(options);
  await runServer(server, `Serving ${server.options.root}`);
}

async function runProxy(argv: string[]) {
  const args = parseProxyArgs(argv);
  const options: ProxyServerOptions = {
    host: args.host,
    port: args.port,
    frameEncoding: args.frameEncoding,
    idleTimeoutMs: args.idleTimeoutMs,
    debug: args.debug,
    defaultOrigin: args.origin,
    upstreamTimeoutMs: args.upstreamTimeoutMs,
  };
  const server = ProxyServer.create(options);
  const origin = server.options.defaultOrigin;
  await runServer(server, `Proxy (default origin ${origin.host}:${origin.port})`);
}

async function runGet(argv: string[]) {
  const args = parseGetArgs(argv);
  const client = await MuxClient.connect(args.port, args.host);

  try {
    const results = await Promise.allSettled(
      args.paths.map((path) => client.request(path, { headers: args.headers })),
    );

    let failed = false;
    results.forEach((result, index) => {
      const path = args.paths[index];
      if (result.status === "rejected") {
        failed = true;
        const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
        console.error(`${path}: ${message}`);
        return;
      }
      const response = result.value;
      console.log(
        `stream ${response.streamId} ${path}: ${response.status} ${response.statusText} ` +
          `(${response.body.length} bytes in ${response.frames} frame(s))`,
      );
    });

    if (failed) process.exitCode = 1;
  } finally {
    client.close();
  }
}

async function main() {
  const [command, ...args] = process.argv.slice(2);

  if (
    !command ||
    command === "help" ||
    command === "--help" ||
    command === "-h"
  ) {
    usage();
    process.exit(command ? 0 : 1);
  }

  switch (command) {
    case "serve":
      await runServe(args);
      return;
    case "proxy":
      await runProxy(args);
      return;
    case "get":
      await runGet(args);
      return;
    default:
      console.error(`Unknown command: ${command}`);
      usage();
      process.exit(1);
  }
}

main().catch((err) => {
  renderCliError(err);
  process.exit(1);
});
