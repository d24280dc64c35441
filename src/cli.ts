#!/usr/bin/env node
import path from "path";
import process from "process";
import { Cause, Effect, Either, Exit, Fiber, Option } from "effect";
import { decodeFromEnv, formatConfigError } from "./config/index.js";
import { logRuntimeError, withLogLevel } from "./logging.js";
import { disposeObservability, runFork, runPromise, withSpan } from "./observability/index.js";
import { appendTimestamps } from "./producer.js";
import { startServer, type ServerHandle } from "./server.js";

const args = process.argv.slice(2);

function readArg(name: string): string | undefined {
  const index = args.findIndex((arg) => arg === name || arg.startsWith(`${name}=`));
  if (index === -1) return undefined;
  const arg = args[index];
  if (arg.includes("=")) {
    return arg.split("=").slice(1).join("=");
  }
  return args[index + 1];
}

/** Every value of a repeatable option, in order. */
function readArgs(name: string): string[] {
  const values: string[] = [];
  args.forEach((arg, index) => {
    if (arg === name) {
      const next = args[index + 1];
      if (next !== undefined) values.push(next);
    } else if (arg.startsWith(`${name}=`)) {
      values.push(arg.slice(name.length + 1));
    }
  });
  return values;
}

function hasFlag(name: string): boolean {
  return args.includes(name);
}

function printHelp(): void {
  process.stdout.write(`tailcast\n\n`);
  process.stdout.write(`Usage:\n  tailcast [serve] --root <dir> [options]\n  tailcast append <file> [--every <ms>]\n\n`);
  process.stdout.write(`Commands:\n`);
  process.stdout.write(`  serve (default)          Stream files under the roots to WebSocket clients\n`);
  process.stdout.write(`  append <file>            Append a timestamp line to <file> periodically\n\n`);
  process.stdout.write(`Options:\n`);
  process.stdout.write(`  --root <dir>             Directory clients may read from (repeatable)\n`);
  process.stdout.write(`  --host <host>            Bind address (default 127.0.0.1)\n`);
  process.stdout.write(`  --port <port>            Port (default 8765)\n`);
  process.stdout.write(`  --poll <ms>              File poll interval (default 250)\n`);
  process.stdout.write(`  --heartbeat <ms>         Probe interval (default 15000)\n`);
  process.stdout.write(`  --heartbeat-timeout <ms> Probe reply deadline (default 5000)\n`);
  process.stdout.write(`  --render <html|text>     Message rendering (default html)\n`);
  process.stdout.write(`  --backlog-lines <n>      Send only the last n lines first (default: whole file)\n`);
  process.stdout.write(`  --watch                  Poll early on filesystem change events\n`);
  process.stdout.write(`  --log-level <level>      debug, info, warning, error or none\n`);
  process.stdout.write(`  --every <ms>             append: interval (default 500)\n`);
  process.stdout.write(`  -h, --help               Show help\n`);
}

async function finish(code: number): Promise<never> {
  await disposeObservability().catch((err) => {
    logRuntimeError("observability shutdown", err);
  });
  process.exit(code);
}

function onSignals(handler: () => void): void {
  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
}

function runAppend(): void {
  const file = args[1];
  if (!file || file.startsWith("-")) {
    process.stderr.write(`[tailcast] append needs a file\n`);
    process.exitCode = 2;
    return;
  }
  const every = Number(readArg("--every") ?? "500");
  if (!Number.isFinite(every) || every <= 0) {
    process.stderr.write(`[tailcast] --every must be a positive number\n`);
    process.exitCode = 2;
    return;
  }
  const fiber = runFork(
    appendTimestamps(path.resolve(file), every).pipe(
      withSpan("cli.append", { attributes: { "append.every_ms": every } })
    )
  );
  onSignals(() => {
    void runPromise(Fiber.interrupt(fiber)).then(() => finish(0));
  });
  fiber.addObserver((exit) => {
    if (Exit.isSuccess(exit) || Cause.isInterruptedOnly(exit.cause)) return;
    const reason = Option.match(Cause.failureOption(exit.cause), {
      onNone: () => Cause.pretty(exit.cause),
      onSome: (error) => `${error.file}: ${error.detail}`,
    });
    process.stderr.write(`[tailcast] ${reason}\n`);
    void finish(1);
  });
}

async function runServe(): Promise<void> {
  const env: NodeJS.ProcessEnv = { ...process.env };

  const roots = readArgs("--root");
  const host = readArg("--host");
  const port = readArg("--port");
  const poll = readArg("--poll");
  const heartbeat = readArg("--heartbeat");
  const heartbeatTimeout = readArg("--heartbeat-timeout");
  const render = readArg("--render");
  const backlogLines = readArg("--backlog-lines");
  const logLevel = readArg("--log-level");

  if (roots.length > 0) env.TAILCAST_ROOTS = roots.join(path.delimiter);
  if (host) env.TAILCAST_HOST = host;
  if (port) env.TAILCAST_PORT = port;
  if (poll) env.TAILCAST_POLL_MS = poll;
  if (heartbeat) env.TAILCAST_HEARTBEAT_MS = heartbeat;
  if (heartbeatTimeout) env.TAILCAST_HEARTBEAT_TIMEOUT_MS = heartbeatTimeout;
  if (render) env.TAILCAST_RENDER = render;
  if (backlogLines) env.TAILCAST_BACKLOG_LINES = backlogLines;
  if (hasFlag("--watch")) env.TAILCAST_WATCH = "1";
  if (logLevel) env.TAILCAST_LOG_LEVEL = logLevel;

  const decoded = Effect.runSync(Effect.either(decodeFromEnv(env)));
  if (Either.isLeft(decoded)) {
    process.stderr.write(`[tailcast] invalid configuration:\n${formatConfigError(decoded.left)}\n`);
    if (roots.length === 0 && !env.TAILCAST_ROOTS) {
      process.stderr.write(`[tailcast] at least one --root is required\n`);
    }
    return finish(2);
  }
  const config = decoded.right;

  let handle: ServerHandle;
  try {
    handle = await startServer(config);
  } catch (err) {
    process.stderr.write(`[tailcast] cannot listen on ${config.server.host}:${config.server.port}: ${String(err)}\n`);
    return finish(1);
  }
  process.stdout.write(`tailcast serving ${config.tail.roots.join(", ")} on ${handle.url}\n`);

  onSignals(() => {
    void runPromise(
      Effect.logInfo("shutting down").pipe(withLogLevel(config.log.level))
    )
      .then(() => handle.close())
      .then(() => finish(0))
      .catch(async (err) => {
        logRuntimeError("shutdown", err);
        await finish(1);
      });
  });
}

if (hasFlag("--help") || hasFlag("-h")) {
  printHelp();
  process.exit(0);
}

if (args[0] === "append") {
  runAppend();
} else {
  runServe().catch(async (err) => {
    process.stderr.write(`[tailcast] cli error: ${String(err)}\n`);
    await finish(1);
  });
}
