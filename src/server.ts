import express from "express";
import http from "http";
import type { AddressInfo } from "net";
import path from "path";
import fs from "fs";
import { fileURLToPath } from "url";
import { WebSocketServer } from "ws";
import { Effect, Fiber } from "effect";
import { ConfigFromValue, type AppConfigType } from "./config/index.js";
import { logRuntimeError, withLogLevel } from "./logging.js";
import {
  annotateSpan,
  recordActiveSessions,
  runFork,
  runPromise,
  withSpan,
} from "./observability/index.js";
import { attachWebSocket, scopedConnection } from "./session/connection.js";
import { makeSession, type Session, type SessionSummary } from "./session/controller.js";
import { CloseReason } from "./session/machine.js";
import { openHandleCount } from "./session/tailReader.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** `public/` next to `src/` or `dist/`, whichever this module runs from. */
export const bundledPublicDir = path.resolve(__dirname, "..", "public");

export interface ServerHandle {
  readonly address: AddressInfo;
  readonly url: string;
  /** Sessions that have not reached Closed yet */
  sessions(): number;
  /** Close every session (clients see 1001), then the servers. Safe to call twice. */
  close(): Promise<void>;
}

function runHttpEffect(
  req: express.Request,
  route: string,
  effect: Effect.Effect<number, never, never>
): void {
  const instrumented = effect.pipe(
    withSpan("http.request", {
      attributes: {
        "http.method": req.method,
        "http.route": route,
      },
    }),
    Effect.tap((status) => annotateSpan("http.status_code", status))
  );
  void runPromise(instrumented).catch((err) => {
    logRuntimeError("http handler failed", err);
  });
}

/** Wait for close handshakes to finish so no close frame is cut off. */
async function waitForClients(wss: WebSocketServer, timeoutMs: number): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (wss.clients.size > 0 && Date.now() < deadline) {
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

function listen(server: http.Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      reject(err);
    };
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error(`unexpected listen address: ${String(address)}`));
        return;
      }
      resolve(address);
    });
  });
}

export async function startServer(config: AppConfigType): Promise<ServerHandle> {
  const app = express();
  const server = http.createServer(app);
  const wss = new WebSocketServer({ server });
  const live = new Map<string, Session>();
  const fibers = new Set<Fiber.RuntimeFiber<SessionSummary, never>>();
  const configLayer = ConfigFromValue(config);

  app.disable("x-powered-by");

  app.get("/healthz", (req, res) => {
    runHttpEffect(
      req,
      "/healthz",
      Effect.sync(() => {
        res.json({ ok: true, sessions: live.size, openFiles: openHandleCount() });
        return 200;
      })
    );
  });

  const staticDir = config.server.staticDir ?? bundledPublicDir;
  if (fs.existsSync(staticDir)) {
    app.use((req, res, next) => {
      if (req.path === "/" || req.path.endsWith(".html")) {
        res.setHeader("Cache-Control", "no-cache");
      }
      next();
    });
    app.use(express.static(staticDir));
  }

  const track = (session: Session, delta: "add" | "remove") =>
    Effect.sync(() => {
      if (delta === "add") live.set(session.id, session);
      else live.delete(session.id);
      return live.size;
    }).pipe(Effect.flatMap(recordActiveSessions));

  wss.on("connection", (socket, request) => {
    const attached = attachWebSocket(socket, request);
    const program = Effect.gen(function* () {
      const connection = yield* scopedConnection(attached);
      const session = yield* makeSession(connection);
      yield* track(session, "add");
      return yield* session.run.pipe(Effect.ensuring(track(session, "remove")));
    }).pipe(
      Effect.scoped,
      Effect.provide(configLayer),
      withLogLevel(config.log.level)
    );
    const fiber = runFork(program);
    fibers.add(fiber);
    fiber.addObserver(() => {
      fibers.delete(fiber);
    });
  });

  wss.on("error", (err) => {
    logRuntimeError("websocket server", err);
  });

  const address = await listen(server, config.server.port, config.server.host);
  const url = `http://${address.address}:${address.port}`;
  await runPromise(
    Effect.logInfo("listening").pipe(
      Effect.annotateLogs({ url, roots: config.tail.roots.join(path.delimiter) }),
      withLogLevel(config.log.level)
    )
  );

  let closing: Promise<void> | undefined;

  const shutdownSessions = Effect.gen(function* () {
    yield* Effect.forEach([...live.values()], (session) => session.close(CloseReason.shutdown), {
      discard: true,
    });
    const pending = [...fibers];
    const settled = yield* Fiber.awaitAll(pending).pipe(
      Effect.timeoutOption(`${config.session.flushTimeoutMs + 1000} millis`)
    );
    if (settled._tag === "None") {
      yield* Effect.logWarning("sessions did not close in time, interrupting").pipe(
        Effect.annotateLogs({ remaining: fibers.size })
      );
      yield* Fiber.interruptAll(pending);
    }
  }).pipe(withLogLevel(config.log.level));

  const close = (): Promise<void> => {
    closing ??= (async () => {
      await runPromise(shutdownSessions);
      await waitForClients(wss, 1000);
      for (const client of wss.clients) client.terminate();
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    })();
    return closing;
  };

  return {
    address,
    url,
    sessions: () => live.size,
    close,
  };
}
