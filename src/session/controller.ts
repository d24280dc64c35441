/**
 * One client connection, from request to close.
 *
 * Phases run in the error channel: every phase either hands a value to the
 * next one or fails with the CloseReason that ends the session. Once
 * streaming starts, the reader, the heartbeat, the inbound loop, the writer
 * and an external stop signal race; the first to finish decides the reason
 * and the others are interrupted, which releases their resources.
 */

import { randomUUID } from "node:crypto";
import { Clock, Deferred, Effect, Either, Option, Queue, Ref, Stream } from "effect";
import { Config } from "../config/index.js";
import { ConnectionError, RequestTimeout, type SessionError } from "../errors.js";
import {
  annotateSpan,
  recordBytesStreamed,
  recordError,
  recordHeartbeatTimeout,
  recordSessionEnd,
  withSessionSpan,
} from "../observability/index.js";
import type { SessionConnection } from "./connection.js";
import { makeHeartbeat } from "./heartbeat.js";
import { CloseReason, canTransition, closePlan, type SessionState } from "./machine.js";
import { makeOutbound, type Outbound } from "./outbound.js";
import { resolveInRoots, type ResolvedPath } from "./paths.js";
import {
  makeEncoder,
  parseClientMessage,
  requestFromUpgradeUrl,
  type Encoder,
  type Framing,
  type TailRequest,
} from "./protocol.js";
import { makeRenderer } from "./render.js";
import { openTail, tailFile, type TailChunk } from "./tailReader.js";

export interface SessionSummary {
  readonly id: string;
  readonly remote: string;
  readonly path: string | undefined;
  readonly follow: boolean;
  readonly outcome: string;
  readonly bytesSent: number;
  readonly framesSent: number;
  readonly durationMs: number;
}

export interface Session {
  readonly id: string;
  readonly state: Effect.Effect<SessionState>;
  /** Drive the session to Closed. Running it again waits for the first run. */
  readonly run: Effect.Effect<SessionSummary>;
  /** Ask the session to close; later calls, and calls after Closed, do nothing. */
  readonly close: (reason?: CloseReason) => Effect.Effect<void>;
}

type Phase<A> = Effect.Effect<A, CloseReason>;

const fail = (error: SessionError): CloseReason => CloseReason.failed(error);

export const makeSession = (
  connection: SessionConnection
): Effect.Effect<Session, never, Config> =>
  Effect.gen(function* () {
    const config = yield* Config;
    const id = randomUUID().slice(0, 8);
    const stateRef = yield* Ref.make<SessionState>("AwaitingRequest");
    const stop = yield* Deferred.make<CloseReason>();
    const done = yield* Deferred.make<SessionSummary>();
    const started = yield* Ref.make(false);
    const socketClosed = yield* Ref.make(false);
    const requestRef = yield* Ref.make(Option.none<TailRequest>());
    const resolvedRef = yield* Ref.make(Option.none<ResolvedPath>());
    const bytesRef = yield* Ref.make(0);
    // Errors before a request is parsed go out in the framing the client seems to speak.
    const framingRef = yield* Ref.make<Framing>("text");

    const moveTo = (to: SessionState) =>
      Ref.modify(stateRef, (from): [boolean, SessionState] =>
        canTransition(from, to) ? [true, to] : [false, from]
      ).pipe(
        Effect.tap((moved) =>
          moved ? Effect.logDebug(`session -> ${to}`) : Effect.void
        )
      );

    const closeSocket = (code: number, reason: string) =>
      Ref.getAndSet(socketClosed, true).pipe(
        Effect.flatMap((already) => (already ? Effect.void : connection.close(code, reason)))
      );

    const stopped: Phase<never> = Deferred.await(stop).pipe(Effect.flatMap(Effect.fail));

    const takeInbound = Queue.take(connection.inbound);

    // ---- AwaitingRequest -------------------------------------------------

    const nextRequest = (): Phase<TailRequest> =>
      takeInbound.pipe(
        Effect.flatMap((event): Phase<TailRequest> => {
          switch (event._tag) {
            case "Closed":
              return Effect.fail(CloseReason.clientClosed(event.code));
            case "Failed":
              return Effect.fail(fail(new ConnectionError({ detail: event.detail })));
            case "Message": {
              if (event.text.trim().startsWith("{")) {
                return Ref.set(framingRef, "json").pipe(
                  Effect.zipRight(Effect.suspend(() => handleRequestMessage(event.text)))
                );
              }
              return handleRequestMessage(event.text);
            }
          }
        })
      );

    const handleRequestMessage = (text: string): Phase<TailRequest> =>
      Either.match(parseClientMessage(text, true), {
        onLeft: (error) => Effect.fail(fail(error)),
        onRight: (message): Phase<TailRequest> => {
          switch (message._tag) {
            case "Request":
              return Effect.succeed(message.request);
            case "Close":
              return Effect.fail(CloseReason.closeRequested);
            case "Pong":
            case "Ignored":
              return Effect.suspend(nextRequest);
          }
        },
      });

    const awaitRequest: Phase<TailRequest> = Option.match(requestFromUpgradeUrl(connection.url), {
      onSome: (parsed) =>
        Either.match(parsed, {
          onLeft: (error) => Effect.fail(fail(error)),
          onRight: (request) => Effect.succeed(request),
        }),
      onNone: () =>
        nextRequest().pipe(
          Effect.timeoutFail({
            duration: `${config.session.requestTimeoutMs} millis`,
            onTimeout: () =>
              fail(new RequestTimeout({ timeoutMs: config.session.requestTimeoutMs })),
          })
        ),
    });

    // ---- Validating ------------------------------------------------------

    const validate = (request: TailRequest): Phase<ResolvedPath> =>
      resolveInRoots(config.tail.roots, request.path).pipe(
        Effect.tapError((error) =>
          Effect.logInfo("rejected request").pipe(
            Effect.annotateLogs({ requested: request.path, error: error._tag })
          )
        ),
        Effect.mapError(fail)
      );

    // ---- Streaming -------------------------------------------------------

    const stream = (
      request: TailRequest,
      file: ResolvedPath,
      outbound: Outbound,
      encoder: Encoder
    ): Effect.Effect<CloseReason> =>
      Effect.gen(function* () {
        const sendChunk = (chunk: TailChunk, last = false) =>
          outbound.offer(encoder.data(chunk, last)).pipe(
            Effect.zipRight(Ref.update(bytesRef, (n) => n + chunk.bytes.length)),
            Effect.zipRight(recordBytesStreamed(chunk.bytes.length))
          );

        const options = {
          pollMs: config.tail.pollMs,
          backlogLines: config.tail.backlogLines,
          maxChunkBytes: config.tail.maxChunkBytes,
          watch: config.tail.watch,
        };

        const reader: Phase<never> = request.follow
          ? Stream.runForEach(tailFile(file, options), (chunk) => sendChunk(chunk)).pipe(
              Effect.mapError(fail),
              Effect.zipRight(Effect.never)
            )
          : Effect.scoped(
              openTail(file, options).pipe(Effect.flatMap((tail) => tail.initial))
            ).pipe(
              Effect.flatMap((chunks) =>
                Effect.forEach(chunks, (chunk, index) => sendChunk(chunk, index === chunks.length - 1), {
                  discard: true,
                })
              ),
              Effect.mapError(fail),
              Effect.zipRight(Effect.fail(CloseReason.completed))
            );

        const heartbeat = yield* makeHeartbeat({
          intervalMs: config.heartbeat.intervalMs,
          timeoutMs: config.heartbeat.timeoutMs,
          probe: Clock.currentTimeMillis.pipe(
            Effect.flatMap((now) => outbound.offer(encoder.ping(now)))
          ),
        });

        const monitor: Phase<never> = heartbeat.run.pipe(
          Effect.tapError((error) =>
            Effect.logWarning("client stopped answering probes").pipe(
              Effect.annotateLogs({ timeoutMs: error.timeoutMs }),
              Effect.zipRight(recordHeartbeatTimeout())
            )
          ),
          Effect.mapError(fail)
        );

        const inbound: Phase<never> = takeInbound.pipe(
          Effect.flatMap((event): Phase<void> => {
            switch (event._tag) {
              case "Closed":
                return Effect.fail(CloseReason.clientClosed(event.code));
              case "Failed":
                return Effect.fail(fail(new ConnectionError({ detail: event.detail })));
              case "Message":
                return Either.match(parseClientMessage(event.text, false), {
                  onLeft: () => Effect.void,
                  onRight: (message): Phase<void> => {
                    switch (message._tag) {
                      case "Pong":
                        return heartbeat.acknowledge.pipe(
                          Effect.tap((expected) =>
                            expected ? Effect.void : Effect.logDebug("stray pong ignored")
                          ),
                          Effect.asVoid
                        );
                      case "Close":
                        return Effect.fail(CloseReason.closeRequested);
                      case "Request":
                      case "Ignored":
                        return Effect.logDebug("ignored inbound message");
                    }
                  },
                });
            }
          }),
          Effect.forever
        );

        const writer: Phase<never> = outbound.failed.pipe(Effect.mapError(fail));

        return yield* Effect.raceAll(
          [reader, monitor, inbound, writer, stopped].map((phase) => Effect.flip(phase))
        );
      });

    // ---- Closing ---------------------------------------------------------

    const finish = (reason: CloseReason, outbound: Outbound) =>
      Effect.gen(function* () {
        yield* moveTo("Closing");
        const plan = closePlan(reason);
        const framing = yield* Ref.get(framingRef);
        const encoder = makeEncoder(framing, makeRenderer(config.tail.render));
        if (plan.flush) {
          const trailer = plan.notify ? [encoder.error(plan.notify.code, plan.notify.reason)] : [];
          yield* outbound.drain(trailer, config.session.flushTimeoutMs);
        }
        yield* closeSocket(plan.code, plan.reason);
        yield* moveTo("Closed");
        return plan;
      });

    const lifecycle = (outbound: Outbound): Effect.Effect<CloseReason> =>
      Effect.gen(function* () {
        const request = yield* Effect.raceFirst(awaitRequest, stopped);
        yield* Ref.set(requestRef, Option.some(request));
        yield* Ref.set(framingRef, request.framing);
        yield* moveTo("Validating");

        const file = yield* Effect.raceFirst(validate(request), stopped);
        yield* Ref.set(resolvedRef, Option.some(file));
        yield* annotateSpan("tail.path", file);
        yield* moveTo("Streaming");

        const encoder = makeEncoder(request.framing, makeRenderer(config.tail.render));
        yield* Effect.logInfo("streaming").pipe(
          Effect.annotateLogs({ path: file, follow: request.follow })
        );
        return yield* stream(request, file, outbound, encoder);
      }).pipe(Effect.catchAll(Effect.succeed));

    const summarize = (outcome: string, startedAt: number, framesSent: number) =>
      Effect.gen(function* () {
        const now = yield* Clock.currentTimeMillis;
        const request = yield* Ref.get(requestRef);
        const resolved = yield* Ref.get(resolvedRef);
        return {
          id,
          remote: connection.remote,
          path: Option.getOrUndefined(resolved),
          follow: Option.exists(request, (r) => r.follow),
          outcome,
          bytesSent: yield* Ref.get(bytesRef),
          framesSent,
          durationMs: now - startedAt,
        };
      });

    const execute = Effect.gen(function* () {
      const startedAt = yield* Clock.currentTimeMillis;
      yield* Effect.logInfo("client connected").pipe(
        Effect.annotateLogs({ url: connection.url ?? "" })
      );
      const outbound = yield* makeOutbound(connection, config.session.outboundQueue);
      const reason = yield* lifecycle(outbound);
      if (reason._tag === "Failed") {
        yield* recordError(reason.error._tag);
      }
      const plan = yield* finish(reason, outbound);
      const summary: SessionSummary = yield* summarize(plan.outcome, startedAt, yield* outbound.sent);
      yield* recordSessionEnd(plan.outcome, summary.durationMs);
      yield* Effect.logInfo("client disconnected").pipe(
        Effect.annotateLogs({
          outcome: plan.outcome,
          bytes: summary.bytesSent,
          ms: summary.durationMs,
        })
      );
      return summary;
    }).pipe(
      Effect.scoped,
      // Interrupted from outside (server teardown): still leave the socket closed.
      Effect.onInterrupt(() =>
        closeSocket(1001, "server shutting down").pipe(
          Effect.zipRight(Ref.set(stateRef, "Closed"))
        )
      ),
      Effect.annotateLogs({ session: id, remote: connection.remote }),
      withSessionSpan(id, connection.remote)
    );

    const run: Effect.Effect<SessionSummary> = Ref.getAndSet(started, true).pipe(
      Effect.flatMap((already) =>
        already
          ? Deferred.await(done)
          : execute.pipe(Effect.tap((summary) => Deferred.succeed(done, summary)))
      )
    );

    const close = (reason: CloseReason = CloseReason.shutdown): Effect.Effect<void> =>
      Effect.asVoid(Deferred.succeed(stop, reason));

    return { id, state: Ref.get(stateRef), run, close };
  });
