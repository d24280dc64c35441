import { Effect, Fiber, Queue, type Scope } from "effect";
import type { ConnectionError } from "../errors.js";
import type { SessionConnection } from "./connection.js";

type Item = { readonly _tag: "Frame"; readonly frame: string } | { readonly _tag: "End" };

/**
 * The only path to the socket. Reader and monitor offer frames; one writer
 * fiber sends them in queue order. A full queue suspends the producer, which
 * is how a slow client slows the reader down.
 */
export interface Outbound {
  readonly offer: (frame: string) => Effect.Effect<void>;
  /** Fails when a send fails; never completes otherwise. */
  readonly failed: Effect.Effect<never, ConnectionError>;
  /**
   * Queue `frames` behind everything already offered, then wait for the writer
   * to send them all, at most `timeoutMs`. No frame is sent after this returns.
   */
  readonly drain: (frames: ReadonlyArray<string>, timeoutMs: number) => Effect.Effect<void>;
  readonly sent: Effect.Effect<number>;
}

export const makeOutbound = (
  connection: SessionConnection,
  capacity: number
): Effect.Effect<Outbound, never, Scope.Scope> =>
  Effect.gen(function* () {
    const queue = yield* Effect.acquireRelease(Queue.bounded<Item>(capacity), (q) =>
      Queue.shutdown(q)
    );
    let sent = 0;

    const writeLoop = (): Effect.Effect<void, ConnectionError> =>
      Queue.take(queue).pipe(
        Effect.flatMap((item) =>
          item._tag === "End"
            ? Effect.void
            : connection.send(item.frame).pipe(
                Effect.tap(() => Effect.sync(() => { sent += 1; })),
                Effect.zipRight(Effect.suspend(writeLoop))
              )
        )
      );

    const writer = yield* Effect.forkScoped(writeLoop());

    const drain = (frames: ReadonlyArray<string>, timeoutMs: number): Effect.Effect<void> =>
      Effect.gen(function* () {
        for (const frame of frames) yield* Queue.offer(queue, { _tag: "Frame", frame });
        yield* Queue.offer(queue, { _tag: "End" });
        yield* Fiber.await(writer);
      }).pipe(
        Effect.timeout(`${timeoutMs} millis`),
        Effect.catchTag("TimeoutException", () =>
          Effect.logWarning("outbound flush timed out").pipe(
            Effect.annotateLogs({ timeoutMs })
          )
        ),
        Effect.zipRight(Fiber.interrupt(writer)),
        Effect.asVoid
      );

    return {
      offer: (frame) => Effect.asVoid(Queue.offer(queue, { _tag: "Frame", frame })),
      failed: Fiber.join(writer).pipe(Effect.zipRight(Effect.never)),
      drain,
      sent: Effect.sync(() => sent),
    };
  });
