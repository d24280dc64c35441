/**
 * Liveness probing, independent of data flow: a quiet file does not look
 * like a dead client, and a dead client is noticed while data is flowing.
 */

import { Clock, Deferred, Effect, Option, Ref } from "effect";
import { HeartbeatTimeout } from "../errors.js";

export interface HeartbeatState {
  readonly awaitingPong: boolean;
  /** Epoch ms by which the outstanding probe must be answered */
  readonly deadline: number | undefined;
  readonly lastPongAt: number | undefined;
  readonly probesSent: number;
}

export interface HeartbeatMonitor {
  /** Probe forever; fails with HeartbeatTimeout when a probe goes unanswered. */
  readonly run: Effect.Effect<never, HeartbeatTimeout>;
  /** Deliver a reply. Returns false when no probe was outstanding. */
  readonly acknowledge: Effect.Effect<boolean>;
  readonly state: Effect.Effect<HeartbeatState>;
}

export interface HeartbeatOptions {
  readonly intervalMs: number;
  readonly timeoutMs: number;
  /** Sends one probe to the client */
  readonly probe: Effect.Effect<void>;
}

const initialState: HeartbeatState = {
  awaitingPong: false,
  deadline: undefined,
  lastPongAt: undefined,
  probesSent: 0,
};

export const makeHeartbeat = (
  options: HeartbeatOptions
): Effect.Effect<HeartbeatMonitor> =>
  Effect.gen(function* () {
    const stateRef = yield* Ref.make(initialState);
    // Set while a probe is outstanding. Each cycle awaits its reply (or the
    // timeout) before sleeping again, so there is never more than one.
    const pending = yield* Ref.make(Option.none<Deferred.Deferred<void>>());

    const cycle = Effect.gen(function* () {
      yield* Effect.sleep(`${options.intervalMs} millis`);

      const reply = yield* Deferred.make<void>();
      const sentAt = yield* Clock.currentTimeMillis;
      yield* Ref.update(stateRef, (state) => ({
        ...state,
        awaitingPong: true,
        deadline: sentAt + options.timeoutMs,
        probesSent: state.probesSent + 1,
      }));
      yield* Ref.set(pending, Option.some(reply));
      yield* options.probe;

      yield* Deferred.await(reply).pipe(
        Effect.timeoutFail({
          duration: `${options.timeoutMs} millis`,
          onTimeout: () => new HeartbeatTimeout({ timeoutMs: options.timeoutMs }),
        })
      );
    });

    const acknowledge = Effect.gen(function* () {
      const outstanding = yield* Ref.getAndSet(pending, Option.none());
      if (Option.isNone(outstanding)) return false;
      const now = yield* Clock.currentTimeMillis;
      yield* Ref.update(stateRef, (state) => ({
        ...state,
        awaitingPong: false,
        deadline: undefined,
        lastPongAt: now,
      }));
      yield* Deferred.succeed(outstanding.value, undefined);
      return true;
    });

    return {
      run: Effect.forever(cycle),
      acknowledge,
      state: Ref.get(stateRef),
    };
  });
