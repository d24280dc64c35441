import { Effect } from "effect";
import { observabilityEnabled } from "./otel.js";

export type SpanAttributes = Record<string, string | number | boolean>;

export function withSpan<A, E, R>(
  name: string,
  options?: { attributes?: SpanAttributes }
): (effect: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R> {
  if (!observabilityEnabled) {
    return (effect) => effect;
  }
  return Effect.withSpan(name, options);
}

/** Root span for one client connection. */
export function withSessionSpan<A, E, R>(
  sessionId: string,
  remote: string
): (effect: Effect.Effect<A, E, R>) => Effect.Effect<A, E, R> {
  return withSpan("tail.session", {
    attributes: { "session.id": sessionId, "net.peer": remote },
  });
}

export function annotateSpan(
  key: string,
  value: string | number | boolean
): Effect.Effect<void> {
  if (!observabilityEnabled) {
    return Effect.void;
  }
  return Effect.annotateCurrentSpan(key, value).pipe(Effect.asVoid);
}
