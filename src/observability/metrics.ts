import { Effect, Metric, MetricBoundaries } from "effect";
import { observabilityEnabled } from "./otel.js";

const sessionsActiveGauge = Metric.gauge("sessions_active", {
  description: "Open tail sessions",
});
const sessionsTotal = Metric.counter("sessions_total", {
  description: "Finished tail sessions by outcome",
  incremental: true,
});
const sessionDurationMs = Metric.histogram(
  "session_duration_ms",
  MetricBoundaries.exponential({ start: 100, factor: 2, count: 20 }),
  "Session lifetime in ms"
);
const bytesStreamedTotal = Metric.counter("bytes_streamed_total", {
  description: "File bytes forwarded to clients",
  incremental: true,
});
const heartbeatTimeoutsTotal = Metric.counter("heartbeat_timeouts_total", {
  description: "Sessions closed for an unanswered probe",
  incremental: true,
});
const errorsTotal = Metric.counter("errors_total", {
  description: "Total errors",
  incremental: true,
});

function withTags<Type, In, Out>(
  metric: Metric.Metric<Type, In, Out>,
  tags: Record<string, string>
): Metric.Metric<Type, In, Out> {
  let tagged = metric;
  for (const [key, value] of Object.entries(tags)) {
    tagged = Metric.tagged(tagged, key, value);
  }
  return tagged;
}

export function recordActiveSessions(total: number): Effect.Effect<void> {
  if (!observabilityEnabled) return Effect.void;
  return sessionsActiveGauge(Effect.succeed(total)).pipe(Effect.asVoid);
}

export function recordSessionEnd(outcome: string, durationMs: number): Effect.Effect<void> {
  if (!observabilityEnabled) return Effect.void;
  const counter = withTags(sessionsTotal, { outcome });
  return Effect.all([
    counter(Effect.succeed(1)),
    sessionDurationMs(Effect.succeed(durationMs)),
  ]).pipe(Effect.asVoid);
}

export function recordBytesStreamed(bytes: number): Effect.Effect<void> {
  if (!observabilityEnabled || bytes === 0) return Effect.void;
  return bytesStreamedTotal(Effect.succeed(bytes)).pipe(Effect.asVoid);
}

export function recordHeartbeatTimeout(): Effect.Effect<void> {
  if (!observabilityEnabled) return Effect.void;
  return heartbeatTimeoutsTotal(Effect.succeed(1)).pipe(Effect.asVoid);
}

export function recordError(errorType: string): Effect.Effect<void> {
  if (!observabilityEnabled) return Effect.void;
  const counter = withTags(errorsTotal, { error_type: errorType });
  return counter(Effect.succeed(1)).pipe(Effect.asVoid);
}
