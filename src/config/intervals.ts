function readMillis(raw: string | undefined, fallback: number): number {
  const parsed =
    raw === undefined || raw.trim() === "" ? Number.NaN : Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function resolvePollMs(env: NodeJS.ProcessEnv = process.env): number {
  const value = readMillis(env.TAILCAST_POLL_MS, 250);
  // Keep tailing responsive but avoid pathological tight loops.
  return Math.max(50, value);
}

export function resolveHeartbeatMs(env: NodeJS.ProcessEnv = process.env): number {
  const value = readMillis(env.TAILCAST_HEARTBEAT_MS, 15000);
  return Math.max(1000, value);
}

/** The probe timeout never exceeds the interval it belongs to. */
export function resolveHeartbeatTimeoutMs(
  env: NodeJS.ProcessEnv = process.env
): number {
  const interval = resolveHeartbeatMs(env);
  const value = readMillis(env.TAILCAST_HEARTBEAT_TIMEOUT_MS, 5000);
  return Math.min(interval, Math.max(100, value));
}
