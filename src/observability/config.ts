import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

export type ObservabilityConfig = {
  enabled: boolean;
  serviceName: string;
  serviceVersion: string;
  environment: string;
  otlpEndpoint: string | null;
  sampleRatio: number;
  metricIntervalMs: number;
  consoleFallback: boolean;
};

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

const truthy = (value: string | undefined): boolean =>
  value === "1" || value?.toLowerCase() === "true" || value === "on";

function numberOr(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/** Version of the installed package, read from the package.json beside src/ or dist/. */
function packageVersion(): string | undefined {
  try {
    const raw = fs.readFileSync(path.resolve(moduleDir, "..", "..", "package.json"), "utf8");
    const data: unknown = JSON.parse(raw);
    if (typeof data === "object" && data !== null && "version" in data) {
      return typeof data.version === "string" ? data.version : undefined;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

export function readObservabilityConfig(
  env: NodeJS.ProcessEnv = process.env
): ObservabilityConfig {
  const endpoint = (env.TAILCAST_OTEL_ENDPOINT ?? "").trim();
  return {
    enabled: truthy(env.TAILCAST_OTEL_ENABLED),
    serviceName: env.TAILCAST_OTEL_SERVICE_NAME || "tailcast",
    serviceVersion:
      env.TAILCAST_OTEL_VERSION ||
      env.npm_package_version ||
      packageVersion() ||
      "unknown",
    environment: env.TAILCAST_OTEL_ENV || env.NODE_ENV || "development",
    otlpEndpoint: endpoint ? endpoint : null,
    sampleRatio: Math.min(1, Math.max(0, numberOr(env.TAILCAST_OTEL_SAMPLE_RATIO, 1))),
    metricIntervalMs: Math.max(1000, numberOr(env.TAILCAST_OTEL_METRIC_INTERVAL_MS, 10000)),
    consoleFallback: env.TAILCAST_OTEL_CONSOLE_FALLBACK !== "0",
  };
}
