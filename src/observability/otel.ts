import { Layer } from "effect";
import * as NodeSdk from "@effect/opentelemetry/NodeSdk";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import {
  BatchSpanProcessor,
  ConsoleSpanExporter,
  ParentBasedSampler,
  TraceIdRatioBasedSampler,
  type SpanExporter,
} from "@opentelemetry/sdk-trace-base";
import {
  ConsoleMetricExporter,
  PeriodicExportingMetricReader,
  type PushMetricExporter,
} from "@opentelemetry/sdk-metrics";
import { readObservabilityConfig } from "./config.js";

const config = readObservabilityConfig();

function otlpUrl(endpoint: string, signal: "traces" | "metrics"): string {
  return `${endpoint.replace(/\/$/, "")}/v1/${signal}`;
}

function buildTraceExporter(): SpanExporter | null {
  if (config.otlpEndpoint) {
    return new OTLPTraceExporter({ url: otlpUrl(config.otlpEndpoint, "traces") });
  }
  return config.consoleFallback ? new ConsoleSpanExporter() : null;
}

function buildMetricExporter(): PushMetricExporter | null {
  if (config.otlpEndpoint) {
    return new OTLPMetricExporter({ url: otlpUrl(config.otlpEndpoint, "metrics") });
  }
  return config.consoleFallback ? new ConsoleMetricExporter() : null;
}

function buildLayer(): { enabled: boolean; layer: Layer.Layer<never> } {
  const traceExporter = config.enabled ? buildTraceExporter() : null;
  const metricExporter = config.enabled ? buildMetricExporter() : null;
  if (!traceExporter || !metricExporter) {
    return { enabled: false, layer: Layer.empty };
  }
  const sampler = new ParentBasedSampler({
    root: new TraceIdRatioBasedSampler(config.sampleRatio),
  });
  const layer = NodeSdk.layer(() => ({
    resource: {
      serviceName: config.serviceName,
      serviceVersion: config.serviceVersion,
      attributes: { "deployment.environment": config.environment },
    },
    spanProcessor: new BatchSpanProcessor(traceExporter),
    metricReader: new PeriodicExportingMetricReader({
      exporter: metricExporter,
      exportIntervalMillis: config.metricIntervalMs,
    }),
    tracerConfig: { sampler },
  }));
  return { enabled: true, layer };
}

export const observabilityConfig = config;
const built = buildLayer();

export const observabilityEnabled = built.enabled;
export const observabilityLayer = built.layer;
