export { readObservabilityConfig, type ObservabilityConfig } from "./config.js";
export { observabilityConfig, observabilityEnabled } from "./otel.js";
export {
  recordActiveSessions,
  recordBytesStreamed,
  recordError,
  recordHeartbeatTimeout,
  recordSessionEnd,
} from "./metrics.js";
export { disposeObservability, runFork, runPromise } from "./runtime.js";
export { annotateSpan, withSessionSpan, withSpan, type SpanAttributes } from "./spans.js";
