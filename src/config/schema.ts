/**
 * Configuration schema definitions using Effect Schema
 * This module provides type-safe, validated configuration with defaults
 */

import { Schema } from "effect"

// ============================================================================
// Primitive Config Types
// ============================================================================

/** Milliseconds, strictly positive */
const PositiveMillis = Schema.Number.pipe(
  Schema.positive(),
  Schema.annotations({ description: "Must be a positive number of milliseconds" })
)

const NonNegativeInt = Schema.Number.pipe(
  Schema.int(),
  Schema.nonNegative(),
  Schema.annotations({ description: "Must be a non-negative integer" })
)

/** Port number (0 asks the OS for an ephemeral port) */
const PortNumber = Schema.Number.pipe(
  Schema.int(),
  Schema.between(0, 65535),
  Schema.annotations({ description: "Valid port number (0-65535)" })
)

/** How data chunks are rendered before they go on the wire */
const RenderMode = Schema.Literal("html", "text")

const LogLevelName = Schema.Literal("debug", "info", "warning", "error", "none")

// ============================================================================
// Section Configs
// ============================================================================

/** Server configuration */
const ServerConfig = Schema.Struct({
  host: Schema.String.pipe(
    Schema.optionalWith({ default: () => "127.0.0.1" })
  ),

  port: PortNumber.pipe(
    Schema.optionalWith({ default: () => 8765 })
  ),

  /** Directory served over HTTP; the bundled viewer when unset */
  staticDir: Schema.String.pipe(Schema.optional),
})

/** File tailing configuration */
const TailConfig = Schema.Struct({
  /** Directories requested paths are resolved against, in order */
  roots: Schema.NonEmptyArray(Schema.String),

  /** Interval between size checks (ms) */
  pollMs: PositiveMillis.pipe(
    Schema.optionalWith({ default: () => 250 })
  ),

  /** Lines sent in the first chunk; 0 sends the whole file */
  backlogLines: NonNegativeInt.pipe(
    Schema.optionalWith({ default: () => 0 })
  ),

  /** Largest single data chunk in bytes */
  maxChunkBytes: Schema.Number.pipe(
    Schema.int(),
    Schema.positive(),
    Schema.optionalWith({ default: () => 1024 * 1024 })
  ),

  /** Poll immediately on filesystem change events */
  watch: Schema.Boolean.pipe(
    Schema.optionalWith({ default: () => false })
  ),

  render: RenderMode.pipe(
    Schema.optionalWith({ default: () => "html" as const })
  ),
})

/** Liveness probe configuration */
const HeartbeatConfig = Schema.Struct({
  /** Delay between probes (ms) */
  intervalMs: PositiveMillis.pipe(
    Schema.optionalWith({ default: () => 15000 })
  ),

  /** How long a probe may stay unanswered (ms) */
  timeoutMs: PositiveMillis.pipe(
    Schema.optionalWith({ default: () => 5000 })
  ),
})

/** Per-connection limits */
const SessionConfig = Schema.Struct({
  /** How long a client may take to name a file (ms) */
  requestTimeoutMs: PositiveMillis.pipe(
    Schema.optionalWith({ default: () => 10000 })
  ),

  /** Outbound messages buffered before producers wait on the writer */
  outboundQueue: Schema.Number.pipe(
    Schema.int(),
    Schema.positive(),
    Schema.optionalWith({ default: () => 64 })
  ),

  /** Upper bound on draining the outbound queue while closing (ms) */
  flushTimeoutMs: PositiveMillis.pipe(
    Schema.optionalWith({ default: () => 2000 })
  ),
})

const LogConfig = Schema.Struct({
  level: LogLevelName.pipe(
    Schema.optionalWith({ default: () => "info" as const })
  ),
})

// ============================================================================
// Main Application Config
// ============================================================================

/** Complete application configuration */
export const AppConfig = Schema.Struct({
  server: ServerConfig.pipe(
    Schema.optionalWith({ default: () => ({ host: "127.0.0.1", port: 8765 }) })
  ),
  tail: TailConfig,
  heartbeat: HeartbeatConfig.pipe(
    Schema.optionalWith({ default: () => ({ intervalMs: 15000, timeoutMs: 5000 }) })
  ),
  session: SessionConfig.pipe(
    Schema.optionalWith({ default: () => ({
      requestTimeoutMs: 10000,
      outboundQueue: 64,
      flushTimeoutMs: 2000,
    }) })
  ),
  log: LogConfig.pipe(
    Schema.optionalWith({ default: () => ({ level: "info" as const }) })
  ),
})

// ============================================================================
// Type Exports
// ============================================================================

export type AppConfigType = typeof AppConfig.Type
export type AppConfigInput = typeof AppConfig.Encoded
export type RenderModeType = typeof RenderMode.Type
export type LogLevelNameType = typeof LogLevelName.Type
