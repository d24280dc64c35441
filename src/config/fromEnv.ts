/**
 * Environment variable parser using Effect Schema
 * Maps TAILCAST_* environment variables to typed configuration
 */

import path from "node:path"
import { Effect, Option, Schema, ParseResult } from "effect"
import {
  AppConfig,
  type AppConfigType,
} from "./schema.js"
import {
  resolveHeartbeatMs,
  resolveHeartbeatTimeoutMs,
  resolvePollMs,
} from "./intervals.js"

// ============================================================================
// Environment Variable Parsers
// ============================================================================

/** Parse a string to number, returning None if invalid */
const parseNumber = (value: string | undefined): Option.Option<number> => {
  if (value === undefined || value.trim() === "") return Option.none()
  const parsed = Number(value)
  return Number.isFinite(parsed) ? Option.some(parsed) : Option.none()
}

/** Parse a boolean from various string representations */
const parseBoolean = (value: string | undefined): Option.Option<boolean> => {
  if (value === undefined) return Option.none()
  const normalized = value.toLowerCase().trim()
  if (normalized === "1" || normalized === "true" || normalized === "on") {
    return Option.some(true)
  }
  if (normalized === "0" || normalized === "false" || normalized === "off") {
    return Option.some(false)
  }
  return Option.none()
}

/** Roots are separated like PATH entries */
const parseRoots = (value: string | undefined): string[] =>
  (value ?? "")
    .split(path.delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)

const present = (env: NodeJS.ProcessEnv, key: string): boolean => {
  const value = env[key]
  return value !== undefined && value.trim() !== ""
}

// ============================================================================
// Config Builders
// ============================================================================

const buildServerConfig = (env: NodeJS.ProcessEnv) => ({
  host: env.TAILCAST_HOST,
  port: Option.getOrUndefined(parseNumber(env.TAILCAST_PORT)),
  staticDir: env.TAILCAST_STATIC_DIR,
})

const buildTailConfig = (env: NodeJS.ProcessEnv) => ({
  roots: parseRoots(env.TAILCAST_ROOTS),
  pollMs: present(env, "TAILCAST_POLL_MS") ? resolvePollMs(env) : undefined,
  backlogLines: Option.getOrUndefined(parseNumber(env.TAILCAST_BACKLOG_LINES)),
  maxChunkBytes: Option.getOrUndefined(parseNumber(env.TAILCAST_MAX_CHUNK_BYTES)),
  watch: Option.getOrUndefined(parseBoolean(env.TAILCAST_WATCH)),
  render: env.TAILCAST_RENDER,
})

const buildHeartbeatConfig = (env: NodeJS.ProcessEnv) => ({
  intervalMs: present(env, "TAILCAST_HEARTBEAT_MS") ? resolveHeartbeatMs(env) : undefined,
  // Setting either one re-applies the cap of timeout <= interval.
  timeoutMs: present(env, "TAILCAST_HEARTBEAT_TIMEOUT_MS") || present(env, "TAILCAST_HEARTBEAT_MS")
    ? resolveHeartbeatTimeoutMs(env)
    : undefined,
})

const buildSessionConfig = (env: NodeJS.ProcessEnv) => ({
  requestTimeoutMs: Option.getOrUndefined(parseNumber(env.TAILCAST_REQUEST_TIMEOUT_MS)),
  outboundQueue: Option.getOrUndefined(parseNumber(env.TAILCAST_OUTBOUND_QUEUE)),
  flushTimeoutMs: Option.getOrUndefined(parseNumber(env.TAILCAST_FLUSH_TIMEOUT_MS)),
})

const buildLogConfig = (env: NodeJS.ProcessEnv) => ({
  level: env.TAILCAST_LOG_LEVEL,
})

// ============================================================================
// Main Decode Function
// ============================================================================

/** Raw config from environment (before schema validation) */
const buildRawConfig = (env: NodeJS.ProcessEnv = process.env) => ({
  server: buildServerConfig(env),
  tail: buildTailConfig(env),
  heartbeat: buildHeartbeatConfig(env),
  session: buildSessionConfig(env),
  log: buildLogConfig(env),
})

/**
 * Decode configuration from environment variables
 * Fails with validation errors if config is invalid
 */
export const decodeFromEnv = (
  env: NodeJS.ProcessEnv = process.env
): Effect.Effect<AppConfigType, ParseResult.ParseError> =>
  Schema.decodeUnknown(AppConfig)(buildRawConfig(env))

/** Readable, multi-line description of a config validation failure */
export const formatConfigError = (error: ParseResult.ParseError): string =>
  ParseResult.TreeFormatter.formatErrorSync(error)
