/**
 * Config service for dependency injection using Effect Context
 */

import { Context, Layer, Schema } from "effect"
import { AppConfig, type AppConfigInput, type AppConfigType } from "./schema.js"

// ============================================================================
// Service Tag
// ============================================================================

/**
 * Tag for the Config service
 * Use this to access configuration in Effect programs
 *
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const config = yield* Config
 *   yield* Effect.log(`Polling every ${config.tail.pollMs}ms`)
 * })
 * ```
 */
export class Config extends Context.Tag("Config")<Config, AppConfigType>() {}

// ============================================================================
// Layer Implementations
// ============================================================================

/**
 * Layer with explicit config value
 */
export const ConfigFromValue = (value: AppConfigType) =>
  Layer.succeed(Config, value)

/**
 * Build a complete config from a partial input, defaults fill in the rest
 */
export const makeConfig = (input: AppConfigInput): AppConfigType =>
  Schema.decodeUnknownSync(AppConfig)(input)

/**
 * Layer for testing with partial config
 */
export const ConfigForTest = (input: AppConfigInput) =>
  Layer.sync(Config, () => makeConfig(input))
