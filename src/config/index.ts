/**
 * Configuration module using Effect Schema
 *
 * Provides type-safe, validated configuration with defaults.
 * TAILCAST_* environment variables map to structured config objects; the
 * CLI writes its flags into those variables before decoding.
 *
 * @example
 * ```ts
 * import { Config, ConfigFromValue, decodeFromEnv } from "./config/index.js"
 *
 * const program = Effect.gen(function* () {
 *   const config = yield* Config
 *   console.log(`Serving ${config.tail.roots.join(", ")} on ${config.server.port}`)
 * })
 *
 * const runnable = decodeFromEnv().pipe(
 *   Effect.flatMap((config) => program.pipe(Effect.provide(ConfigFromValue(config))))
 * )
 * ```
 */

// Schema definitions and types
export {
  type AppConfigType,
  type AppConfigInput,
  type RenderModeType,
  type LogLevelNameType,
} from "./schema.js"

// Environment parsing
export { decodeFromEnv, formatConfigError } from "./fromEnv.js"

// Service and layers
export { Config, ConfigFromValue, ConfigForTest, makeConfig } from "./service.js"
