import { Cause, Layer, Logger, LogLevel } from "effect";
import type { LogLevelNameType } from "./config/index.js";

const LEVELS: Record<LogLevelNameType, LogLevel.LogLevel> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warning: LogLevel.Warning,
  error: LogLevel.Error,
  none: LogLevel.None,
};

function renderValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function renderAnnotation(value: unknown): string {
  const text = renderValue(value);
  return /[\s"=]/.test(text) ? JSON.stringify(text) : text;
}

/** One stderr line: `[tailcast] <iso> <LEVEL> <message> key=value ...` */
export function formatLogLine(input: {
  date: Date;
  level: string;
  message: unknown;
  annotations: Iterable<readonly [string, unknown]>;
}): string {
  const parts = Array.isArray(input.message)
    ? input.message.map(renderValue)
    : [renderValue(input.message)];
  let line = `[tailcast] ${input.date.toISOString()} ${input.level} ${parts.join(" ")}`;
  for (const [key, value] of input.annotations) {
    line += ` ${key}=${renderAnnotation(value)}`;
  }
  return line;
}

export const stderrLogger = Logger.make(({ logLevel, message, annotations, date, cause }) => {
  let line = formatLogLine({ date, level: logLevel.label, message, annotations });
  if (!Cause.isEmpty(cause)) {
    line += `\n${Cause.pretty(cause)}`;
  }
  process.stderr.write(`${line}\n`);
});

export const LoggerLive = Logger.replace(Logger.defaultLogger, stderrLogger);

export const withLogLevel = (name: LogLevelNameType) =>
  Logger.withMinimumLogLevel(LEVELS[name]);

export const logLevelFor = (name: LogLevelNameType): LogLevel.LogLevel => LEVELS[name];

/** Failures outside any Effect fiber; keep these visible even when logging is off. */
export function logRuntimeError(scope: string, err: unknown): void {
  process.stderr.write(`[tailcast][runtime] ${scope} ${String(err)}\n`);
}

export const loggingLayer: Layer.Layer<never> = LoggerLive;
