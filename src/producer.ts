import fs from "node:fs/promises";
import { Data, Effect, Schedule } from "effect";

export class AppendFailed extends Data.TaggedError("AppendFailed")<{
  readonly file: string;
  readonly detail: string;
}> {}

/** One `Date#toString()` line, the way `date >> file` writes it. */
export function timestampLine(now: Date): string {
  return `${now.toString()}\n`;
}

/**
 * Append a timestamp line to `file` every `everyMs`, until interrupted.
 * Gives the server something to tail during demos.
 */
export const appendTimestamps = (
  file: string,
  everyMs = 500
): Effect.Effect<never, AppendFailed> =>
  Effect.tryPromise({
    try: () => fs.appendFile(file, timestampLine(new Date())),
    catch: (error) =>
      new AppendFailed({ file, detail: error instanceof Error ? error.message : String(error) }),
  }).pipe(
    Effect.repeat(Schedule.spaced(`${everyMs} millis`)),
    Effect.zipRight(Effect.never)
  );
