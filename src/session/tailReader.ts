/**
 * File tail reader: the current content once, then whatever gets appended.
 *
 * The cursor only moves forward, except when the file is seen to be smaller
 * than the cursor; that is treated as truncation and the file is re-sent from
 * offset 0. Size is sampled once per tick, so a shrink followed by regrowth
 * past the old cursor inside one tick is indistinguishable from an append.
 */

import fs from "node:fs/promises";
import chokidar from "chokidar";
import { Effect, Queue, Ref, Stream, type Scope } from "effect";
import { ReadFailure } from "../errors.js";
import type { ResolvedPath } from "./paths.js";
import { logRuntimeError } from "../logging.js";

const NEWLINE = 0x0a;

export interface TailChunk {
  readonly bytes: Buffer;
  /** File offset of the first byte */
  readonly offset: number;
  /** First chunk after the file was truncated */
  readonly reset: boolean;
}

export interface TailOptions {
  readonly pollMs: number;
  readonly backlogLines: number;
  readonly maxChunkBytes: number;
  readonly watch: boolean;
}

export type ReadPlan =
  | { readonly _tag: "Idle" }
  | { readonly _tag: "Append"; readonly start: number; readonly end: number }
  | { readonly _tag: "Reset"; readonly end: number };

export function planRead(cursor: number, size: number): ReadPlan {
  if (size > cursor) return { _tag: "Append", start: cursor, end: size };
  if (size < cursor) return { _tag: "Reset", end: size };
  return { _tag: "Idle" };
}

/** Split into pieces of at most `maxBytes`, preserving order and offsets. */
export function splitChunk(
  bytes: Buffer,
  offset: number,
  maxBytes: number,
  reset: boolean
): TailChunk[] {
  if (bytes.length <= maxBytes) return [{ bytes, offset, reset }];
  const chunks: TailChunk[] = [];
  for (let start = 0; start < bytes.length; start += maxBytes) {
    chunks.push({
      bytes: bytes.subarray(start, start + maxBytes),
      offset: offset + start,
      reset: reset && start === 0,
    });
  }
  return chunks;
}

/** The last `count` lines of `bytes`; a trailing newline does not open a new line. */
export function sliceLastLines(bytes: Buffer, count: number): Buffer {
  if (count <= 0 || bytes.length === 0) return bytes;
  let index = bytes[bytes.length - 1] === NEWLINE ? bytes.length - 1 : bytes.length;
  for (let seen = 0; seen < count; seen += 1) {
    if (index <= 0) return bytes;
    index = bytes.lastIndexOf(NEWLINE, index - 1);
    if (index === -1) return bytes;
  }
  return bytes.subarray(index + 1);
}

let openHandles = 0;

/** File handles currently held by tail readers in this process. */
export function openHandleCount(): number {
  return openHandles;
}

const describe = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

function isMissing(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

const acquireHandle = (file: ResolvedPath) =>
  Effect.acquireRelease(
    Effect.tryPromise({
      try: () => fs.open(file, "r"),
      catch: (error) => new ReadFailure({ path: file, detail: describe(error) }),
    }).pipe(Effect.tap(() => Effect.sync(() => { openHandles += 1; }))),
    (handle) =>
      Effect.tryPromise(() => handle.close()).pipe(
        Effect.catchAll((error) =>
          Effect.logWarning("closing tailed file failed", describe(error))
        ),
        Effect.ensuring(Effect.sync(() => { openHandles -= 1; }))
      )
  );

/** Read `[start, end)`; stops early if the file shrank underneath us. */
const readRange = (
  handle: fs.FileHandle,
  file: ResolvedPath,
  start: number,
  end: number
): Effect.Effect<Buffer, ReadFailure> =>
  Effect.tryPromise({
    try: async () => {
      const buffer = Buffer.alloc(end - start);
      let filled = 0;
      while (filled < buffer.length) {
        const { bytesRead } = await handle.read(buffer, filled, buffer.length - filled, start + filled);
        if (bytesRead === 0) break;
        filled += bytesRead;
      }
      return buffer.subarray(0, filled);
    },
    catch: (error) => new ReadFailure({ path: file, detail: describe(error) }),
  });

/** Piece size for reading a backlog backwards from the end of the file. */
const BACKLOG_STEP_BYTES = 64 * 1024;

/**
 * The last `count` lines of the first `size` bytes, read backwards in pieces
 * of `stepBytes` so only about the backlog itself is held in memory.
 */
export const readLastLines = (
  handle: fs.FileHandle,
  file: ResolvedPath,
  size: number,
  count: number,
  stepBytes: number = BACKLOG_STEP_BYTES
): Effect.Effect<Buffer, ReadFailure> =>
  Effect.gen(function* () {
    let start = size;
    let tail = Buffer.alloc(0);
    while (start > 0) {
      const from = Math.max(0, start - stepBytes);
      const piece = yield* readRange(handle, file, from, start);
      tail = Buffer.concat([piece, tail]);
      start = from;
      const lines = sliceLastLines(tail, count);
      if (lines.length < tail.length) return lines;
    }
    return tail;
  });

export interface TailHandle {
  /** Current content, last `backlogLines` lines only when that is set; moves the cursor to EOF */
  readonly initial: Effect.Effect<ReadonlyArray<TailChunk>, ReadFailure>;
  /** One tick: stat, then emit what was appended (or everything, after truncation) */
  readonly poll: Effect.Effect<ReadonlyArray<TailChunk>, ReadFailure>;
  readonly cursor: Effect.Effect<number>;
}

/**
 * Open `file` for tailing. The handle lives as long as the surrounding scope
 * and is closed exactly once when the scope closes, however it closes.
 */
export const openTail = (
  file: ResolvedPath,
  options: Pick<TailOptions, "backlogLines" | "maxChunkBytes">
): Effect.Effect<TailHandle, ReadFailure, Scope.Scope> =>
  Effect.gen(function* () {
    const handle = yield* acquireHandle(file);
    const identity = yield* Effect.tryPromise({
      try: () => handle.stat(),
      catch: (error) => new ReadFailure({ path: file, detail: describe(error) }),
    });
    const cursorRef = yield* Ref.make(0);

    const statPath = Effect.tryPromise({
      try: () => fs.stat(file),
      catch: (error) =>
        new ReadFailure({
          path: file,
          detail: isMissing(error) ? "file was removed" : describe(error),
        }),
    }).pipe(
      Effect.filterOrFail(
        (stat) => stat.ino === identity.ino && stat.dev === identity.dev,
        () => new ReadFailure({ path: file, detail: "file was replaced" })
      )
    );

    const initial = Effect.gen(function* () {
      const stat = yield* statPath;
      if (options.backlogLines > 0) {
        const backlog = yield* readLastLines(handle, file, stat.size, options.backlogLines);
        yield* Ref.set(cursorRef, stat.size);
        return splitChunk(backlog, stat.size - backlog.length, options.maxChunkBytes, false);
      }
      const content = yield* readRange(handle, file, 0, stat.size);
      yield* Ref.set(cursorRef, content.length);
      return splitChunk(content, 0, options.maxChunkBytes, false);
    });

    const poll = Effect.gen(function* () {
      const stat = yield* statPath;
      const cursor = yield* Ref.get(cursorRef);
      const plan = planRead(cursor, stat.size);
      switch (plan._tag) {
        case "Idle":
          return [];
        case "Append": {
          const bytes = yield* readRange(handle, file, plan.start, plan.end);
          yield* Ref.set(cursorRef, plan.start + bytes.length);
          return bytes.length === 0 ? [] : splitChunk(bytes, plan.start, options.maxChunkBytes, false);
        }
        case "Reset": {
          yield* Effect.logDebug("file shrank, re-sending from offset 0").pipe(
            Effect.annotateLogs({ cursor, size: stat.size })
          );
          const bytes = yield* readRange(handle, file, 0, plan.end);
          yield* Ref.set(cursorRef, bytes.length);
          return splitChunk(bytes, 0, options.maxChunkBytes, true);
        }
      }
    });

    return { initial, poll, cursor: Ref.get(cursorRef) };
  });

/**
 * Effect that completes when the next poll is due: after `pollMs`, or sooner
 * when `watch` is on and the file changes.
 */
const pollTrigger = (
  file: ResolvedPath,
  options: Pick<TailOptions, "pollMs" | "watch">
): Effect.Effect<Effect.Effect<void>, never, Scope.Scope> =>
  Effect.gen(function* () {
    const tick = Effect.sleep(`${options.pollMs} millis`);
    if (!options.watch) return tick;

    const changes = yield* Effect.acquireRelease(Queue.sliding<void>(1), (queue) => Queue.shutdown(queue));
    yield* Effect.acquireRelease(
      Effect.sync(() => {
        const watcher = chokidar.watch(file, { ignoreInitial: true });
        watcher.on("change", () => {
          Queue.unsafeOffer(changes, undefined);
        });
        watcher.on("error", (err) => {
          logRuntimeError("tail watcher", err);
        });
        return watcher;
      }),
      (watcher) =>
        Effect.tryPromise(() => watcher.close()).pipe(
          Effect.catchAll((error) => Effect.logWarning("closing watcher failed", describe(error)))
        )
    );
    return Effect.race(tick, Queue.take(changes));
  });

/**
 * The reader as a lazy stream: initial content, then appended bytes, forever.
 * Interrupting the stream closes the file handle and any watcher.
 */
export const tailFile = (
  file: ResolvedPath,
  options: TailOptions
): Stream.Stream<TailChunk, ReadFailure> =>
  Stream.unwrapScoped(
    Effect.gen(function* () {
      const tail = yield* openTail(file, options);
      const nextTick = yield* pollTrigger(file, options);
      const updates = Stream.repeatEffect(Effect.zipRight(nextTick, tail.poll)).pipe(
        Stream.mapConcat((chunks) => chunks)
      );
      return Stream.concat(Stream.fromIterableEffect(tail.initial), updates);
    })
  );
