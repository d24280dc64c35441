import test, { type TestContext } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Chunk, Effect, Either, Fiber, Stream } from "effect";
import { resolvePath, type ResolvedPath } from "../../src/session/paths.ts";
import {
  openHandleCount,
  openTail,
  readLastLines,
  planRead,
  sliceLastLines,
  splitChunk,
  tailFile,
} from "../../src/session/tailReader.ts";

const options = { pollMs: 20, backlogLines: 0, maxChunkBytes: 1024, watch: false };

async function makeFile(t: TestContext, content: string): Promise<ResolvedPath> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "tailcast-tail-"));
  t.after(() => fs.rm(root, { recursive: true, force: true }));
  await fs.writeFile(path.join(root, "demo.log"), content);
  return Effect.runPromise(resolvePath(root, "demo.log"));
}

const text = (chunks: ReadonlyArray<{ bytes: Buffer }>) =>
  chunks.map((chunk) => chunk.bytes.toString("utf8"));

test("planRead compares the cursor against the observed size", () => {
  assert.deepEqual(planRead(10, 10), { _tag: "Idle" });
  assert.deepEqual(planRead(10, 14), { _tag: "Append", start: 10, end: 14 });
  assert.deepEqual(planRead(10, 3), { _tag: "Reset", end: 3 });
  assert.deepEqual(planRead(0, 0), { _tag: "Idle" });
});

test("sliceLastLines keeps the trailing lines", () => {
  const bytes = Buffer.from("one\ntwo\nthree\n");
  assert.equal(sliceLastLines(bytes, 2).toString(), "two\nthree\n");
  assert.equal(sliceLastLines(bytes, 3).toString(), "one\ntwo\nthree\n");
  assert.equal(sliceLastLines(bytes, 10).toString(), "one\ntwo\nthree\n");
  assert.equal(sliceLastLines(bytes, 0).toString(), "one\ntwo\nthree\n");
  assert.equal(sliceLastLines(Buffer.from("one\ntwo"), 1).toString(), "two");
});

test("splitChunk caps chunk size and keeps offsets", () => {
  const chunks = splitChunk(Buffer.from("abcdefg"), 100, 3, true);
  assert.deepEqual(
    chunks.map((chunk) => [chunk.bytes.toString(), chunk.offset, chunk.reset]),
    [
      ["abc", 100, true],
      ["def", 103, false],
      ["g", 106, false],
    ]
  );
});

test("initial read returns the whole file and moves the cursor to its end", async (t) => {
  const file = await makeFile(t, "a\nb\n");
  const [chunks, cursor] = await Effect.runPromise(
    Effect.scoped(
      Effect.gen(function* () {
        const tail = yield* openTail(file, options);
        const initial = yield* tail.initial;
        return [initial, yield* tail.cursor] as const;
      })
    )
  );
  assert.deepEqual(text(chunks), ["a\nb\n"]);
  assert.equal(cursor, 4);
  assert.equal(openHandleCount(), 0);
});

test("initial read honours backlogLines", async (t) => {
  const file = await makeFile(t, "1\n2\n3\n4\n");
  const chunks = await Effect.runPromise(
    Effect.scoped(
      openTail(file, { ...options, backlogLines: 2 }).pipe(Effect.flatMap((tail) => tail.initial))
    )
  );
  assert.deepEqual(text(chunks), ["3\n4\n"]);
  assert.equal(chunks[0].offset, 4);
});

test("readLastLines walks back in pieces until it has enough lines", async (t) => {
  const file = await makeFile(t, "one\ntwo\nthree\n");
  const handle = await fs.open(file, "r");
  t.after(() => handle.close());

  const lastTwo = await Effect.runPromise(readLastLines(handle, file, 14, 2, 4));
  assert.equal(lastTwo.toString(), "two\nthree\n");
  const all = await Effect.runPromise(readLastLines(handle, file, 14, 10, 4));
  assert.equal(all.toString(), "one\ntwo\nthree\n");
});

test("a backlog of a file larger than one read piece starts at the right offset", async (t) => {
  const lines = Array.from({ length: 20_000 }, (_, index) => `line-${String(index).padStart(5, "0")}\n`);
  const file = await makeFile(t, lines.join(""));
  const chunks = await Effect.runPromise(
    Effect.scoped(
      Effect.gen(function* () {
        const tail = yield* openTail(file, { ...options, backlogLines: 2 });
        const initial = yield* tail.initial;
        return { initial, cursor: yield* tail.cursor };
      })
    )
  );
  assert.deepEqual(text(chunks.initial), ["line-19998\nline-19999\n"]);
  assert.equal(chunks.initial[0].offset, 20_000 * 11 - 22);
  assert.equal(chunks.cursor, 20_000 * 11);
});

test("poll emits appended bytes, then re-sends everything after truncation", async (t) => {
  const file = await makeFile(t, "first\n");
  const result = await Effect.runPromise(
    Effect.scoped(
      Effect.gen(function* () {
        const tail = yield* openTail(file, options);
        yield* tail.initial;
        const idle = yield* tail.poll;

        yield* Effect.promise(() => fs.appendFile(file, "second\n"));
        const appended = yield* tail.poll;

        yield* Effect.promise(() => fs.truncate(file, 0));
        yield* Effect.promise(() => fs.appendFile(file, "x\n"));
        const reset = yield* tail.poll;
        return { idle, appended, reset, cursor: yield* tail.cursor };
      })
    )
  );

  assert.deepEqual(result.idle, []);
  assert.deepEqual(text(result.appended), ["second\n"]);
  assert.equal(result.appended[0].offset, 6);
  assert.equal(result.appended[0].reset, false);
  assert.deepEqual(text(result.reset), ["x\n"]);
  assert.equal(result.reset[0].reset, true);
  assert.equal(result.cursor, 2);
});

test("poll fails once the file is removed", async (t) => {
  const file = await makeFile(t, "a\n");
  const result = await Effect.runPromise(
    Effect.scoped(
      Effect.gen(function* () {
        const tail = yield* openTail(file, options);
        yield* tail.initial;
        yield* Effect.promise(() => fs.rm(file));
        return yield* Effect.either(tail.poll);
      })
    )
  );
  assert.ok(Either.isLeft(result));
  assert.equal(result.left._tag, "ReadFailure");
  assert.equal(result.left.detail, "file was removed");
  assert.equal(openHandleCount(), 0);
});

test("poll fails when the path now names another file", async (t) => {
  const file = await makeFile(t, "a\n");
  const result = await Effect.runPromise(
    Effect.scoped(
      Effect.gen(function* () {
        const tail = yield* openTail(file, options);
        yield* tail.initial;
        yield* Effect.promise(async () => {
          await fs.writeFile(`${file}.new`, "b\n");
          await fs.rename(`${file}.new`, file);
        });
        return yield* Effect.either(tail.poll);
      })
    )
  );
  assert.ok(Either.isLeft(result));
  assert.equal(result.left.detail, "file was replaced");
});

test("tailFile streams the file then its appends, and closes the handle on interrupt", async (t) => {
  const file = await makeFile(t, "a\n");
  const fiber = Effect.runFork(Stream.runCollect(Stream.take(tailFile(file, options), 2)));
  const appender = setTimeout(() => {
    void fs.appendFile(file, "b\n");
  }, 60);
  t.after(() => clearTimeout(appender));

  const collected = await Effect.runPromise(Fiber.join(fiber));
  assert.deepEqual(text(Chunk.toReadonlyArray(collected)), ["a\n", "b\n"]);
  assert.equal(openHandleCount(), 0);
});

test("with watch on, an append is picked up before the next poll is due", async (t) => {
  const file = await makeFile(t, "a\n");
  const started = Date.now();
  const fiber = Effect.runFork(
    Stream.runCollect(Stream.take(tailFile(file, { ...options, pollMs: 5000, watch: true }), 2))
  );
  const appender = setTimeout(() => {
    void fs.appendFile(file, "b\n");
  }, 300);
  t.after(() => clearTimeout(appender));

  const collected = await Effect.runPromise(Fiber.join(fiber));
  assert.deepEqual(text(Chunk.toReadonlyArray(collected)), ["a\n", "b\n"]);
  assert.ok(Date.now() - started < 3000);
  assert.equal(openHandleCount(), 0);
});

test("an idle tail holds exactly one handle until interrupted", async (t) => {
  const file = await makeFile(t, "a\n");
  const fiber = Effect.runFork(Stream.runDrain(tailFile(file, options)));
  await new Promise((resolve) => setTimeout(resolve, 60));
  assert.equal(openHandleCount(), 1);
  await Effect.runPromise(Fiber.interrupt(fiber));
  assert.equal(openHandleCount(), 0);
});
