import test from "node:test";
import assert from "node:assert/strict";
import { Effect, Either, Fiber } from "effect";
import { makeHeartbeat } from "../../src/session/heartbeat.ts";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

test("an unanswered probe fails with HeartbeatTimeout", async () => {
  let probes = 0;
  const result = await Effect.runPromise(
    Effect.gen(function* () {
      const monitor = yield* makeHeartbeat({
        intervalMs: 20,
        timeoutMs: 30,
        probe: Effect.sync(() => {
          probes += 1;
        }),
      });
      return yield* Effect.either(monitor.run);
    })
  );
  assert.ok(Either.isLeft(result));
  assert.equal(result.left._tag, "HeartbeatTimeout");
  assert.equal(result.left.timeoutMs, 30);
  assert.equal(probes, 1);
});

test("replies keep the monitor running and record the last reply", async () => {
  const monitor = await Effect.runPromise(
    makeHeartbeat({ intervalMs: 20, timeoutMs: 200, probe: Effect.void })
  );
  const fiber = Effect.runFork(monitor.run);

  const until = Date.now() + 2000;
  let state = await Effect.runPromise(monitor.state);
  while (state.probesSent < 3 && Date.now() < until) {
    await sleep(5);
    await Effect.runPromise(monitor.acknowledge);
    state = await Effect.runPromise(monitor.state);
  }
  await Effect.runPromise(Fiber.interrupt(fiber));

  assert.ok(state.probesSent >= 3);
  assert.notEqual(state.lastPongAt, undefined);
  assert.equal(fiber.unsafePoll()?._tag, "Failure");
});

test("a reply with no probe outstanding is ignored", async () => {
  const monitor = await Effect.runPromise(
    makeHeartbeat({ intervalMs: 10_000, timeoutMs: 1000, probe: Effect.void })
  );
  assert.equal(await Effect.runPromise(monitor.acknowledge), false);
  const state = await Effect.runPromise(monitor.state);
  assert.deepEqual(state, {
    awaitingPong: false,
    deadline: undefined,
    lastPongAt: undefined,
    probesSent: 0,
  });
});

test("a probe marks the monitor as awaiting a reply until acknowledged", async () => {
  const monitor = await Effect.runPromise(
    makeHeartbeat({ intervalMs: 10, timeoutMs: 1000, probe: Effect.void })
  );
  const fiber = Effect.runFork(monitor.run);
  await sleep(40);

  const waiting = await Effect.runPromise(monitor.state);
  assert.equal(waiting.awaitingPong, true);
  assert.equal(waiting.probesSent, 1);
  assert.equal(typeof waiting.deadline, "number");

  assert.equal(await Effect.runPromise(monitor.acknowledge), true);
  const answered = await Effect.runPromise(monitor.state);
  assert.equal(answered.awaitingPong, false);
  assert.equal(answered.deadline, undefined);

  await Effect.runPromise(Fiber.interrupt(fiber));
});
