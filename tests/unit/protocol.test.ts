import test from "node:test";
import assert from "node:assert/strict";
import { Either, Option } from "effect";
import {
  makeEncoder,
  parseClientMessage,
  parseTextRequest,
  requestFromUpgradeUrl,
} from "../../src/session/protocol.ts";
import { makeRenderer } from "../../src/session/render.ts";

const chunk = (text: string, reset = false) => ({ bytes: Buffer.from(text), offset: 0, reset });

function rightOf<A, E>(either: Either.Either<A, E>): A {
  assert.ok(Either.isRight(either));
  return either.right;
}

test("parseTextRequest reads the path and the tail flag", () => {
  assert.deepEqual(rightOf(parseTextRequest("demo.log?tail=1")), {
    path: "demo.log",
    follow: true,
    framing: "text",
  });
  assert.deepEqual(rightOf(parseTextRequest("logs/a%20b.log")), {
    path: "logs/a b.log",
    follow: false,
    framing: "text",
  });
  assert.equal(rightOf(parseTextRequest("demo.log?tail=0")).follow, false);
});

test("parseTextRequest rejects requests that name no file", () => {
  for (const raw of ["", "/", "?tail=1", "%E0%A4%A"]) {
    const result = parseTextRequest(raw);
    assert.ok(Either.isLeft(result), raw);
    assert.equal(result.left._tag, "InvalidRequest");
  }
});

test("requestFromUpgradeUrl defers to the first message when the URL has no path", () => {
  assert.ok(Option.isNone(requestFromUpgradeUrl(undefined)));
  assert.ok(Option.isNone(requestFromUpgradeUrl("/")));
  assert.ok(Option.isNone(requestFromUpgradeUrl("/?tail=1")));
  assert.deepEqual(rightOf(Option.getOrThrow(requestFromUpgradeUrl("/var/demo.log?tail=yes"))), {
    path: "/var/demo.log",
    follow: true,
    framing: "text",
  });
});

test("parseClientMessage recognises control tokens in either framing", () => {
  assert.deepEqual(rightOf(parseClientMessage("pong", false)), { _tag: "Pong" });
  assert.deepEqual(rightOf(parseClientMessage(" close\n", false)), { _tag: "Close" });
  assert.deepEqual(rightOf(parseClientMessage('{"v":1,"t":"pong"}', false)), { _tag: "Pong" });
  assert.deepEqual(rightOf(parseClientMessage('{"v":1,"t":"close"}', true)), { _tag: "Close" });
});

test("parseClientMessage treats text as a request only while one is awaited", () => {
  assert.deepEqual(
    rightOf(parseClientMessage("demo.log?tail=1", true)),
    { _tag: "Request", request: { path: "demo.log", follow: true, framing: "text" } }
  );
  assert.deepEqual(
    rightOf(parseClientMessage("demo.log?tail=1", false)),
    { _tag: "Ignored", raw: "demo.log?tail=1" }
  );
});

test("parseClientMessage reads open envelopes and rejects unknown ones while awaiting", () => {
  assert.deepEqual(
    rightOf(parseClientMessage('{"v":1,"t":"open","path":"demo.log","follow":true}', true)),
    { _tag: "Request", request: { path: "demo.log", follow: true, framing: "json" } }
  );
  const unknown = parseClientMessage('{"v":2,"t":"open"}', true);
  assert.ok(Either.isLeft(unknown));
  assert.equal(unknown.left._tag, "InvalidRequest");
  assert.deepEqual(
    rightOf(parseClientMessage('{"v":1,"t":"hello"}', false)),
    { _tag: "Ignored", raw: '{"v":1,"t":"hello"}' }
  );
});

test("text encoder sends rendered data and bare tokens", () => {
  const encoder = makeEncoder("text", makeRenderer("text"));
  assert.equal(encoder.data(chunk("a\n")), "a\n");
  assert.equal(encoder.ping(123), "ping");
  assert.equal(encoder.error("NotFound", "Not Found"), "error: Not Found");
});

test("json encoder numbers data frames and wraps everything in envelopes", () => {
  const encoder = makeEncoder("json", makeRenderer("text"));
  assert.deepEqual(JSON.parse(encoder.data(chunk("a\n"))), {
    v: 1,
    t: "data",
    seq: 1,
    data: "a\n",
    reset: false,
  });
  assert.deepEqual(JSON.parse(encoder.data(chunk("b\n", true))), {
    v: 1,
    t: "data",
    seq: 2,
    data: "b\n",
    reset: true,
  });
  assert.deepEqual(JSON.parse(encoder.ping(5)), { v: 1, t: "ping", ts: 5 });
  assert.deepEqual(JSON.parse(encoder.error("InvalidPath", "Forbidden")), {
    v: 1,
    t: "error",
    code: "InvalidPath",
    reason: "Forbidden",
  });
});
