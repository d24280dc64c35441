/**
 * Wire protocol.
 *
 * text framing: the request is a bare path (`demo.log?tail=1`), data goes out
 * as rendered text, probes are the tokens `ping` / `pong`, `close` ends it.
 * json framing: `{ v: 1, t: ... }` envelopes carrying the same information.
 * The first inbound message decides which one a session speaks.
 */

import { Either, Option } from "effect";
import { InvalidRequest } from "../errors.js";
import type { Renderer } from "./render.js";
import type { TailChunk } from "./tailReader.js";

export type Framing = "text" | "json";

export interface TailRequest {
  readonly path: string;
  readonly follow: boolean;
  readonly framing: Framing;
}

export type ClientMessage =
  | { readonly _tag: "Request"; readonly request: TailRequest }
  | { readonly _tag: "Pong" }
  | { readonly _tag: "Close" }
  | { readonly _tag: "Ignored"; readonly raw: string };

const FOLLOW_VALUES = new Set(["1", "true", "yes", "on"]);

const PING = "ping";
const PONG = "pong";
const CLOSE = "close";

/** `demo.log?tail=1` → path + follow flag. The path is percent-decoded, never normalized. */
export function parseTextRequest(raw: string): Either.Either<TailRequest, InvalidRequest> {
  const queryAt = raw.indexOf("?");
  const encodedPath = queryAt === -1 ? raw : raw.slice(0, queryAt);
  const query = new URLSearchParams(queryAt === -1 ? "" : raw.slice(queryAt + 1));
  let decoded: string;
  try {
    decoded = decodeURIComponent(encodedPath.trim());
  } catch {
    return Either.left(new InvalidRequest({ raw, detail: "malformed percent-encoding" }));
  }
  if (decoded === "" || decoded === "/") {
    return Either.left(new InvalidRequest({ raw, detail: "no file named" }));
  }
  const tail = (query.get("tail") ?? "").toLowerCase();
  return Either.right({ path: decoded, follow: FOLLOW_VALUES.has(tail), framing: "text" });
}

/**
 * The request carried by the WebSocket upgrade URL (`ws://host/demo.log?tail=1`),
 * or none when the URL names no file and the client is expected to send one.
 */
export function requestFromUpgradeUrl(
  url: string | undefined
): Option.Option<Either.Either<TailRequest, InvalidRequest>> {
  if (!url) return Option.none();
  const queryAt = url.indexOf("?");
  const pathname = queryAt === -1 ? url : url.slice(0, queryAt);
  if (pathname === "" || pathname === "/") return Option.none();
  return Option.some(parseTextRequest(url));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseEnvelope(raw: string): ClientMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { _tag: "Ignored", raw };
  }
  if (!isRecord(parsed) || parsed.v !== 1) return { _tag: "Ignored", raw };
  switch (parsed.t) {
    case "open":
      if (typeof parsed.path !== "string" || parsed.path.trim() === "") {
        return { _tag: "Ignored", raw };
      }
      return {
        _tag: "Request",
        request: { path: parsed.path, follow: parsed.follow === true, framing: "json" },
      };
    case PONG:
      return { _tag: "Pong" };
    case CLOSE:
      return { _tag: "Close" };
    default:
      return { _tag: "Ignored", raw };
  }
}

/**
 * Classify one inbound text frame. Bare text is only a request while the
 * session is still waiting for one; afterwards anything unrecognised is ignored.
 */
export function parseClientMessage(
  raw: string,
  awaitingRequest: boolean
): Either.Either<ClientMessage, InvalidRequest> {
  const trimmed = raw.trim();
  if (trimmed === PONG) return Either.right({ _tag: "Pong" });
  if (trimmed === CLOSE) return Either.right({ _tag: "Close" });
  if (trimmed.startsWith("{")) {
    const message = parseEnvelope(trimmed);
    if (awaitingRequest && message._tag === "Ignored") {
      return Either.left(new InvalidRequest({ raw, detail: "unrecognised envelope" }));
    }
    return Either.right(message);
  }
  if (!awaitingRequest) return Either.right({ _tag: "Ignored", raw });
  return Either.map(parseTextRequest(trimmed), (request) => ({ _tag: "Request" as const, request }));
}

/**
 * Builds outbound frames for one session; data frames are numbered in order.
 * `last` marks the final chunk a session will send, so held-back input is released.
 */
export interface Encoder {
  readonly data: (chunk: TailChunk, last?: boolean) => string;
  readonly error: (code: string, reason: string) => string;
  readonly ping: (ts: number) => string;
}

export function makeEncoder(framing: Framing, renderer: Renderer): Encoder {
  const render = (chunk: TailChunk, last: boolean) =>
    renderer.chunk(chunk.bytes, chunk.reset) + (last ? renderer.flush() : "");
  if (framing === "text") {
    return {
      data: (chunk, last = false) => render(chunk, last),
      error: (_code, reason) => renderer.error(reason),
      ping: () => PING,
    };
  }
  let seq = 0;
  return {
    data: (chunk, last = false) => {
      seq += 1;
      return JSON.stringify({
        v: 1,
        t: "data",
        seq,
        data: render(chunk, last),
        reset: chunk.reset,
      });
    },
    error: (code, reason) => JSON.stringify({ v: 1, t: "error", code, reason }),
    ping: (ts) => JSON.stringify({ v: 1, t: PING, ts }),
  };
}
