import type { IncomingMessage } from "node:http";
import { WebSocket, type RawData } from "ws";
import { Effect, Queue, type Scope } from "effect";
import { ConnectionError } from "../errors.js";

export type Inbound =
  | { readonly _tag: "Message"; readonly text: string }
  | { readonly _tag: "Closed"; readonly code: number }
  | { readonly _tag: "Failed"; readonly detail: string };

/** The transport as a session sees it: a queue of inbound events and an ordered send. */
export interface SessionConnection {
  readonly remote: string;
  /** Upgrade request URL, when the transport has one */
  readonly url: string | undefined;
  readonly inbound: Queue.Dequeue<Inbound>;
  /** Resolves once the frame has been handed to the transport */
  readonly send: (frame: string) => Effect.Effect<void, ConnectionError>;
  readonly close: (code: number, reason: string) => Effect.Effect<void>;
}

function rawToText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

function remoteOf(request: IncomingMessage): string {
  const { remoteAddress, remotePort } = request.socket;
  return remoteAddress ? `${remoteAddress}:${remotePort ?? "?"}` : "unknown";
}

/** Close reasons are capped at 123 bytes by the protocol. */
function clampReason(reason: string): string {
  const bytes = Buffer.from(reason, "utf8");
  return bytes.length <= 123 ? reason : bytes.subarray(0, 123).toString("utf8");
}

export interface AttachedSocket {
  readonly connection: SessionConnection;
  /** Remove the listeners and shut the inbound queue */
  readonly detach: Effect.Effect<void>;
}

/**
 * Adapt a `ws` socket. Call this from the `connection` handler itself: the
 * listeners go on synchronously, so a request sent right after the handshake
 * waits in the inbound queue instead of being dropped.
 */
export function attachWebSocket(socket: WebSocket, request: IncomingMessage): AttachedSocket {
  const inbound = Effect.runSync(Queue.unbounded<Inbound>());

  const onMessage = (data: RawData, isBinary: boolean) => {
    if (isBinary) return;
    Queue.unsafeOffer(inbound, { _tag: "Message", text: rawToText(data) });
  };
  const onClose = (code: number) => {
    Queue.unsafeOffer(inbound, { _tag: "Closed", code });
  };
  const onError = (error: Error) => {
    Queue.unsafeOffer(inbound, { _tag: "Failed", detail: error.message });
  };
  socket.on("message", onMessage);
  socket.on("close", onClose);
  socket.on("error", onError);
  if (socket.readyState === WebSocket.CLOSED) onClose(1006);

  const send = (frame: string): Effect.Effect<void, ConnectionError> =>
    Effect.async<void, ConnectionError>((resume) => {
      if (socket.readyState !== WebSocket.OPEN) {
        resume(Effect.fail(new ConnectionError({ detail: "socket is not open" })));
        return;
      }
      socket.send(frame, (error) => {
        resume(
          error ? Effect.fail(new ConnectionError({ detail: error.message })) : Effect.void
        );
      });
    });

  const close = (code: number, reason: string): Effect.Effect<void> =>
    Effect.sync(() => {
      if (socket.readyState === WebSocket.OPEN || socket.readyState === WebSocket.CONNECTING) {
        socket.close(code, clampReason(reason));
      }
    });

  const detach = Effect.sync(() => {
    socket.off("message", onMessage);
    socket.off("close", onClose);
    socket.off("error", onError);
  }).pipe(Effect.zipRight(Queue.shutdown(inbound)));

  return {
    connection: { remote: remoteOf(request), url: request.url, inbound, send, close },
    detach,
  };
}

/** The attached connection for the lifetime of the surrounding scope. */
export const scopedConnection = (
  attached: AttachedSocket
): Effect.Effect<SessionConnection, never, Scope.Scope> =>
  Effect.acquireRelease(Effect.succeed(attached.connection), () => attached.detach);
