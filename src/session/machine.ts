import { CloseCode, clientReason, closeCodeFor, type SessionError } from "../errors.js";

export type SessionState = "AwaitingRequest" | "Validating" | "Streaming" | "Closing" | "Closed";

const TRANSITIONS: Record<SessionState, ReadonlyArray<SessionState>> = {
  AwaitingRequest: ["Validating", "Closing"],
  Validating: ["Streaming", "Closing"],
  Streaming: ["Closing"],
  Closing: ["Closed"],
  Closed: [],
};

export function canTransition(from: SessionState, to: SessionState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** The next state, or undefined when the move is not allowed. */
export function transition(from: SessionState, to: SessionState): SessionState | undefined {
  return canTransition(from, to) ? to : undefined;
}

export type CloseReason =
  /** Read-once request fully sent */
  | { readonly _tag: "Completed" }
  /** Transport closed from the far side */
  | { readonly _tag: "ClientClosed"; readonly code: number }
  | { readonly _tag: "CloseRequested" }
  | { readonly _tag: "Shutdown" }
  | { readonly _tag: "Failed"; readonly error: SessionError };

export const CloseReason = {
  completed: { _tag: "Completed" } satisfies CloseReason,
  closeRequested: { _tag: "CloseRequested" } satisfies CloseReason,
  shutdown: { _tag: "Shutdown" } satisfies CloseReason,
  clientClosed: (code: number): CloseReason => ({ _tag: "ClientClosed", code }),
  failed: (error: SessionError): CloseReason => ({ _tag: "Failed", error }),
};

export interface ClosePlan {
  readonly code: number;
  /** Close-frame reason text */
  readonly reason: string;
  /** Error surfaced to the client before closing, when there is one */
  readonly notify: { readonly code: string; readonly reason: string } | undefined;
  /** Whether queued frames are still worth sending */
  readonly flush: boolean;
  readonly outcome: string;
}

export function closePlan(reason: CloseReason): ClosePlan {
  switch (reason._tag) {
    case "Completed":
      return { code: CloseCode.normal, reason: "done", notify: undefined, flush: true, outcome: "completed" };
    case "ClientClosed":
      return { code: CloseCode.normal, reason: "", notify: undefined, flush: false, outcome: "client_closed" };
    case "CloseRequested":
      return { code: CloseCode.normal, reason: "bye", notify: undefined, flush: true, outcome: "close_requested" };
    case "Shutdown":
      return { code: CloseCode.goingAway, reason: "server shutting down", notify: undefined, flush: true, outcome: "shutdown" };
    case "Failed": {
      const { error } = reason;
      const message = clientReason(error);
      return {
        code: closeCodeFor(error),
        reason: message ?? error._tag,
        notify: message === null ? undefined : { code: error._tag, reason: message },
        flush: error._tag !== "ConnectionError",
        outcome: error._tag,
      };
    }
  }
}
