import { Data } from "effect";

/** Requested path escapes every configured root, or is malformed. */
export class InvalidPath extends Data.TaggedError("InvalidPath")<{
  readonly requested: string;
  readonly detail: string;
}> {}

export class NotFound extends Data.TaggedError("NotFound")<{
  readonly requested: string;
}> {}

/** Exists inside the root but is not a regular file we may read. */
export class NotReadable extends Data.TaggedError("NotReadable")<{
  readonly requested: string;
  readonly detail: string;
}> {}

/** The file vanished, was replaced, or stopped being readable mid-stream. */
export class ReadFailure extends Data.TaggedError("ReadFailure")<{
  readonly path: string;
  readonly detail: string;
}> {}

export class HeartbeatTimeout extends Data.TaggedError("HeartbeatTimeout")<{
  readonly timeoutMs: number;
}> {}

export class ConnectionError extends Data.TaggedError("ConnectionError")<{
  readonly detail: string;
}> {}

export class RequestTimeout extends Data.TaggedError("RequestTimeout")<{
  readonly timeoutMs: number;
}> {}

export class InvalidRequest extends Data.TaggedError("InvalidRequest")<{
  readonly raw: string;
  readonly detail: string;
}> {}

export type PathError = InvalidPath | NotFound | NotReadable;

export type SessionError =
  | PathError
  | ReadFailure
  | HeartbeatTimeout
  | ConnectionError
  | RequestTimeout
  | InvalidRequest;

/** Human-readable reason sent to the client; null when the error is not surfaced. */
export function clientReason(error: SessionError): string | null {
  switch (error._tag) {
    case "InvalidPath":
      return "Forbidden";
    case "NotFound":
      return "Not Found";
    case "NotReadable":
      return "Not Readable";
    case "ReadFailure":
      return "Read Failure";
    case "InvalidRequest":
      return "Bad Request";
    case "RequestTimeout":
      return "Request Timeout";
    case "HeartbeatTimeout":
    case "ConnectionError":
      return null;
  }
}

export const CloseCode = {
  normal: 1000,
  goingAway: 1001,
  policy: 1008,
  internal: 1011,
} as const;

export type CloseCodeValue = (typeof CloseCode)[keyof typeof CloseCode];

export function closeCodeFor(error: SessionError): CloseCodeValue {
  switch (error._tag) {
    case "InvalidPath":
    case "NotFound":
    case "NotReadable":
    case "InvalidRequest":
    case "RequestTimeout":
      return CloseCode.policy;
    case "ReadFailure":
    case "ConnectionError":
      return CloseCode.internal;
    case "HeartbeatTimeout":
      return CloseCode.goingAway;
  }
}
