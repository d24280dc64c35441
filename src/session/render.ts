import { AnsiUp } from "ansi_up";
import type { RenderModeType } from "../config/index.js";

/**
 * Turns file bytes into message text. Stateful: a multi-byte character or an
 * ANSI colour split across two chunks comes out as if it had arrived whole.
 */
export interface Renderer {
  readonly chunk: (bytes: Uint8Array, reset: boolean) => string;
  /** End of input: whatever is still held back (a partial character or escape). */
  readonly flush: () => string;
  readonly error: (reason: string) => string;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** AnsiUp escapes markup by default. */
const newConverter = (): AnsiUp => new AnsiUp();

const ESC = "\u001b";
// ESC alone, a CSI without its final byte, or an OSC without its terminator
const UNTERMINATED_ESCAPE = /^\u001b(?:\[[\u0030-\u003f]*[\u0020-\u002f]*|\][^\u0007]*)?$/;

/** Split `text` before a trailing escape sequence that is not complete yet. */
export function splitPendingEscape(text: string): readonly [complete: string, pending: string] {
  const start = text.lastIndexOf(ESC);
  if (start === -1 || !UNTERMINATED_ESCAPE.test(text.slice(start))) return [text, ""];
  return [text.slice(0, start), text.slice(start)];
}

function textRenderer(): Renderer {
  let decoder = new TextDecoder("utf-8");
  return {
    chunk: (bytes, reset) => {
      if (reset) decoder = new TextDecoder("utf-8");
      return decoder.decode(bytes, { stream: true });
    },
    flush: () => decoder.decode(),
    error: (reason) => `error: ${reason}`,
  };
}

function htmlRenderer(): Renderer {
  let decoder = new TextDecoder("utf-8");
  let converter = newConverter();
  // Escape held here rather than inside the converter, so the end of input can release it
  let pending = "";
  const convert = (text: string) => (text === "" ? "" : converter.ansi_to_html(text));
  return {
    chunk: (bytes, reset) => {
      if (reset) {
        decoder = new TextDecoder("utf-8");
        converter = newConverter();
        pending = "";
      }
      const [complete, rest] = splitPendingEscape(pending + decoder.decode(bytes, { stream: true }));
      pending = rest;
      return convert(complete);
    },
    flush: () => {
      const [complete, rest] = splitPendingEscape(pending + decoder.decode());
      pending = "";
      return convert(complete) + escapeHtml(rest);
    },
    error: (reason) => `<font color="red"><strong>${escapeHtml(reason)}</strong></font>`,
  };
}

export function makeRenderer(mode: RenderModeType): Renderer {
  return mode === "html" ? htmlRenderer() : textRenderer();
}
