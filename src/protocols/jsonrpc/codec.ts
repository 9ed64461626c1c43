/**
 * JSON-RPC codec for newline-delimited JSON.
 */
import { MalformedMessageError } from "../../shared/errors.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

// Only what JSON itself treats as whitespace (RFC 8259 §2).
const JSON_BLANK = /^[ \t\r\n]*$/;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new MalformedMessageError(`Invalid UTF-8: ${describe(error)}`);
  }
}

/** Parses one line. Blank input yields null so the envelope check reports it. */
export function parseJsonRpcLine(line: string | Uint8Array): unknown {
  const text = typeof line === "string" ? line : decodeUtf8(line);
  if (JSON_BLANK.test(text)) return null;
  try {
    return JSON.parse(text) as unknown;
  } catch (error) {
    throw new MalformedMessageError(`Invalid JSON: ${describe(error)}`);
  }
}

export function serializeJsonRpc(obj: unknown): string {
  return JSON.stringify(obj) + "\n";
}
