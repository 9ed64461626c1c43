import { toResult, type DecodeResult } from "../../shared/errors.js";
import { parseJsonRpcLine, serializeJsonRpc } from "../jsonrpc/codec.js";
import { withVersion, type JsonRpcMessage } from "../jsonrpc/types.js";
import { parseEnvelope } from "../jsonrpc/validate.js";
import type { OutgoingRequest } from "./types.js";
import { decodeOutgoingParams, type WireOutgoing } from "./wire.js";

/**
 * Named fields back into positional params. `keys` puts the key list in
 * params directly (`["a","b"]`, not `[["a","b"]]`); every other method keeps
 * its fixed tuple, single values included.
 */
export function toWireOutgoing(request: OutgoingRequest): WireOutgoing {
  switch (request.kind) {
    case "keys":
      return { method: "keys", params: [...request.keys] };
    case "resize":
      return { method: "resize", params: [request.rows, request.columns] };
    case "scroll":
      return { method: "scroll", params: [request.amount] };
    case "mouse_move":
      return { method: "mouse_move", params: [request.line, request.column] };
    case "mouse_press":
      return { method: "mouse_press", params: [request.button, request.line, request.column] };
    case "mouse_release":
      return { method: "mouse_release", params: [request.button, request.line, request.column] };
    case "menu_select":
      return { method: "menu_select", params: [request.index] };
  }
}

export function fromWireOutgoing(wire: WireOutgoing): OutgoingRequest {
  switch (wire.method) {
    case "keys":
      return { kind: "keys", keys: wire.params };
    case "resize": {
      const [rows, columns] = wire.params;
      return { kind: "resize", rows, columns };
    }
    case "scroll":
      return { kind: "scroll", amount: wire.params[0] };
    case "mouse_move": {
      const [line, column] = wire.params;
      return { kind: "mouse_move", line, column };
    }
    case "mouse_press": {
      const [button, line, column] = wire.params;
      return { kind: "mouse_press", button, line, column };
    }
    case "mouse_release": {
      const [button, line, column] = wire.params;
      return { kind: "mouse_release", button, line, column };
    }
    case "menu_select":
      return { kind: "menu_select", index: wire.params[0] };
  }
}

export function toJsonRpcOutgoing(request: OutgoingRequest): JsonRpcMessage<WireOutgoing> {
  return withVersion(toWireOutgoing(request));
}

/** Serializes one request as a single newline-terminated line. Never throws. */
export function encodeOutgoing(request: OutgoingRequest): string {
  return serializeJsonRpc(toJsonRpcOutgoing(request));
}

export function decodeOutgoingValue(value: unknown): OutgoingRequest {
  const envelope = parseEnvelope(value);
  return fromWireOutgoing(decodeOutgoingParams(envelope.method, envelope.params));
}

export function decodeOutgoing(input: string | Uint8Array): OutgoingRequest {
  return decodeOutgoingValue(parseJsonRpcLine(input));
}

export function safeDecodeOutgoing(input: string | Uint8Array): DecodeResult<OutgoingRequest> {
  return toResult(() => decodeOutgoing(input));
}
