import { toResult, type DecodeResult } from "../../shared/errors.js";
import { parseJsonRpcLine, serializeJsonRpc } from "../jsonrpc/codec.js";
import { withVersion, type JsonRpcMessage } from "../jsonrpc/types.js";
import { parseEnvelope } from "../jsonrpc/validate.js";
import { formatFace, formatLine } from "./face.js";
import type { IncomingRequest } from "./types.js";
import { decodeIncomingParams, type RawWireIncoming, type WireIncoming } from "./wire.js";

/** Positional slot i becomes the i-th named field. Total; never throws. */
export function fromWireIncoming(wire: WireIncoming): IncomingRequest {
  switch (wire.method) {
    case "draw": {
      const [lines, defaultFace, paddingFace] = wire.params;
      return { kind: "draw", lines, defaultFace, paddingFace };
    }
    case "draw_status": {
      const [statusLine, modeLine, defaultFace] = wire.params;
      return { kind: "draw_status", statusLine, modeLine, defaultFace };
    }
    case "menu_show": {
      const [items, anchor, selectedItemFace, menuFace, style] = wire.params;
      return { kind: "menu_show", items, anchor, selectedItemFace, menuFace, style };
    }
    case "menu_select":
      return { kind: "menu_select", selected: wire.params[0] };
    case "menu_hide":
      return { kind: "menu_hide" };
    case "info_show": {
      const [title, content, anchor, face, style] = wire.params;
      return { kind: "info_show", title, content, anchor, face, style };
    }
    case "info_hide":
      return { kind: "info_hide" };
    case "set_cursor": {
      const [mode, coord] = wire.params;
      return { kind: "set_cursor", mode, coord };
    }
    case "set_ui_options":
      return { kind: "set_ui_options", options: wire.params[0] };
    case "refresh":
      return { kind: "refresh", force: wire.params[0] };
  }
}

/** Inverse of fromWireIncoming, with faces turned back into their wire strings. */
export function toWireIncoming(request: IncomingRequest): RawWireIncoming {
  switch (request.kind) {
    case "draw":
      return {
        method: "draw",
        params: [request.lines.map(formatLine), formatFace(request.defaultFace), formatFace(request.paddingFace)],
      };
    case "draw_status":
      return {
        method: "draw_status",
        params: [formatLine(request.statusLine), formatLine(request.modeLine), formatFace(request.defaultFace)],
      };
    case "menu_show":
      return {
        method: "menu_show",
        params: [
          request.items.map(formatLine),
          { ...request.anchor },
          formatFace(request.selectedItemFace),
          formatFace(request.menuFace),
          request.style,
        ],
      };
    case "menu_select":
      return { method: "menu_select", params: [request.selected] };
    case "menu_hide":
      return { method: "menu_hide", params: [] };
    case "info_show":
      return {
        method: "info_show",
        params: [
          formatLine(request.title),
          request.content.map(formatLine),
          { ...request.anchor },
          formatFace(request.face),
          request.style,
        ],
      };
    case "info_hide":
      return { method: "info_hide", params: [] };
    case "set_cursor":
      return { method: "set_cursor", params: [request.mode, { ...request.coord }] };
    case "set_ui_options":
      return { method: "set_ui_options", params: [{ ...request.options }] };
    case "refresh":
      return { method: "refresh", params: [request.force] };
  }
}

/** Decodes an already-parsed JSON value. */
export function decodeIncomingValue(value: unknown): IncomingRequest {
  const envelope = parseEnvelope(value);
  return fromWireIncoming(decodeIncomingParams(envelope.method, envelope.params));
}

/** Decodes one complete message (a single line of JSON, with or without its newline). */
export function decodeIncoming(input: string | Uint8Array): IncomingRequest {
  return decodeIncomingValue(parseJsonRpcLine(input));
}

export function safeDecodeIncoming(input: string | Uint8Array): DecodeResult<IncomingRequest> {
  return toResult(() => decodeIncoming(input));
}

export function toJsonRpcIncoming(request: IncomingRequest): JsonRpcMessage<RawWireIncoming> {
  return withVersion(toWireIncoming(request));
}

/** Writes the line the editor would send for this request. */
export function encodeIncoming(request: IncomingRequest): string {
  return serializeJsonRpc(toJsonRpcIncoming(request));
}
