/**
 * Wire shapes: one `{ method, params }` pair per protocol method, with params
 * as the fixed-arity positional tuple the protocol sends. Internal to the
 * codec; callers only ever see the named shapes in types.ts.
 */
import { type } from "arktype";
import { MalformedMessageError } from "../../shared/errors.js";
import { assertSchema } from "../assert.js";
import {
  CoordSchema,
  RawFaceSchema,
  RawLineSchema,
  U32,
  parseCoord,
  parseFace,
  parseLine,
  type RawCoord,
  type RawFace,
  type RawLine,
} from "./face.js";
import type { Coord, Face, Line } from "./types.js";

export type WireIncoming =
  | { method: "draw"; params: [lines: Line[], defaultFace: Face, paddingFace: Face] }
  | { method: "draw_status"; params: [statusLine: Line, modeLine: Line, defaultFace: Face] }
  | {
      method: "menu_show";
      params: [items: Line[], anchor: Coord, selectedItemFace: Face, menuFace: Face, style: string];
    }
  | { method: "menu_select"; params: [selected: number] }
  | { method: "menu_hide"; params: [] }
  | {
      method: "info_show";
      params: [title: Line, content: Line[], anchor: Coord, face: Face, style: string];
    }
  | { method: "info_hide"; params: [] }
  | { method: "set_cursor"; params: [mode: string, coord: Coord] }
  | { method: "set_ui_options"; params: [options: Record<string, string>] }
  | { method: "refresh"; params: [force: boolean] };

export type WireOutgoing =
  | { method: "keys"; params: string[] }
  | { method: "resize"; params: [rows: number, columns: number] }
  | { method: "scroll"; params: [amount: number] }
  | { method: "mouse_move"; params: [line: number, column: number] }
  | { method: "mouse_press"; params: [button: string, line: number, column: number] }
  | { method: "mouse_release"; params: [button: string, line: number, column: number] }
  | { method: "menu_select"; params: [index: number] };

/** Faces, lines and coordinates as they appear on the wire, for encoding. */
export type RawWireIncoming =
  | { method: "draw"; params: [RawLine[], RawFace, RawFace] }
  | { method: "draw_status"; params: [RawLine, RawLine, RawFace] }
  | { method: "menu_show"; params: [RawLine[], RawCoord, RawFace, RawFace, string] }
  | { method: "menu_select"; params: [number] }
  | { method: "menu_hide"; params: [] }
  | { method: "info_show"; params: [RawLine, RawLine[], RawCoord, RawFace, string] }
  | { method: "info_hide"; params: [] }
  | { method: "set_cursor"; params: [string, RawCoord] }
  | { method: "set_ui_options"; params: [Record<string, string>] }
  | { method: "refresh"; params: [boolean] };

export type IncomingMethod = WireIncoming["method"];
export type OutgoingMethod = WireOutgoing["method"];

export const INCOMING_ARITY = {
  draw: 3,
  draw_status: 3,
  menu_show: 5,
  menu_select: 1,
  menu_hide: 0,
  info_show: 5,
  info_hide: 0,
  set_cursor: 2,
  set_ui_options: 1,
  refresh: 1,
} as const satisfies Record<IncomingMethod, number>;

/** `keys` is variadic and has no entry. */
export const OUTGOING_ARITY = {
  resize: 2,
  scroll: 1,
  mouse_move: 2,
  mouse_press: 3,
  mouse_release: 3,
  menu_select: 1,
} as const satisfies Record<Exclude<OutgoingMethod, "keys">, number>;

const DrawParams = type([RawLineSchema.array(), RawFaceSchema, RawFaceSchema]);
const DrawStatusParams = type([RawLineSchema, RawLineSchema, RawFaceSchema]);
const MenuShowParams = type([RawLineSchema.array(), CoordSchema, RawFaceSchema, RawFaceSchema, "string"]);
const MenuSelectParams = type([U32]);
const InfoShowParams = type([RawLineSchema, RawLineSchema.array(), CoordSchema, RawFaceSchema, "string"]);
const SetCursorParams = type(["string", CoordSchema]);
const SetUiOptionsParams = type(["Record<string, string>"]);
const RefreshParams = type(["boolean"]);

const KeysParams = type("string[]");
const PairParams = type([U32, U32]);
const ScrollParams = type([U32]);
const MouseButtonParams = type(["string", U32, U32]);

export function isIncomingMethod(method: string): method is IncomingMethod {
  return Object.prototype.hasOwnProperty.call(INCOMING_ARITY, method);
}

export function isOutgoingMethod(method: string): method is OutgoingMethod {
  return method === "keys" || Object.prototype.hasOwnProperty.call(OUTGOING_ARITY, method);
}

function assertArity(method: string, expected: number, params: readonly unknown[]): void {
  if (params.length !== expected) {
    throw new MalformedMessageError(
      `${method} expects ${expected} params, got ${params.length}`,
      { method, expected, actual: params.length }
    );
  }
}

/**
 * Structural decode of an editor → frontend message. The only fallible step on
 * the incoming path: arity, slot shapes, colors and attributes are all checked
 * here.
 */
export function decodeIncomingParams(method: string, params: readonly unknown[]): WireIncoming {
  if (!isIncomingMethod(method)) {
    throw new MalformedMessageError(`Unknown method: ${method}`, { method });
  }
  assertArity(method, INCOMING_ARITY[method], params);

  switch (method) {
    case "draw": {
      const [lines, defaultFace, paddingFace] = assertSchema(DrawParams, params, method);
      return { method, params: [lines.map(parseLine), parseFace(defaultFace), parseFace(paddingFace)] };
    }
    case "draw_status": {
      const [statusLine, modeLine, defaultFace] = assertSchema(DrawStatusParams, params, method);
      return { method, params: [parseLine(statusLine), parseLine(modeLine), parseFace(defaultFace)] };
    }
    case "menu_show": {
      const [items, anchor, selectedItemFace, menuFace, style] = assertSchema(MenuShowParams, params, method);
      return {
        method,
        params: [items.map(parseLine), parseCoord(anchor), parseFace(selectedItemFace), parseFace(menuFace), style],
      };
    }
    case "menu_select": {
      const [selected] = assertSchema(MenuSelectParams, params, method);
      return { method, params: [selected] };
    }
    case "info_show": {
      const [title, content, anchor, face, style] = assertSchema(InfoShowParams, params, method);
      return {
        method,
        params: [parseLine(title), content.map(parseLine), parseCoord(anchor), parseFace(face), style],
      };
    }
    case "set_cursor": {
      const [mode, coord] = assertSchema(SetCursorParams, params, method);
      return { method, params: [mode, parseCoord(coord)] };
    }
    case "set_ui_options": {
      // arktype's Record also admits arrays
      if (Array.isArray(params[0])) {
        throw new MalformedMessageError(`Invalid ${method} params: options must be an object (was an array)`, {
          method,
        });
      }
      const [options] = assertSchema(SetUiOptionsParams, params, method);
      return { method, params: [{ ...options }] };
    }
    case "refresh": {
      const [force] = assertSchema(RefreshParams, params, method);
      return { method, params: [force] };
    }
    case "menu_hide":
    case "info_hide":
      return { method, params: [] };
  }
}

/** Structural decode of a frontend → editor message. */
export function decodeOutgoingParams(method: string, params: readonly unknown[]): WireOutgoing {
  if (!isOutgoingMethod(method)) {
    throw new MalformedMessageError(`Unknown method: ${method}`, { method });
  }
  if (method === "keys") {
    return { method, params: [...assertSchema(KeysParams, params, method)] };
  }
  assertArity(method, OUTGOING_ARITY[method], params);

  switch (method) {
    case "resize":
    case "mouse_move": {
      const [a, b] = assertSchema(PairParams, params, method);
      return { method, params: [a, b] };
    }
    case "scroll":
    case "menu_select": {
      const [value] = assertSchema(ScrollParams, params, method);
      return { method, params: [value] };
    }
    case "mouse_press":
    case "mouse_release": {
      const [button, line, column] = assertSchema(MouseButtonParams, params, method);
      return { method, params: [button, line, column] };
    }
  }
}
