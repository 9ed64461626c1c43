/**
 * Domain shapes for Kakoune's JSON UI protocol.
 *
 * Every value here is plain data built fresh by one decode call; nothing is
 * shared between calls. Field names are the named counterparts of the
 * positional params each method carries on the wire.
 */

export const NAMED_COLORS = [
  "black",
  "red",
  "green",
  "yellow",
  "blue",
  "purple",
  "cyan",
  "white",
  "default",
] as const;

export type NamedColor = (typeof NAMED_COLORS)[number];

export type Color =
  | { kind: "named"; name: NamedColor }
  | { kind: "rgb"; value: string }
  | { kind: "rgba"; value: string };

export const ATTRIBUTES = [
  "underline",
  "reverse",
  "blink",
  "bold",
  "dim",
  "italic",
  "final_fg",
  "final_bg",
  "final_attr",
] as const;

export type Attribute = (typeof ATTRIBUTES)[number];

export interface Face {
  fg: Color;
  bg: Color;
  /** Wire order, duplicates kept. */
  attributes: Attribute[];
}

export interface Atom {
  face: Face;
  contents: string;
}

/** Atoms in rendering order, left to right. */
export type Line = Atom[];

/** 0-indexed buffer or screen position. */
export interface Coord {
  line: number;
  column: number;
}

/** Requests the editor sends to the frontend. */
export type IncomingRequest =
  | { kind: "draw"; lines: Line[]; defaultFace: Face; paddingFace: Face }
  | { kind: "draw_status"; statusLine: Line; modeLine: Line; defaultFace: Face }
  | {
      kind: "menu_show";
      items: Line[];
      anchor: Coord;
      selectedItemFace: Face;
      menuFace: Face;
      style: string;
    }
  | { kind: "menu_select"; selected: number }
  | { kind: "menu_hide" }
  | {
      kind: "info_show";
      title: Line;
      content: Line[];
      anchor: Coord;
      face: Face;
      style: string;
    }
  | { kind: "info_hide" }
  | { kind: "set_cursor"; mode: string; coord: Coord }
  | { kind: "set_ui_options"; options: Record<string, string> }
  | { kind: "refresh"; force: boolean };

export type IncomingKind = IncomingRequest["kind"];

/** Requests the frontend sends to the editor. */
export type OutgoingRequest =
  | { kind: "keys"; keys: string[] }
  | { kind: "resize"; rows: number; columns: number }
  | { kind: "scroll"; amount: number }
  | { kind: "mouse_move"; line: number; column: number }
  | { kind: "mouse_press"; button: string; line: number; column: number }
  | { kind: "mouse_release"; button: string; line: number; column: number }
  | { kind: "menu_select"; index: number };

export type OutgoingKind = OutgoingRequest["kind"];
