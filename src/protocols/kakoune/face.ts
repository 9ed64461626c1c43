import { type } from "arktype";
import { InvalidAttributeError, InvalidColorError } from "../../shared/errors.js";
import {
  ATTRIBUTES,
  NAMED_COLORS,
  type Atom,
  type Attribute,
  type Color,
  type Coord,
  type Face,
  type Line,
  type NamedColor,
} from "./types.js";

// Colors and attributes stay strings here; their grammars run after the shape check.
export const RawFaceSchema = type({
  fg: "string",
  bg: "string",
  attributes: "string[]",
});

export const RawAtomSchema = type({
  face: RawFaceSchema,
  contents: "string",
});

export const RawLineSchema = RawAtomSchema.array();

/** Positions and counts are unsigned 32-bit on the editor side. */
export const U32 = "0 <= number.integer <= 4294967295";

export const CoordSchema = type({
  line: U32,
  column: U32,
});

export type RawFace = typeof RawFaceSchema.infer;
export type RawAtom = typeof RawAtomSchema.infer;
export type RawLine = typeof RawLineSchema.infer;
export type RawCoord = typeof CoordSchema.infer;

const RGB_PREFIX = "rgb:";
const RGBA_PREFIX = "rgba:";

function isNamedColor(token: string): token is NamedColor {
  return (NAMED_COLORS as readonly string[]).includes(token);
}

function isAttribute(token: string): token is Attribute {
  return (ATTRIBUTES as readonly string[]).includes(token);
}

/**
 * Keywords first, then the `rgb:` and `rgba:` prefixes. The payload after a
 * prefix is kept verbatim; it is not checked for hex digits.
 */
export function parseColor(token: string): Color {
  if (isNamedColor(token)) return { kind: "named", name: token };
  if (token.startsWith(RGB_PREFIX)) return { kind: "rgb", value: token.slice(RGB_PREFIX.length) };
  if (token.startsWith(RGBA_PREFIX)) return { kind: "rgba", value: token.slice(RGBA_PREFIX.length) };
  throw new InvalidColorError(token);
}

export function formatColor(color: Color): string {
  switch (color.kind) {
    case "named":
      return color.name;
    case "rgb":
      return RGB_PREFIX + color.value;
    case "rgba":
      return RGBA_PREFIX + color.value;
  }
}

export function parseAttribute(token: string): Attribute {
  if (isAttribute(token)) return token;
  throw new InvalidAttributeError(token);
}

export function parseFace(raw: RawFace): Face {
  return {
    fg: parseColor(raw.fg),
    bg: parseColor(raw.bg),
    attributes: raw.attributes.map(parseAttribute),
  };
}

export function parseAtom(raw: RawAtom): Atom {
  return { face: parseFace(raw.face), contents: raw.contents };
}

export function parseLine(raw: RawLine): Line {
  return raw.map(parseAtom);
}

export function parseCoord(raw: RawCoord): Coord {
  return { line: raw.line, column: raw.column };
}

export function formatFace(face: Face): RawFace {
  return {
    fg: formatColor(face.fg),
    bg: formatColor(face.bg),
    attributes: [...face.attributes],
  };
}

export function formatAtom(atom: Atom): RawAtom {
  return { face: formatFace(atom.face), contents: atom.contents };
}

export function formatLine(line: Line): RawLine {
  return line.map(formatAtom);
}
