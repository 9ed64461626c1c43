import { describe, it, expect } from "vitest";
import {
  formatColor,
  formatFace,
  parseAttribute,
  parseColor,
  parseFace,
  parseLine,
} from "../../src/protocols/kakoune/face.js";
import {
  CodecError,
  InvalidAttributeError,
  InvalidColorError,
} from "../../src/shared/errors.js";

function colorError(token: string): unknown {
  try {
    parseColor(token);
  } catch (error) {
    return error;
  }
  throw new Error(`expected ${token} to be rejected`);
}

describe("parseColor", () => {
  it("maps every keyword to a named color", () => {
    for (const name of ["black", "red", "green", "yellow", "blue", "purple", "cyan", "white", "default"]) {
      expect(parseColor(name)).toEqual({ kind: "named", name });
    }
  });

  it("keeps the rgb payload verbatim", () => {
    expect(parseColor("rgb:ff0000")).toEqual({ kind: "rgb", value: "ff0000" });
    expect(parseColor("rgb:not-hex")).toEqual({ kind: "rgb", value: "not-hex" });
    expect(parseColor("rgb:")).toEqual({ kind: "rgb", value: "" });
  });

  it("keeps the rgba payload verbatim", () => {
    expect(parseColor("rgba:ff0000ff")).toEqual({ kind: "rgba", value: "ff0000ff" });
  });

  it("rejects unknown keywords with the offending token", () => {
    const error = colorError("chartreuse");
    expect(error).toBeInstanceOf(InvalidColorError);
    expect(error).toBeInstanceOf(CodecError);
    expect(error).toMatchObject({ kind: "InvalidColor", token: "chartreuse" });
  });

  it("rejects strings shorter than a prefix", () => {
    expect(colorError("rgb")).toMatchObject({ kind: "InvalidColor", token: "rgb" });
    expect(colorError("")).toMatchObject({ kind: "InvalidColor", token: "" });
    expect(colorError("r")).toMatchObject({ kind: "InvalidColor", token: "r" });
  });

  it("is case-sensitive", () => {
    expect(colorError("Black")).toMatchObject({ kind: "InvalidColor", token: "Black" });
    expect(colorError("RGB:ff0000")).toMatchObject({ kind: "InvalidColor", token: "RGB:ff0000" });
  });
});

describe("formatColor", () => {
  it("writes the wire token back", () => {
    expect(formatColor({ kind: "named", name: "purple" })).toBe("purple");
    expect(formatColor({ kind: "rgb", value: "abcdef" })).toBe("rgb:abcdef");
    expect(formatColor({ kind: "rgba", value: "abcdef80" })).toBe("rgba:abcdef80");
  });
});

describe("parseAttribute", () => {
  it("accepts snake-case names", () => {
    expect(parseAttribute("final_attr")).toBe("final_attr");
    expect(parseAttribute("italic")).toBe("italic");
  });

  it("rejects anything else", () => {
    expect(() => parseAttribute("FinalFg")).toThrow(InvalidAttributeError);
    expect(() => parseAttribute("strikethrough")).toThrow('Invalid attribute: "strikethrough"');
  });
});

describe("parseFace", () => {
  it("keeps attribute order and duplicates", () => {
    const face = parseFace({ fg: "red", bg: "rgb:000000", attributes: ["dim", "bold", "dim"] });
    expect(face).toEqual({
      fg: { kind: "named", name: "red" },
      bg: { kind: "rgb", value: "000000" },
      attributes: ["dim", "bold", "dim"],
    });
  });

  it("fails on a bad attribute inside a face", () => {
    expect(() => parseFace({ fg: "red", bg: "blue", attributes: ["bold", "wavy"] })).toThrow(
      InvalidAttributeError
    );
  });

  it("round-trips through formatFace", () => {
    const raw = { fg: "rgba:11223344", bg: "default", attributes: ["reverse", "final_bg"] };
    expect(formatFace(parseFace(raw))).toEqual(raw);
  });
});

describe("parseLine", () => {
  it("keeps atoms in rendering order", () => {
    const face = { fg: "default", bg: "default", attributes: [] };
    const line = parseLine([
      { face, contents: "left" },
      { face, contents: "right" },
    ]);
    expect(line.map((atom) => atom.contents)).toEqual(["left", "right"]);
  });
});
