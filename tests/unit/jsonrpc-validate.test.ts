import { describe, it, expect } from "vitest";
import { parseEnvelope } from "../../src/protocols/jsonrpc/validate.js";
import { parseJsonRpcLine, serializeJsonRpc } from "../../src/protocols/jsonrpc/codec.js";
import { withVersion } from "../../src/protocols/jsonrpc/types.js";
import { MalformedMessageError } from "../../src/shared/errors.js";

describe("parseEnvelope", () => {
  it("accepts a method with positional params", () => {
    const msg = { jsonrpc: "2.0", method: "refresh", params: [true] };
    expect(parseEnvelope(msg)).toEqual(msg);
  });

  it("accepts any version value", () => {
    expect(parseEnvelope({ jsonrpc: null, method: "menu_hide", params: [] }).method).toBe("menu_hide");
  });

  it("throws on missing version", () => {
    expect(() => parseEnvelope({ method: "menu_hide", params: [] })).toThrow(/Invalid JSON-RPC/);
  });

  it("throws on non-string method", () => {
    expect(() => parseEnvelope({ jsonrpc: "2.0", method: 3, params: [] })).toThrow(MalformedMessageError);
  });

  it("throws on non-object", () => {
    expect(() => parseEnvelope(null)).toThrow(/Invalid JSON-RPC/);
    expect(() => parseEnvelope("string")).toThrow(/Invalid JSON-RPC/);
  });
});

describe("parseJsonRpcLine", () => {
  it("returns null for blank lines", () => {
    expect(parseJsonRpcLine("  \n")).toBeNull();
  });

  it("decodes utf-8 bytes", () => {
    expect(parseJsonRpcLine(new TextEncoder().encode('{"a":"é"}'))).toEqual({ a: "é" });
  });

  it("rejects invalid UTF-8 instead of replacing it", () => {
    const bytes = new Uint8Array([0x22, 0xff, 0xfe, 0x22]);
    expect(() => parseJsonRpcLine(bytes)).toThrow(MalformedMessageError);
    expect(() => parseJsonRpcLine(bytes)).toThrow(/^Invalid UTF-8: /);
  });

  it("treats only JSON whitespace as blank", () => {
    expect(parseJsonRpcLine(" \t\r\n")).toBeNull();
    expect(() => parseJsonRpcLine("\u00a0")).toThrow(/^Invalid JSON: /);
    expect(parseJsonRpcLine('{"a":1}\r\n')).toEqual({ a: 1 });
  });

  it("throws MalformedMessageError on bad JSON", () => {
    expect(() => parseJsonRpcLine("{")).toThrow(MalformedMessageError);
  });
});

describe("serializeJsonRpc", () => {
  it("terminates the message with a newline", () => {
    expect(serializeJsonRpc(withVersion({ method: "scroll", params: [1] }))).toBe(
      '{"jsonrpc":"2.0","method":"scroll","params":[1]}\n'
    );
  });
});
