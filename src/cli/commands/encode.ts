import { InvalidArgumentError } from "commander";
import { encodeOutgoing } from "../../protocols/kakoune/outgoing.js";
import type { OutgoingRequest } from "../../protocols/kakoune/types.js";

const U32_MAX = 4294967295;

function parseIndex(name: string, raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw) || Number(raw) > U32_MAX) {
    throw new InvalidArgumentError(`Invalid ${name}: expected an integer from 0 to ${U32_MAX}, got ${raw ?? "nothing"}`);
  }
  return Number(raw);
}

function expectArgs(method: string, args: string[], names: string[]): void {
  if (args.length !== names.length) {
    throw new InvalidArgumentError(`Invalid arguments for ${method}: expected <${names.join("> <")}>, got ${args.length}`);
  }
}

/** Builds a request from `encode <method> [args...]`. Throws on anything the protocol cannot carry. */
export function buildOutgoingRequest(method: string, args: string[]): OutgoingRequest {
  switch (method) {
    case "keys":
      return { kind: "keys", keys: [...args] };
    case "resize":
      expectArgs(method, args, ["rows", "columns"]);
      return { kind: "resize", rows: parseIndex("rows", args[0]), columns: parseIndex("columns", args[1]) };
    case "scroll":
      expectArgs(method, args, ["amount"]);
      return { kind: "scroll", amount: parseIndex("amount", args[0]) };
    case "mouse_move":
      expectArgs(method, args, ["line", "column"]);
      return { kind: "mouse_move", line: parseIndex("line", args[0]), column: parseIndex("column", args[1]) };
    case "mouse_press":
    case "mouse_release":
      expectArgs(method, args, ["button", "line", "column"]);
      return {
        kind: method,
        button: args[0],
        line: parseIndex("line", args[1]),
        column: parseIndex("column", args[2]),
      };
    case "menu_select":
      expectArgs(method, args, ["index"]);
      return { kind: "menu_select", index: parseIndex("index", args[0]) };
    default:
      throw new InvalidArgumentError(`Invalid method: ${method}`);
  }
}

export function runEncode(method: string, args: string[]): void {
  process.stdout.write(encodeOutgoing(buildOutgoingRequest(method, args)));
}
