import { Command } from "commander";
import { runDecode } from "./commands/decode.js";
import { runEncode } from "./commands/encode.js";
import { getPackageJsonVersion } from "./utils.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("kak-json-ui")
    .description("Inspect and produce Kakoune JSON UI protocol messages")
    .version(getPackageJsonVersion());

  program
    .command("decode")
    .description("Decode line-delimited messages from a capture file or stdin")
    .argument("[file]", "Capture file (defaults to stdin)")
    .option("--outgoing", "Decode frontend → editor messages")
    .option("--strict", "Stop at the first line that fails to decode")
    .option("-v, --verbose", "Verbose logging")
    .option("--log-level <level>", "Log level")
    .option("--log-format <format>", "Log format: text, json or plain")
    .action((file: string | undefined, opts: Record<string, unknown>) => runDecode(file, opts));

  program
    .command("encode")
    .description("Write the wire line for a frontend → editor request")
    .argument("<method>", "keys, resize, scroll, mouse_move, mouse_press, mouse_release or menu_select")
    .argument("[args...]", "Positional params, in wire order")
    .action((method: string, args: string[]) => runEncode(method, args));

  return program;
}
