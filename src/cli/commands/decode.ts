import { createReadStream } from "node:fs";
import { createInterface } from "node:readline";
import chalk from "chalk";
import { safeDecodeIncoming } from "../../protocols/kakoune/incoming.js";
import { safeDecodeOutgoing } from "../../protocols/kakoune/outgoing.js";
import { EXIT, exit } from "../../exit-codes.js";
import { initLogger, log } from "../../shared/logging.js";
import { resolveLogOptions } from "../utils.js";

export interface DecodeLinesOptions {
  /** Treat lines as frontend → editor messages. */
  outgoing?: boolean;
  /** Stop at the first line that fails to decode. */
  strict?: boolean;
}

export interface DecodeSummary {
  decoded: number;
  failed: number;
  /** 1-based number of the line that stopped a strict run. */
  stoppedAt?: number;
}

/**
 * Decodes each non-empty line and hands the domain value, as one JSON line, to
 * `write`. Failures are logged with their line number and skipped.
 */
export async function decodeLines(
  lines: AsyncIterable<string> | Iterable<string>,
  write: (output: string) => void,
  opts: DecodeLinesOptions = {}
): Promise<DecodeSummary> {
  const summary: DecodeSummary = { decoded: 0, failed: 0 };
  let lineNo = 0;
  for await (const line of lines) {
    lineNo += 1;
    if (!line.trim()) continue;
    const result = opts.outgoing ? safeDecodeOutgoing(line) : safeDecodeIncoming(line);
    if (result.success) {
      summary.decoded += 1;
      write(JSON.stringify(result.data) + "\n");
      continue;
    }
    summary.failed += 1;
    log.warn({ line: lineNo, kind: result.error.kind }, result.error.message);
    if (opts.strict) {
      summary.stoppedAt = lineNo;
      break;
    }
  }
  return summary;
}

export async function runDecode(
  file: string | undefined,
  opts: Record<string, unknown>
): Promise<void> {
  const { level, format } = resolveLogOptions(opts);
  initLogger(level, format);

  const input = file ? createReadStream(file, { encoding: "utf8" }) : process.stdin;
  const rl = createInterface({ input, crlfDelay: Infinity });
  const summary = await decodeLines(rl, (output) => process.stdout.write(output), {
    outgoing: opts.outgoing === true,
    strict: opts.strict === true,
  });
  rl.close();

  const counts = `${summary.decoded} decoded, ${summary.failed} failed`;
  process.stderr.write((summary.failed ? chalk.yellow(counts) : chalk.green(counts)) + "\n");

  if (summary.stoppedAt !== undefined) {
    exit(EXIT.DECODE_FAILURE, `Stopped at line ${summary.stoppedAt}`);
  }
}
