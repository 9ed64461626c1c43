import { readFileSync } from "node:fs";
import { getEnv } from "../shared/env.js";

export function getPackageJsonVersion(): string {
  try {
    const raw = readFileSync(new URL("../../package.json", import.meta.url), "utf8");
    const pkg = JSON.parse(raw) as { version?: string };
    return pkg.version ?? "0.1.0";
  } catch {
    // no package.json two levels up (e.g. a bundled copy)
    return "0.1.0";
  }
}

/** Flags win over environment variables, which win over defaults. `-v` forces debug. */
export function resolveLogOptions(opts: Record<string, unknown>): { level: string; format: string } {
  const level = opts.verbose
    ? "debug"
    : (typeof opts.logLevel === "string" && opts.logLevel) || getEnv("LOG_LEVEL") || "info";
  const format =
    (typeof opts.logFormat === "string" && opts.logFormat) || getEnv("LOG_FORMAT") || "plain";
  return { level, format };
}
