#!/usr/bin/env node
import { InvalidArgumentError } from "commander";
import { createProgram } from "./cli/program.js";
import { EXIT, exit } from "./exit-codes.js";

async function main() {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof InvalidArgumentError ? EXIT.INVALID_ARGS : EXIT.GENERIC_ERROR;
  exit(code, message);
});
