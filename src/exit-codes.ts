import { log } from "./shared/logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  DECODE_FAILURE: 3,
} as const;

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) log.info(message);
    else log.error(message);
  }
  process.exit(code);
}
