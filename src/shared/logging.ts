import { Writable } from "node:stream";
import { destination, pino, type Logger } from "pino";
import { PinoPretty } from "pino-pretty";

export type LogLevel = "error" | "warn" | "info" | "debug";
export type LogFormat = "text" | "json" | "plain";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];
export const LOG_FORMATS: readonly LogFormat[] = ["text", "json", "plain"];

const LOGGER_NAME = "kak-json-ui";

export function isValidLevel(s: string): s is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(s);
}

export function isValidFormat(s: string): s is LogFormat {
  return (LOG_FORMATS as readonly string[]).includes(s);
}

/** Writable that parses pino JSON lines and writes only the message (no time/level). */
function plainMessageStderr(): Writable {
  let buffer = "";
  return new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      buffer += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      for (const line of lines) {
        if (!line.trim()) continue;
        try {
          const o = JSON.parse(line) as { msg?: unknown };
          if (typeof o.msg === "string") process.stderr.write(o.msg + "\n");
        } catch {
          process.stderr.write(line + "\n");
        }
      }
      cb();
    },
  });
}

let rootLogger: Logger | null = null;

export function initLogger(level = "info", format = "text"): void {
  const logLevel = isValidLevel(level) ? level : "info";
  const logFormat = isValidFormat(format) ? format : "text";
  if (logFormat === "plain") {
    rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, plainMessageStderr());
  } else if (logFormat === "text") {
    const prettyStream = PinoPretty({ colorize: true, destination: 2 });
    rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, prettyStream);
  } else {
    rootLogger = pino({ level: logLevel, name: LOGGER_NAME }, destination(2));
  }
}

function ensureLogger(): Logger {
  if (!rootLogger) initLogger("info", "plain");
  if (!rootLogger) {
    rootLogger = pino({ level: "info", name: LOGGER_NAME }, plainMessageStderr());
  }
  return rootLogger;
}

export function getLogger(): Logger {
  return ensureLogger();
}

function write(level: LogLevel, objOrMsg: object | string, msg?: string): void {
  const logger = ensureLogger();
  if (typeof objOrMsg === "string") logger[level](objOrMsg);
  else logger[level](objOrMsg, msg);
}

export const log = {
  info: (objOrMsg: object | string, msg?: string) => write("info", objOrMsg, msg),
  warn: (objOrMsg: object | string, msg?: string) => write("warn", objOrMsg, msg),
  error: (objOrMsg: object | string, msg?: string) => write("error", objOrMsg, msg),
  debug: (objOrMsg: object | string, msg?: string) => write("debug", objOrMsg, msg),
};
