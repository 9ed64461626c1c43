export type ErrorKind = "MalformedMessage" | "InvalidColor" | "InvalidAttribute";

/** Base class for every failure the codec reports. Encoding never throws one. */
export class CodecError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = "CodecError";
    this.kind = kind;
  }
}

export interface MalformedMessageDetails {
  method?: string;
  expected?: number;
  actual?: number;
}

/** Unknown method, wrong params arity or shape, missing envelope field, or unparseable JSON. */
export class MalformedMessageError extends CodecError {
  readonly method?: string;
  readonly expected?: number;
  readonly actual?: number;

  constructor(message: string, details: MalformedMessageDetails = {}) {
    super("MalformedMessage", message);
    this.name = "MalformedMessageError";
    this.method = details.method;
    this.expected = details.expected;
    this.actual = details.actual;
  }
}

export class InvalidColorError extends CodecError {
  readonly token: string;

  constructor(token: string) {
    super("InvalidColor", `Invalid color: ${JSON.stringify(token)}`);
    this.name = "InvalidColorError";
    this.token = token;
  }
}

export class InvalidAttributeError extends CodecError {
  readonly token: string;

  constructor(token: string) {
    super("InvalidAttribute", `Invalid attribute: ${JSON.stringify(token)}`);
    this.name = "InvalidAttributeError";
    this.token = token;
  }
}

export type DecodeResult<T> =
  | { success: true; data: T }
  | { success: false; error: CodecError };

/**
 * Runs a throwing decoder and folds a CodecError into a result value.
 * Anything that is not a CodecError is a bug and is rethrown.
 */
export function toResult<T>(decode: () => T): DecodeResult<T> {
  try {
    return { success: true, data: decode() };
  } catch (error) {
    if (error instanceof CodecError) return { success: false, error };
    throw error;
  }
}
