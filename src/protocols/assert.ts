import { type, type ArkErrors } from "arktype";
import { MalformedMessageError } from "../shared/errors.js";

/** Asserts params match the schema and returns the validated value. Throws MalformedMessageError otherwise. */
export function assertSchema<T>(
  schema: (value: unknown) => T,
  params: unknown,
  method: string
): Exclude<T, ArkErrors> {
  const out = schema(params);
  if (out instanceof type.errors) {
    throw new MalformedMessageError(`Invalid ${method} params: ${out.summary}`, { method });
  }
  return out as Exclude<T, ArkErrors>;
}
