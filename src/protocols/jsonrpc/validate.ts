import { type } from "arktype";
import { MalformedMessageError } from "../../shared/errors.js";
import { JsonRpcEnvelopeSchema, type JsonRpcEnvelope } from "./types.js";

export function parseEnvelope(data: unknown): JsonRpcEnvelope {
  const result = JsonRpcEnvelopeSchema(data);
  if (result instanceof type.errors) {
    throw new MalformedMessageError(`Invalid JSON-RPC: ${result.summary}`);
  }
  return result;
}
