import { type } from "arktype";

/** The only protocol version this codec speaks. Written on encode, never compared on decode. */
export const JSONRPC_VERSION = "2.0" as const;

/**
 * What every message must look like before its method is looked at.
 * `jsonrpc` has to be present but may hold any JSON value.
 */
export const JsonRpcEnvelopeSchema = type({
  jsonrpc: "string | number | boolean | object | null",
  method: "string",
  params: "unknown[]",
});

export type JsonRpcEnvelope = typeof JsonRpcEnvelopeSchema.infer;

/** A method/params pair wrapped with the fixed version marker, ready to serialize. */
export type JsonRpcMessage<T extends { method: string; params: readonly unknown[] }> = {
  jsonrpc: typeof JSONRPC_VERSION;
} & T;

export function withVersion<T extends { method: string; params: readonly unknown[] }>(
  inner: T
): JsonRpcMessage<T> {
  return { jsonrpc: JSONRPC_VERSION, ...inner };
}
