export * from "./protocols/kakoune/index.js";
export { JSONRPC_VERSION } from "./protocols/jsonrpc/types.js";
export {
  CodecError,
  MalformedMessageError,
  InvalidColorError,
  InvalidAttributeError,
  type ErrorKind,
  type DecodeResult,
} from "./shared/errors.js";
