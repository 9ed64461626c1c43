export * from "./types.js";
export { parseColor, formatColor, parseAttribute, parseFace, parseAtom, parseLine } from "./face.js";
export {
  decodeIncoming,
  decodeIncomingValue,
  safeDecodeIncoming,
  encodeIncoming,
} from "./incoming.js";
export {
  encodeOutgoing,
  decodeOutgoing,
  decodeOutgoingValue,
  safeDecodeOutgoing,
} from "./outgoing.js";
