// @pairwire/wire - frame envelope

export {
  type Frame,
  type MessageLookup,
  FrameFlags,
  MAX_MESSAGE_ID,
  hasFlag,
  isResponse,
  isErrorResponse,
  requestFrame,
  responseFrame,
  errorFrame,
  encodeFrame,
  decodeFrame,
} from "./frame.ts";

export { FrameError, type FrameErrorKind, RemoteError } from "./errors.ts";
