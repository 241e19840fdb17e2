export { LineCodec, WireDecodeError, createLineCodec } from './line-codec.js';
export type { DecodeAllResult, LineCodecOptions } from './line-codec.js';
export { LINE_DELIMITER, MAX_LINE_BYTES } from './line-codec.js';

export {
  GROUP_CHAT_COMMANDS,
  isGroupChatCommand,
  successResult,
  errorResult,
} from './tool-result.js';
export type { GroupChatCommand, ToolResult } from './tool-result.js';
