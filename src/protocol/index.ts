/**
 * Wire protocol: newline-delimited JSON messages with decimal big integers
 */

export {
  PublicKeySchema,
  ClientMessageSchema,
  ServerMessageSchema,
  encodeMessage,
  decodeClientMessage,
  decodeServerMessage,
} from './messages.js';
export type {
  ClientMessage,
  ServerMessage,
  ClientMessageType,
  ServerMessageType,
} from './messages.js';

export { MessageStream, DEFAULT_MAX_MESSAGE_BYTES } from './stream.js';
export type { MessageStreamOptions } from './stream.js';
