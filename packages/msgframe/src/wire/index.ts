/**
 * Wire format encoding and framing
 */

export { encodeLength, decodeLength, writeLength, checkLength } from './length.js';

export { MessageParser } from './framing.js';

export {
  MESSAGE_ID_SIZE,
  MAX_MESSAGE_ID,
  encodeEnvelope,
  decodeEnvelope,
} from './envelope.js';
export type { Envelope } from './envelope.js';

export { encodePayload, decodePayload } from './codec.js';
