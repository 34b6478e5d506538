/**
 * Message identifier envelope.
 *
 *   [ length ] [ id: uint16 ] [ payload ]
 *
 * The id shares the length prefix's byte order. Routing on the id is left to
 * the consumer.
 */

import type { ByteOrder } from '../config/parser-config.js';
import { ErrorCode, FrameError } from '../types/errors.js';

export const MESSAGE_ID_SIZE = 2;

export const MAX_MESSAGE_ID = 0xffff;

export interface Envelope {
  id: number;
  payload: Uint8Array;
}

/**
 * Split a message into the parts a parser writes: id, then payload
 */
export function encodeEnvelope(id: number, payload: Uint8Array, order: ByteOrder = 'big'): Uint8Array[] {
  if (!Number.isInteger(id) || id < 0 || id > MAX_MESSAGE_ID) {
    throw new FrameError(ErrorCode.ERR_INVALID_MESSAGE, `Invalid message id: ${id}`);
  }

  const header = new Uint8Array(MESSAGE_ID_SIZE);
  new DataView(header.buffer).setUint16(0, id, order === 'little');
  return [header, payload];
}

/**
 * Read the id back off a decoded body
 */
export function decodeEnvelope(body: Uint8Array, order: ByteOrder = 'big'): Envelope {
  if (body.length < MESSAGE_ID_SIZE) {
    throw new FrameError(
      ErrorCode.ERR_INVALID_MESSAGE,
      `Message too short for id: ${body.length} bytes`
    );
  }

  const id = new DataView(body.buffer, body.byteOffset, MESSAGE_ID_SIZE).getUint16(0, order === 'little');
  return { id, payload: body.subarray(MESSAGE_ID_SIZE) };
}
