/**
 * CBOR codec for message payloads.
 * Uses cborg for deterministic encoding, so equal values produce equal bytes.
 */

import * as cborg from 'cborg';
import { ErrorCode, FrameError } from '../types/errors.js';

const encodeOptions = {
  float64: true,
};

/**
 * Encode a payload value to deterministic CBOR
 */
export function encodePayload(value: unknown): Uint8Array {
  try {
    return cborg.encode(value, encodeOptions);
  } catch (err) {
    throw new FrameError(
      ErrorCode.ERR_INVALID_MESSAGE,
      `Cannot encode payload: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
}

/**
 * Decode CBOR bytes to a payload value.
 * The result is unvalidated; narrow it before use.
 */
export function decodePayload(data: Uint8Array): unknown {
  try {
    const value: unknown = cborg.decode(data);
    return value;
  } catch (err) {
    throw new FrameError(
      ErrorCode.ERR_INVALID_MESSAGE,
      `Cannot decode payload: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
}
