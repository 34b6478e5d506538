/**
 * Length prefix encoding shared by every transport.
 */

import type { ByteOrder, ParserConfig, PrefixWidth } from '../config/parser-config.js';
import { ErrorCode, FrameError } from '../types/errors.js';

/**
 * Write `n` into the first `width` bytes of `target`
 */
export function writeLength(target: Uint8Array, n: number, width: PrefixWidth, order: ByteOrder): void {
  const view = new DataView(target.buffer, target.byteOffset, width);
  const littleEndian = order === 'little';

  switch (width) {
    case 1:
      view.setUint8(0, n);
      break;
    case 2:
      view.setUint16(0, n, littleEndian);
      break;
    case 4:
      view.setUint32(0, n, littleEndian);
      break;
  }
}

/**
 * Encode a body length as a standalone prefix
 */
export function encodeLength(n: number, width: PrefixWidth, order: ByteOrder): Uint8Array {
  const prefix = new Uint8Array(width);
  writeLength(prefix, n, width, order);
  return prefix;
}

/**
 * Decode the length held in the first `width` bytes.
 * Single-byte prefixes have no byte order.
 */
export function decodeLength(bytes: Uint8Array, width: PrefixWidth, order: ByteOrder): number {
  const view = new DataView(bytes.buffer, bytes.byteOffset, width);
  const littleEndian = order === 'little';

  switch (width) {
    case 1:
      return view.getUint8(0);
    case 2:
      return view.getUint16(0, littleEndian);
    case 4:
      return view.getUint32(0, littleEndian);
  }
}

/**
 * Enforce `minLength <= n <= maxLength`
 */
export function checkLength(n: number, config: ParserConfig): void {
  if (n > config.maxLength) {
    throw new FrameError(
      ErrorCode.ERR_MESSAGE_TOO_LONG,
      `Message too long: ${n} bytes (max: ${config.maxLength})`
    );
  }
  if (n < config.minLength) {
    throw new FrameError(
      ErrorCode.ERR_MESSAGE_TOO_SHORT,
      `Message too short: ${n} bytes (min: ${config.minLength})`
    );
  }
}
