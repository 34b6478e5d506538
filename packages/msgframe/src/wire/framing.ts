/**
 * Length-prefixed message framing.
 *
 * Wire format on every transport:
 *
 *   [ length: prefixWidth bytes, byteOrder ] [ body: length bytes ]
 *
 * On a byte stream the prefix decides how many body bytes are read. On a
 * frame transport the frame boundary is authoritative: the nested prefix is
 * validated against the bounds and everything after it is returned.
 */

import { createParserConfig, reconfigure } from '../config/parser-config.js';
import type { ParserConfig, ParserOptions } from '../config/parser-config.js';
import { ErrorCode, FrameError } from '../types/errors.js';
import type { FrameConnection, StreamConnection, Transport } from '../transport/types.js';
import { checkLength, decodeLength, writeLength } from './length.js';

/**
 * Encodes and decodes length-prefixed bodies.
 *
 * Holds only its configuration, so one parser can serve any number of
 * connections. Callers must serialize concurrent writes on the same
 * connection and must not mutate `parts` while a write is pending.
 */
export class MessageParser {
  readonly config: ParserConfig;

  constructor(options: ParserOptions = {}) {
    this.config = createParserConfig(options);
  }

  /**
   * Return a parser with `options` applied over this one's configuration
   */
  reconfigure(options: ParserOptions): MessageParser {
    return new MessageParser(reconfigure(this.config, options));
  }

  /**
   * Read one body from either kind of transport.
   *
   * Any rejection leaves a stream transport without a usable byte boundary;
   * the caller must close it.
   */
  async read(transport: Transport): Promise<Uint8Array> {
    if (transport.kind === 'frame') {
      return this.unframe(await transport.conn.readFrame());
    }

    const { prefixWidth, byteOrder } = this.config;
    const prefix = await readFull(transport.conn, prefixWidth);
    const length = decodeLength(prefix, prefixWidth, byteOrder);
    checkLength(length, this.config);
    return readFull(transport.conn, length);
  }

  /**
   * Write `parts` as one message.
   *
   * A length violation rejects before the transport is touched.
   */
  async write(transport: Transport, parts: readonly Uint8Array[]): Promise<void> {
    const message = this.frame(parts);
    if (transport.kind === 'frame') {
      await transport.conn.writeFrame(message);
    } else {
      await transport.conn.write(message);
    }
  }

  decodeStream(conn: StreamConnection): Promise<Uint8Array> {
    return this.read({ kind: 'stream', conn });
  }

  encodeStream(conn: StreamConnection, parts: readonly Uint8Array[]): Promise<void> {
    return this.write({ kind: 'stream', conn }, parts);
  }

  decodeFrame(conn: FrameConnection): Promise<Uint8Array> {
    return this.read({ kind: 'frame', conn });
  }

  encodeFrame(conn: FrameConnection, parts: readonly Uint8Array[]): Promise<void> {
    return this.write({ kind: 'frame', conn }, parts);
  }

  /**
   * Validate `parts` and build the prefixed buffer
   */
  frame(parts: readonly Uint8Array[]): Uint8Array {
    const { prefixWidth, byteOrder } = this.config;

    let length = 0;
    for (const part of parts) {
      length += part.length;
    }
    checkLength(length, this.config);

    const message = new Uint8Array(prefixWidth + length);
    writeLength(message, length, prefixWidth, byteOrder);

    let offset = prefixWidth;
    for (const part of parts) {
      message.set(part, offset);
      offset += part.length;
    }
    return message;
  }

  /**
   * Decode a complete frame: validate the nested prefix, return the rest.
   *
   * The declared length only gates the bounds check. The returned body is
   * everything after the prefix, even when the two disagree.
   */
  unframe(frame: Uint8Array): Uint8Array {
    const { prefixWidth, byteOrder } = this.config;
    if (frame.length < prefixWidth) {
      throw new FrameError(
        ErrorCode.ERR_INVALID_FRAME,
        `Frame too short for length prefix: ${frame.length} bytes (prefix: ${prefixWidth})`
      );
    }

    const length = decodeLength(frame, prefixWidth, byteOrder);
    checkLength(length, this.config);
    return frame.subarray(prefixWidth);
  }
}

async function readFull(conn: StreamConnection, n: number): Promise<Uint8Array> {
  const data = await conn.readExactly(n);
  if (data.length !== n) {
    throw new FrameError(
      ErrorCode.ERR_CONNECTION_CLOSED,
      `Short read: got ${data.length} of ${n} bytes`
    );
  }
  return data;
}
