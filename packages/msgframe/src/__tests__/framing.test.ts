import { describe, it, expect } from 'vitest';
import { MessageParser } from '../wire/framing.js';
import { ErrorCode } from '../types/errors.js';
import { frameTransport, streamTransport } from '../transport/types.js';
import type { StreamConnection } from '../transport/types.js';
import type { ByteOrder, PrefixWidth } from '../config/parser-config.js';
import { MemoryFrameConnection, MemoryStreamConnection, bytes, text } from './fakes.js';

describe('MessageParser', () => {
  describe('encoding', () => {
    it('writes the prefix and the concatenated parts in one buffer', async () => {
      const conn = new MemoryStreamConnection();
      await new MessageParser().encodeStream(conn, [bytes('AB'), bytes('CD')]);

      expect(conn.writes).toHaveLength(1);
      expect(Array.from(conn.writes[0])).toEqual([0x00, 0x04, 0x41, 0x42, 0x43, 0x44]);
    });

    it('honours little-endian prefixes', async () => {
      const conn = new MemoryStreamConnection();
      await new MessageParser({ byteOrder: 'little' }).encodeStream(conn, [bytes('AB'), bytes('CD')]);

      expect(Array.from(conn.writes[0])).toEqual([0x04, 0x00, 0x41, 0x42, 0x43, 0x44]);
    });

    it('supports 1- and 4-byte prefixes', () => {
      expect(Array.from(new MessageParser({ prefixWidth: 1, byteOrder: 'little' }).frame([bytes('hi')])))
        .toEqual([2, 0x68, 0x69]);
      expect(Array.from(new MessageParser({ prefixWidth: 4 }).frame([bytes('x')])))
        .toEqual([0, 0, 0, 1, 0x78]);
      expect(Array.from(new MessageParser({ prefixWidth: 4, littleEndian: true }).frame([bytes('x')])))
        .toEqual([1, 0, 0, 0, 0x78]);
    });

    it('sends one frame on a frame transport', async () => {
      const conn = new MemoryFrameConnection();
      await new MessageParser().encodeFrame(conn, [bytes('ab'), bytes('c')]);

      expect(conn.sent).toHaveLength(1);
      expect(Array.from(conn.sent[0])).toEqual([0x00, 0x03, 0x61, 0x62, 0x63]);
    });

    it('rejects an oversized message without writing', async () => {
      const parser = new MessageParser({ minLength: 1, maxLength: 4 });
      const conn = new MemoryStreamConnection();

      await expect(parser.encodeStream(conn, [bytes('ABC'), bytes('DE')])).rejects.toMatchObject({
        code: ErrorCode.ERR_MESSAGE_TOO_LONG,
      });
      expect(conn.writes).toHaveLength(0);
    });

    it('rejects an empty message without writing', async () => {
      const parser = new MessageParser({ minLength: 1, maxLength: 4 });
      const conn = new MemoryFrameConnection();

      await expect(parser.encodeFrame(conn, [])).rejects.toMatchObject({
        code: ErrorCode.ERR_MESSAGE_TOO_SHORT,
      });
      await expect(parser.encodeFrame(conn, [new Uint8Array(0)])).rejects.toMatchObject({
        code: ErrorCode.ERR_MESSAGE_TOO_SHORT,
      });
      expect(conn.sent).toHaveLength(0);
    });

    it('leaves the connection usable after a rejected write', async () => {
      const parser = new MessageParser({ maxLength: 4 });
      const conn = new MemoryStreamConnection();

      await expect(parser.encodeStream(conn, [bytes('toolong')])).rejects.toThrow('Message too long');
      await parser.encodeStream(conn, [bytes('ok')]);

      expect(conn.writes.map((w) => Array.from(w))).toEqual([[0x00, 0x02, 0x6f, 0x6b]]);
    });
  });

  describe('stream decoding', () => {
    it('reads the prefix then exactly the declared body', async () => {
      const conn = new MemoryStreamConnection(bytes(0x00, 0x03, 'abc', 0x00, 0x01, 'z'));
      const parser = new MessageParser();

      expect(text(await parser.decodeStream(conn))).toBe('abc');
      expect(text(await parser.decodeStream(conn))).toBe('z');
      expect(conn.reads).toBe(4);
    });

    it('fails a declared length above the maximum before reading the body', async () => {
      const conn = new MemoryStreamConnection(bytes(0x00, 0x05, 'abcde'));
      const parser = new MessageParser({ maxLength: 4 });

      await expect(parser.decodeStream(conn)).rejects.toMatchObject({
        code: ErrorCode.ERR_MESSAGE_TOO_LONG,
        message: 'Message too long: 5 bytes (max: 4)',
      });
      expect(conn.reads).toBe(1);
    });

    it('fails a declared length below the minimum', async () => {
      const conn = new MemoryStreamConnection(bytes(0x00, 0x00));

      await expect(new MessageParser().decodeStream(conn)).rejects.toMatchObject({
        code: ErrorCode.ERR_MESSAGE_TOO_SHORT,
      });
    });

    it('treats a truncated prefix as a transport failure', async () => {
      const conn = new MemoryStreamConnection(bytes(0x00));

      await expect(new MessageParser().decodeStream(conn)).rejects.toMatchObject({
        code: ErrorCode.ERR_CONNECTION_CLOSED,
      });
    });

    it('rejects a connection that returns fewer bytes than asked for', async () => {
      const conn: StreamConnection = {
        readExactly: async () => bytes(0x00),
        write: async () => undefined,
        close: () => undefined,
      };

      await expect(new MessageParser().decodeStream(conn)).rejects.toMatchObject({
        code: ErrorCode.ERR_CONNECTION_CLOSED,
        message: 'Short read: got 1 of 2 bytes',
      });
    });

    it('passes transport errors through unchanged', async () => {
      const failure = new Error('socket reset');
      const conn: StreamConnection = {
        readExactly: async () => {
          throw failure;
        },
        write: async () => undefined,
        close: () => undefined,
      };

      await expect(new MessageParser().decodeStream(conn)).rejects.toBe(failure);
    });
  });

  describe('frame decoding', () => {
    it('returns everything after the prefix even when the declared length is shorter', async () => {
      const conn = new MemoryFrameConnection([bytes(0x00, 0x02, 1, 2, 3, 4, 5)]);

      const body = await new MessageParser().decodeFrame(conn);
      expect(Array.from(body)).toEqual([1, 2, 3, 4, 5]);
    });

    it('validates the declared length against the bounds', async () => {
      const parser = new MessageParser();

      await expect(parser.decodeFrame(new MemoryFrameConnection([bytes(0x07, 0xd0, 'x')]))).rejects.toMatchObject({
        code: ErrorCode.ERR_MESSAGE_TOO_LONG,
      });
      await expect(parser.decodeFrame(new MemoryFrameConnection([bytes(0x00, 0x00, 'x')]))).rejects.toMatchObject({
        code: ErrorCode.ERR_MESSAGE_TOO_SHORT,
      });
    });

    it('rejects a frame too short to hold the prefix', async () => {
      const conn = new MemoryFrameConnection([bytes(0x01)]);

      await expect(new MessageParser().decodeFrame(conn)).rejects.toMatchObject({
        code: ErrorCode.ERR_INVALID_FRAME,
        message: 'Frame too short for length prefix: 1 bytes (prefix: 2)',
      });
    });
  });

  describe('round trip', () => {
    const cases: Array<[PrefixWidth, ByteOrder]> = [
      [1, 'big'],
      [1, 'little'],
      [2, 'big'],
      [2, 'little'],
      [4, 'big'],
      [4, 'little'],
    ];

    it.each(cases)('width %i, %s-endian, over both transports', async (prefixWidth, byteOrder) => {
      const parser = new MessageParser({ prefixWidth, byteOrder, maxLength: 300 });
      const parts = [bytes(0x00, 0x2a), bytes('payload'), new Uint8Array(0)];
      const expected = [0x00, 0x2a, ...Buffer.from('payload')];

      const stream = streamTransport(new MemoryStreamConnection(undefined, true));
      await parser.write(stream, parts);
      expect(Array.from(await parser.read(stream))).toEqual(expected);

      const frames = frameTransport(new MemoryFrameConnection([], true));
      await parser.write(frames, parts);
      expect(Array.from(await parser.read(frames))).toEqual(expected);
    });
  });

  it('reconfigures into a new parser', () => {
    const parser = new MessageParser({ prefixWidth: 4 });
    const little = parser.reconfigure({ littleEndian: true });

    expect(little.config).toEqual({ prefixWidth: 4, minLength: 1, maxLength: 1024, byteOrder: 'little' });
    expect(parser.config.byteOrder).toBe('big');
  });
});
