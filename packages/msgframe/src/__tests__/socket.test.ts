import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { once } from 'node:events';
import { SocketStreamConnection } from '../transport/socket.js';
import { MessageParser } from '../wire/framing.js';
import { ErrorCode } from '../types/errors.js';
import { bytes, text } from './fakes.js';

describe('SocketStreamConnection', () => {
  it('carries messages written to a loopback stream', async () => {
    const conn = new SocketStreamConnection(new PassThrough());
    const parser = new MessageParser();

    await parser.encodeStream(conn, [bytes('hel'), bytes('lo')]);
    await parser.encodeStream(conn, [bytes('world')]);

    expect(text(await parser.decodeStream(conn))).toBe('hello');
    expect(text(await parser.decodeStream(conn))).toBe('world');
  });

  it('assembles a read from several chunks', async () => {
    const stream = new PassThrough();
    const conn = new SocketStreamConnection(stream);

    const body = new MessageParser().decodeStream(conn);
    stream.write(bytes(0x00));
    stream.write(bytes(0x03, 'a'));
    stream.write(bytes('bc'));

    expect(text(await body)).toBe('abc');
  });

  it('keeps bytes beyond the requested count buffered', async () => {
    const stream = new PassThrough();
    const conn = new SocketStreamConnection(stream);

    stream.write(bytes(1, 2, 3, 4, 5));
    expect(Array.from(await conn.readExactly(2))).toEqual([1, 2]);
    expect(conn.bufferedBytes).toBe(3);
    expect(Array.from(await conn.readExactly(3))).toEqual([3, 4, 5]);
  });

  it('pauses the stream while unread bytes pass the high-water mark', async () => {
    const stream = new PassThrough();
    const conn = new SocketStreamConnection(stream, { highWaterMark: 4 });

    stream.write(bytes(1, 2, 3));
    stream.write(bytes(4, 5, 6));
    stream.write(bytes(7, 8, 9));
    await new Promise((resolve) => setImmediate(resolve));

    expect(conn.isPaused).toBe(true);
    expect(conn.bufferedBytes).toBe(6);

    expect(Array.from(await conn.readExactly(9))).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(conn.bufferedBytes).toBe(0);
    expect(conn.isPaused).toBe(false);
  });

  it('rejects a read cut short by the peer closing', async () => {
    const stream = new PassThrough();
    const conn = new SocketStreamConnection(stream);

    const read = conn.readExactly(2);
    stream.write(bytes(0x00));
    stream.end();

    await expect(read).rejects.toMatchObject({
      code: ErrorCode.ERR_CONNECTION_CLOSED,
      message: 'Connection closed by peer',
    });
  });

  it('still serves bytes that arrived before the close', async () => {
    const stream = new PassThrough();
    const conn = new SocketStreamConnection(stream);

    stream.end(bytes(7, 8, 9));
    await once(stream, 'end');

    expect(Array.from(await conn.readExactly(3))).toEqual([7, 8, 9]);
    await expect(conn.readExactly(1)).rejects.toMatchObject({ code: ErrorCode.ERR_CONNECTION_CLOSED });
    expect(conn.isClosed).toBe(true);
  });

  it('reports stream errors as transport errors', async () => {
    const stream = new PassThrough();
    const conn = new SocketStreamConnection(stream);

    const read = conn.readExactly(1);
    stream.destroy(new Error('boom'));

    await expect(read).rejects.toMatchObject({
      code: ErrorCode.ERR_TRANSPORT,
      message: 'Socket error: boom',
    });
  });

  it('times out a read that waits too long and recovers for the next one', async () => {
    const stream = new PassThrough();
    const conn = new SocketStreamConnection(stream, { readTimeoutMs: 20 });

    await expect(conn.readExactly(1)).rejects.toMatchObject({
      code: ErrorCode.ERR_TIMEOUT,
      message: 'Read timeout after 20ms',
    });

    stream.write(bytes(9));
    expect(Array.from(await conn.readExactly(1))).toEqual([9]);
  });

  it('allows one read at a time', async () => {
    const stream = new PassThrough();
    const conn = new SocketStreamConnection(stream);

    const first = conn.readExactly(1);
    await expect(conn.readExactly(1)).rejects.toMatchObject({ code: ErrorCode.ERR_TRANSPORT });

    stream.write(bytes(1));
    expect(Array.from(await first)).toEqual([1]);
  });

  it('destroys the stream on close and refuses further writes', async () => {
    const stream = new PassThrough();
    const conn = new SocketStreamConnection(stream);

    conn.close();

    expect(stream.destroyed).toBe(true);
    await expect(conn.write(bytes(1))).rejects.toMatchObject({
      code: ErrorCode.ERR_CONNECTION_CLOSED,
      message: 'Connection closed locally',
    });
  });
});
