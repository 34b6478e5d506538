/**
 * Byte-stream connection over a Node.js Duplex (usually a TCP socket)
 */

import * as net from 'node:net';
import type { Duplex } from 'node:stream';
import { ErrorCode, FrameError, toTransportError } from '../types/errors.js';
import type { StreamConnection } from './types.js';

export interface SocketConnectionOptions {
  /** Reject a read that waits longer than this many ms (default: no limit) */
  readTimeoutMs?: number;
  /** Pause the socket once this many bytes sit unread (default: 64 KiB) */
  highWaterMark?: number;
}

export interface DialOptions extends SocketConnectionOptions {
  /** Connection timeout in milliseconds */
  timeout?: number;
}

const DEFAULT_TIMEOUT = 10000; // 10 seconds
const DEFAULT_HIGH_WATER_MARK = 64 * 1024;

interface PendingRead {
  n: number;
  resolve: (data: Uint8Array) => void;
  reject: (err: FrameError) => void;
  timer: NodeJS.Timeout | null;
}

/**
 * Buffers incoming chunks and serves exact-length reads from them.
 *
 * Bytes that arrived before the peer closed can still be read; a read the
 * buffer cannot satisfy after that rejects with ERR_CONNECTION_CLOSED.
 * The socket is paused while `highWaterMark` bytes wait with no read pending.
 */
export class SocketStreamConnection implements StreamConnection {
  private chunks: Buffer[] = [];
  private buffered: number = 0;
  private pending: PendingRead | null = null;
  private failure: FrameError | null = null;
  private readTimeoutMs: number | undefined;
  private highWaterMark: number;

  constructor(
    readonly socket: Duplex,
    options: SocketConnectionOptions = {}
  ) {
    this.readTimeoutMs = options.readTimeoutMs;
    this.highWaterMark = options.highWaterMark ?? DEFAULT_HIGH_WATER_MARK;

    this.socket.on('data', this.handleData.bind(this));
    this.socket.on('end', () => {
      this.fail(new FrameError(ErrorCode.ERR_CONNECTION_CLOSED, 'Connection closed by peer'));
    });
    this.socket.on('close', () => {
      this.fail(new FrameError(ErrorCode.ERR_CONNECTION_CLOSED));
    });
    this.socket.on('error', (err: Error) => {
      this.fail(toTransportError(err, 'Socket error'));
    });
  }

  readExactly(n: number): Promise<Uint8Array> {
    if (this.pending) {
      return Promise.reject(
        new FrameError(ErrorCode.ERR_TRANSPORT, 'A read is already in progress on this connection')
      );
    }
    if (this.buffered >= n) {
      return Promise.resolve(this.take(n));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    this.socket.resume();

    return new Promise((resolve, reject) => {
      const pending: PendingRead = { n, resolve, reject, timer: null };

      if (this.readTimeoutMs !== undefined) {
        const timeout = this.readTimeoutMs;
        pending.timer = setTimeout(() => {
          if (this.pending === pending) {
            this.pending = null;
            reject(new FrameError(ErrorCode.ERR_TIMEOUT, `Read timeout after ${timeout}ms`));
          }
        }, timeout);
      }

      this.pending = pending;
    });
  }

  write(data: Uint8Array): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise((resolve, reject) => {
      this.socket.write(data, (err?: Error | null) => {
        if (err) {
          reject(toTransportError(err, 'Write failed'));
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    this.fail(new FrameError(ErrorCode.ERR_CONNECTION_CLOSED, 'Connection closed locally'));
    this.socket.destroy();
  }

  /**
   * Bytes received but not yet read
   */
  get bufferedBytes(): number {
    return this.buffered;
  }

  get isPaused(): boolean {
    return this.socket.isPaused();
  }

  get isClosed(): boolean {
    return this.failure !== null;
  }

  private handleData(chunk: Buffer | string): void {
    const data = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    this.chunks.push(data);
    this.buffered += data.length;

    const pending = this.pending;
    if (pending) {
      if (this.buffered >= pending.n) {
        this.settle();
        pending.resolve(this.take(pending.n));
      }
    } else if (this.buffered >= this.highWaterMark) {
      this.socket.pause();
    }
  }

  private take(n: number): Uint8Array {
    const data = new Uint8Array(n);
    let offset = 0;
    while (offset < n) {
      const chunk = this.chunks[0];
      if (!chunk) {
        break;
      }
      const count = Math.min(chunk.length, n - offset);
      data.set(chunk.subarray(0, count), offset);
      offset += count;
      if (count === chunk.length) {
        this.chunks.shift();
      } else {
        this.chunks[0] = chunk.subarray(count);
      }
    }
    this.buffered -= offset;
    return data;
  }

  private fail(err: FrameError): void {
    if (this.failure) {
      return;
    }
    this.failure = err;

    const pending = this.pending;
    if (pending) {
      this.settle();
      pending.reject(err);
    }
  }

  private settle(): void {
    if (this.pending?.timer) {
      clearTimeout(this.pending.timer);
    }
    this.pending = null;
  }
}

/**
 * Dial a TCP connection
 */
export function dial(host: string, port: number, options: DialOptions = {}): Promise<SocketStreamConnection> {
  return new Promise((resolve, reject) => {
    const timeout = options.timeout ?? DEFAULT_TIMEOUT;

    const socket = new net.Socket();
    let connected = false;

    const timeoutId = setTimeout(() => {
      if (!connected) {
        socket.destroy();
        reject(new FrameError(ErrorCode.ERR_TIMEOUT, `Connection timeout after ${timeout}ms`));
      }
    }, timeout);

    socket.once('connect', () => {
      connected = true;
      clearTimeout(timeoutId);
      configureSocket(socket);
      resolve(new SocketStreamConnection(socket, options));
    });

    socket.once('error', (err) => {
      clearTimeout(timeoutId);
      if (!connected) {
        reject(new FrameError(ErrorCode.ERR_CONNECTION_CLOSED, `Connection failed: ${err.message}`, { cause: err }));
      }
    });

    socket.connect(port, host);
  });
}

/**
 * Apply common socket options
 */
export function configureSocket(socket: net.Socket): void {
  // Enable keep-alive
  socket.setKeepAlive(true, 30000);
  // Disable Nagle's algorithm for lower latency
  socket.setNoDelay(true);
}
