/**
 * Frame connection over a WebSocket (ws)
 */

import type { EventEmitter } from 'node:events';
import WebSocket from 'ws';
import { ErrorCode, FrameError, toTransportError } from '../types/errors.js';
import type { FrameConnection } from './types.js';

/**
 * The part of a ws WebSocket the adapter relies on
 */
export interface FrameSocket extends EventEmitter {
  readonly readyState: number;
  send(data: Uint8Array, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  pause(): void;
  resume(): void;
}

export interface WebSocketConnectionOptions {
  /** Reject a read that waits longer than this many ms (default: no limit) */
  readTimeoutMs?: number;
  /** Pause the socket once this many frames sit unread (default: 16) */
  maxQueuedFrames?: number;
}

export interface ConnectOptions extends WebSocketConnectionOptions {
  /** Connection timeout in milliseconds */
  timeout?: number;
}

const DEFAULT_TIMEOUT = 10000; // 10 seconds
const DEFAULT_MAX_QUEUED_FRAMES = 16;

/** WebSocket.OPEN */
const OPEN = 1;

interface PendingFrame {
  resolve: (frame: Uint8Array) => void;
  reject: (err: FrameError) => void;
  timer: NodeJS.Timeout | null;
}

/**
 * Queues incoming WebSocket messages as frames.
 * Text and binary messages are both delivered as bytes. The socket is
 * paused while `maxQueuedFrames` frames wait unread.
 */
export class WebSocketFrameConnection implements FrameConnection {
  private frames: Uint8Array[] = [];
  private pending: PendingFrame | null = null;
  private failure: FrameError | null = null;
  private readTimeoutMs: number | undefined;
  private maxQueuedFrames: number;
  private paused: boolean = false;

  constructor(
    readonly socket: FrameSocket,
    options: WebSocketConnectionOptions = {}
  ) {
    this.readTimeoutMs = options.readTimeoutMs;
    this.maxQueuedFrames = options.maxQueuedFrames ?? DEFAULT_MAX_QUEUED_FRAMES;

    this.socket.on('message', (data: WebSocket.RawData | string) => {
      this.handleFrame(toBytes(data));
    });
    this.socket.on('close', (code: number) => {
      this.fail(new FrameError(ErrorCode.ERR_CONNECTION_CLOSED, `WebSocket closed (code ${code})`));
    });
    this.socket.on('error', (err: Error) => {
      this.fail(toTransportError(err, 'WebSocket error'));
    });
  }

  readFrame(): Promise<Uint8Array> {
    if (this.pending) {
      return Promise.reject(
        new FrameError(ErrorCode.ERR_TRANSPORT, 'A read is already in progress on this connection')
      );
    }

    const frame = this.frames.shift();
    if (this.paused && !this.failure && this.frames.length < this.maxQueuedFrames) {
      this.paused = false;
      this.socket.resume();
    }
    if (frame) {
      return Promise.resolve(frame);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise((resolve, reject) => {
      const pending: PendingFrame = { resolve, reject, timer: null };

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

  writeFrame(data: Uint8Array): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.socket.readyState !== OPEN) {
      return Promise.reject(new FrameError(ErrorCode.ERR_CONNECTION_CLOSED, 'WebSocket is not open'));
    }

    return new Promise((resolve, reject) => {
      this.socket.send(data, (err?: Error) => {
        if (err) {
          reject(toTransportError(err, 'Send failed'));
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    this.fail(new FrameError(ErrorCode.ERR_CONNECTION_CLOSED, 'Connection closed locally'));
    this.socket.close();
  }

  /**
   * Frames received but not yet read
   */
  get queuedFrames(): number {
    return this.frames.length;
  }

  get isClosed(): boolean {
    return this.failure !== null;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  private handleFrame(frame: Uint8Array): void {
    const pending = this.pending;
    if (pending) {
      this.settle();
      pending.resolve(frame);
      return;
    }
    this.frames.push(frame);
    if (!this.paused && this.frames.length >= this.maxQueuedFrames) {
      this.paused = true;
      this.socket.pause();
    }
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

function toBytes(data: WebSocket.RawData | string): Uint8Array {
  if (typeof data === 'string') {
    return Buffer.from(data, 'utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return data;
}

/**
 * Open a WebSocket client connection
 */
export function connectWebSocket(url: string, options: ConnectOptions = {}): Promise<WebSocketFrameConnection> {
  return new Promise((resolve, reject) => {
    const timeout = options.timeout ?? DEFAULT_TIMEOUT;

    const socket = new WebSocket(url);
    let connected = false;

    const timeoutId = setTimeout(() => {
      if (!connected) {
        socket.terminate();
        reject(new FrameError(ErrorCode.ERR_TIMEOUT, `Connection timeout after ${timeout}ms`));
      }
    }, timeout);

    socket.once('open', () => {
      connected = true;
      clearTimeout(timeoutId);
      resolve(new WebSocketFrameConnection(socket, options));
    });

    socket.once('error', (err) => {
      clearTimeout(timeoutId);
      if (!connected) {
        reject(new FrameError(ErrorCode.ERR_CONNECTION_CLOSED, `Connection failed: ${err.message}`, { cause: err }));
      }
    });
  });
}
