/**
 * Message connection: a parser bound to one transport
 */

import { EventEmitter } from 'node:events';
import { MessageParser } from '../wire/framing.js';
import { ErrorCode, FrameError, isConnectionFatal } from '../types/errors.js';
import type { Transport } from '../transport/types.js';

export interface ConnectionEvents {
  message: [body: Uint8Array];
  error: [error: Error];
  close: [];
}

/**
 * Owns a transport, reads bodies off it in a loop and writes bodies to it.
 *
 * Any read failure closes the connection: after a bad prefix the stream
 * cannot be resynchronized, so nothing more is read from it. A write
 * rejected for its length leaves the connection open.
 *
 * As with any EventEmitter, a read-loop failure with no 'error' listener
 * is thrown as an uncaught exception (after the connection has closed).
 */
export class MessageConnection extends EventEmitter<ConnectionEvents> {
  private closed: boolean = false;
  private reading: boolean = false;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    readonly transport: Transport,
    readonly parser: MessageParser = new MessageParser()
  ) {
    super();
  }

  /**
   * Start the read loop. Bodies are emitted as 'message' events.
   */
  start(): void {
    if (this.reading || this.closed) {
      return;
    }
    this.reading = true;
    void this.readLoop();
  }

  /**
   * Read a single body without starting the loop.
   * Rejects, leaving the connection open, while the loop is running.
   */
  async receive(): Promise<Uint8Array> {
    if (this.closed) {
      throw new FrameError(ErrorCode.ERR_CONNECTION_CLOSED);
    }
    if (this.reading) {
      throw new FrameError(ErrorCode.ERR_TRANSPORT, 'Cannot receive while the read loop is running');
    }
    try {
      return await this.parser.read(this.transport);
    } catch (err) {
      this.close();
      throw err;
    }
  }

  /**
   * Send `parts` as one message.
   * Writes are queued so two sends never interleave on the transport.
   */
  send(parts: readonly Uint8Array[]): Promise<void> {
    const result = this.writeChain.then(() => this.writeNow(parts));
    this.writeChain = result.catch(() => undefined);
    return result;
  }

  /**
   * Close the connection and its transport
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.reading = false;
    this.transport.conn.close();
    this.emit('close');
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  private async writeNow(parts: readonly Uint8Array[]): Promise<void> {
    if (this.closed) {
      throw new FrameError(ErrorCode.ERR_CONNECTION_CLOSED);
    }
    try {
      await this.parser.write(this.transport, parts);
    } catch (err) {
      if (isConnectionFatal(err, 'write')) {
        this.close();
      }
      throw err;
    }
  }

  private async readLoop(): Promise<void> {
    while (this.reading && !this.closed) {
      let body: Uint8Array;
      try {
        body = await this.parser.read(this.transport);
      } catch (err) {
        if (!this.closed) {
          this.fail(err instanceof Error ? err : new FrameError(ErrorCode.ERR_UNKNOWN, String(err), { cause: err }));
        }
        return;
      }

      if (this.closed) {
        return;
      }
      this.emit('message', body);
    }
  }

  private fail(error: Error): void {
    let unhandled: unknown = null;
    try {
      this.emit('error', error);
    } catch (err) {
      unhandled = err;
    }
    this.close();
    if (unhandled !== null) {
      process.nextTick(() => {
        throw unhandled;
      });
    }
  }
}
