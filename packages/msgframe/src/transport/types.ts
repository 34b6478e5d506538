/**
 * Transport abstraction.
 *
 * Byte streams (TCP) carry no message boundaries, so the parser reads an
 * exact number of bytes at a time. Message-oriented transports (WebSocket)
 * deliver whole frames. Both carry the same length-prefixed body.
 */

/**
 * A connection with exact-count reads and whole-buffer writes
 */
export interface StreamConnection {
  /**
   * Resolve with exactly `n` bytes, or reject if the connection fails or
   * closes first.
   */
  readExactly(n: number): Promise<Uint8Array>;
  /** Resolve once the whole buffer has been accepted */
  write(data: Uint8Array): Promise<void>;
  close(): void;
}

/**
 * A connection whose primitives move one complete message at a time
 */
export interface FrameConnection {
  /** Resolve with the next complete frame */
  readFrame(): Promise<Uint8Array>;
  /** Send `data` as a single frame */
  writeFrame(data: Uint8Array): Promise<void>;
  close(): void;
}

export type Transport =
  | { readonly kind: 'stream'; readonly conn: StreamConnection }
  | { readonly kind: 'frame'; readonly conn: FrameConnection };

export type TransportKind = Transport['kind'];

export function streamTransport(conn: StreamConnection): Transport {
  return { kind: 'stream', conn };
}

export function frameTransport(conn: FrameConnection): Transport {
  return { kind: 'frame', conn };
}
