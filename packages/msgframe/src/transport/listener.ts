/**
 * Listener for inbound connections on either transport
 */

import * as net from 'node:net';
import { EventEmitter } from 'node:events';
import { WebSocketServer } from 'ws';
import { SocketStreamConnection, configureSocket } from './socket.js';
import { WebSocketFrameConnection } from './websocket.js';
import { frameTransport, streamTransport } from './types.js';
import type { Transport, TransportKind } from './types.js';

export interface ListenerOptions {
  /** 'stream' accepts TCP, 'frame' accepts WebSocket upgrades */
  kind: TransportKind;
  /** Host to bind to (default: '0.0.0.0') */
  host?: string;
  /** Port to bind to */
  port: number;
  /** Maximum pending connections */
  backlog?: number;
  /** Read timeout applied to every accepted connection */
  readTimeoutMs?: number;
}

export interface ListenAddress {
  host: string;
  port: number;
}

export interface ListenerEvents {
  connection: [transport: Transport, remote: string];
  error: [error: Error];
  listening: [address: ListenAddress];
  close: [];
}

type Server =
  | { kind: 'stream'; server: net.Server }
  | { kind: 'frame'; server: WebSocketServer };

/**
 * Accepts connections and hands them out as ready transports
 */
export class Listener extends EventEmitter<ListenerEvents> {
  private server: Server;
  private localAddress: ListenAddress | null = null;

  constructor(options: ListenerOptions) {
    super();

    const host = options.host ?? '0.0.0.0';
    const connectionOptions = { readTimeoutMs: options.readTimeoutMs };

    if (options.kind === 'stream') {
      const server = net.createServer((socket) => {
        configureSocket(socket);
        const remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
        this.emit('connection', streamTransport(new SocketStreamConnection(socket, connectionOptions)), remote);
      });
      server.on('error', (err) => this.emit('error', err));
      server.on('listening', () => this.handleListening(server.address()));
      server.on('close', () => this.emit('close'));
      server.listen({ host, port: options.port, backlog: options.backlog });
      this.server = { kind: 'stream', server };
    } else {
      const server = new WebSocketServer({ host, port: options.port, backlog: options.backlog });
      server.on('connection', (socket, request) => {
        const remote = `${request.socket.remoteAddress ?? 'unknown'}:${request.socket.remotePort ?? 0}`;
        this.emit('connection', frameTransport(new WebSocketFrameConnection(socket, connectionOptions)), remote);
      });
      server.on('error', (err) => this.emit('error', err));
      server.on('listening', () => this.handleListening(server.address()));
      server.on('close', () => this.emit('close'));
      this.server = { kind: 'frame', server };
    }
  }

  /**
   * Get the local address the listener is bound to
   */
  get address(): ListenAddress | null {
    return this.localAddress;
  }

  get kind(): TransportKind {
    return this.server.kind;
  }

  /**
   * Stop accepting connections
   */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      const done = (err?: Error) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      };

      if (this.server.kind === 'stream') {
        this.server.server.close(done);
      } else {
        this.server.server.close(done);
      }
    });
  }

  private handleListening(addr: net.AddressInfo | string | null): void {
    if (addr && typeof addr === 'object') {
      this.localAddress = {
        host: addr.address === '::' ? '0.0.0.0' : addr.address,
        port: addr.port,
      };
      this.emit('listening', this.localAddress);
    }
  }
}

/**
 * Create and start a listener
 */
export function listen(options: ListenerOptions): Listener {
  return new Listener(options);
}
