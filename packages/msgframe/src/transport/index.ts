/**
 * Transport exports
 */

export type { StreamConnection, FrameConnection, Transport, TransportKind } from './types.js';
export { streamTransport, frameTransport } from './types.js';

export type { SocketConnectionOptions, DialOptions } from './socket.js';
export { SocketStreamConnection, dial, configureSocket } from './socket.js';

export type { FrameSocket, WebSocketConnectionOptions, ConnectOptions } from './websocket.js';
export { WebSocketFrameConnection, connectWebSocket } from './websocket.js';

export type { ListenerOptions, ListenAddress, ListenerEvents } from './listener.js';
export { Listener, listen } from './listener.js';
