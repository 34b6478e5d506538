/**
 * msgframe - length-prefixed message framing
 *
 * Turns a byte stream or a WebSocket into a sequence of bounded-size
 * message bodies, and back.
 */

// Core types
export * from './types/index.js';

// Parser configuration
export * from './config/index.js';

// Wire format
export * from './wire/index.js';

// Transports
export * from './transport/index.js';

// Connections
export * from './session/index.js';
