/**
 * Connection exports
 */

export type { ConnectionEvents } from './connection.js';
export { MessageConnection } from './connection.js';
