/**
 * Shared CLI option handling
 */

import { encodePayload, decodePayload, isSatisfiable, createParserConfig } from 'msgframe';
import type { ParserOptions, ParserConfig, TransportKind } from 'msgframe';

export interface ParserFlags {
  prefixWidth?: string;
  min?: string;
  max?: string;
  littleEndian?: boolean;
}

/** Message id used by the demo for text messages */
export const TEXT_MESSAGE_ID = 1;

export interface TextMessage {
  text: string;
  sentAt: number;
}

/**
 * Map parser flags onto ParserOptions.
 * Unparseable numbers are passed through as NaN and normalized by the parser.
 */
export function parserOptionsFromFlags(flags: ParserFlags): ParserOptions {
  return {
    prefixWidth: flags.prefixWidth !== undefined ? Number(flags.prefixWidth) : undefined,
    minLength: flags.min !== undefined ? Number(flags.min) : undefined,
    maxLength: flags.max !== undefined ? Number(flags.max) : undefined,
    littleEndian: flags.littleEndian,
  };
}

/**
 * Warn when no body length can pass validation
 */
export function describeConfig(options: ParserOptions): { config: ParserConfig; warning: string | null } {
  const config = createParserConfig(options);
  const warning = isSatisfiable(config)
    ? null
    : `min length ${config.minLength} exceeds max length ${config.maxLength}; every message will be rejected`;
  return { config, warning };
}

export function parseTransportKind(value: string): TransportKind {
  switch (value) {
    case 'tcp':
      return 'stream';
    case 'ws':
      return 'frame';
    default:
      throw new Error(`Unknown transport: ${value} (expected tcp or ws)`);
  }
}

export function parsePort(port: string): number {
  const portNum = parseInt(port, 10);
  if (isNaN(portNum) || portNum < 1 || portNum > 65535) {
    throw new Error(`Invalid port number: ${port}`);
  }
  return portNum;
}

export function encodeTextMessage(text: string, sentAt: number = Date.now()): Uint8Array {
  const message: TextMessage = { text, sentAt };
  return encodePayload(message);
}

export function decodeTextMessage(payload: Uint8Array): TextMessage | null {
  const value = decodePayload(payload);
  if (typeof value !== 'object' || value === null || !('text' in value) || !('sentAt' in value)) {
    return null;
  }
  const { text, sentAt } = value;
  if (typeof text !== 'string' || typeof sentAt !== 'number') {
    return null;
  }
  return { text, sentAt };
}
