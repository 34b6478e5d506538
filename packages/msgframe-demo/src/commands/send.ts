/**
 * Send command - Connect to a server, send one message, print the reply
 */

import { Command } from 'commander';
import {
  MessageConnection,
  MessageParser,
  connectWebSocket,
  decodeEnvelope,
  dial,
  encodeEnvelope,
  frameTransport,
  streamTransport,
} from 'msgframe';
import type { Transport } from 'msgframe';
import {
  TEXT_MESSAGE_ID,
  decodeTextMessage,
  describeConfig,
  encodeTextMessage,
  parserOptionsFromFlags,
  parsePort,
  parseTransportKind,
} from '../options.js';
import type { ParserFlags } from '../options.js';

const REPLY_TIMEOUT_MS = 10000;

export const sendCommand = new Command('send')
  .description('Connect to a server and send a single text message')
  .argument('<port>', 'Port to connect to')
  .argument('[message...]', 'Message text', ['Hello from msgframe!'])
  .option('-H, --host <host>', 'Host to connect to', '127.0.0.1')
  .option('-t, --transport <transport>', 'Transport: tcp or ws', 'tcp')
  .option('-i, --id <id>', 'Message id', String(TEXT_MESSAGE_ID))
  .option('-w, --prefix-width <bytes>', 'Length prefix width: 1, 2 or 4')
  .option('--min <bytes>', 'Minimum body length')
  .option('--max <bytes>', 'Maximum body length')
  .option('--little-endian', 'Encode lengths little-endian', false)
  .action(async (port: string, words: string[], options: ParserFlags & { host: string; transport: string; id: string }) => {
    const { config, warning } = describeConfig(parserOptionsFromFlags(options));
    if (warning) {
      console.error(`Warning: ${warning}`);
    }
    const parser = new MessageParser(config);

    let transport: Transport;
    try {
      const portNum = parsePort(port);
      const kind = parseTransportKind(options.transport);

      console.log(`Connecting to ${options.transport}://${options.host}:${portNum}...`);
      transport = kind === 'stream'
        ? streamTransport(await dial(options.host, portNum, { readTimeoutMs: REPLY_TIMEOUT_MS }))
        : frameTransport(await connectWebSocket(`ws://${options.host}:${portNum}`, { readTimeoutMs: REPLY_TIMEOUT_MS }));
    } catch (err) {
      console.error('Connection failed:', err instanceof Error ? err.message : err);
      process.exit(1);
    }

    const connection = new MessageConnection(transport, parser);
    const text = words.join(' ');

    try {
      console.log(`Sending: ${text}`);
      await connection.send(encodeEnvelope(Number(options.id), encodeTextMessage(text), config.byteOrder));

      const { id, payload } = decodeEnvelope(await connection.receive(), config.byteOrder);
      const reply = decodeTextMessage(payload);
      console.log(`Received response (id=${id}): ${reply ? reply.text : `${payload.length} bytes`}`);
    } catch (err) {
      console.error('Exchange failed:', err instanceof Error ? err.message : err);
      connection.close();
      process.exit(1);
    }

    connection.close();
  });
