/**
 * Serve command - Start an echo server
 */

import { Command } from 'commander';
import { MessageConnection, MessageParser, decodeEnvelope, encodeEnvelope, listen } from 'msgframe';
import type { TransportKind } from 'msgframe';
import {
  decodeTextMessage,
  describeConfig,
  parserOptionsFromFlags,
  parsePort,
  parseTransportKind,
} from '../options.js';
import type { ParserFlags } from '../options.js';

export const serveCommand = new Command('serve')
  .description('Start an echo server that sends every message back to its sender')
  .argument('<port>', 'Port to listen on')
  .option('-H, --host <host>', 'Host to bind to', '127.0.0.1')
  .option('-t, --transport <transport>', 'Transport: tcp or ws', 'tcp')
  .option('-w, --prefix-width <bytes>', 'Length prefix width: 1, 2 or 4')
  .option('--min <bytes>', 'Minimum body length')
  .option('--max <bytes>', 'Maximum body length')
  .option('--little-endian', 'Encode lengths little-endian', false)
  .action((port: string, options: ParserFlags & { host: string; transport: string }) => {
    let portNum: number;
    let kind: TransportKind;
    try {
      portNum = parsePort(port);
      kind = parseTransportKind(options.transport);
    } catch (err) {
      console.error(err instanceof Error ? err.message : err);
      process.exit(1);
    }

    const { config, warning } = describeConfig(parserOptionsFromFlags(options));
    if (warning) {
      console.error(`Warning: ${warning}`);
    }
    const parser = new MessageParser(config);
    console.log(
      `Prefix: ${config.prefixWidth} bytes ${config.byteOrder}-endian, body ${config.minLength}..${config.maxLength} bytes`
    );

    const listener = listen({ kind, port: portNum, host: options.host });

    listener.on('listening', (address) => {
      console.log(`Listening on ${options.transport}://${address.host}:${address.port}`);
      console.log('Waiting for connections... (Ctrl+C to stop)');
      console.log('');
    });

    listener.on('connection', (transport, remote) => {
      console.log(`New connection from: ${remote}`);
      const connection = new MessageConnection(transport, parser);

      connection.on('message', (body) => {
        try {
          const { id, payload } = decodeEnvelope(body, config.byteOrder);
          const text = decodeTextMessage(payload);
          console.log(`  [${remote}] id=${id} ${text ? `text: ${text.text}` : `${payload.length} bytes`}`);

          connection.send(encodeEnvelope(id, payload, config.byteOrder)).catch((err: unknown) => {
            console.error(`  [${remote}] Echo failed:`, err instanceof Error ? err.message : err);
          });
        } catch (err) {
          console.error(`  [${remote}] Bad message:`, err instanceof Error ? err.message : err);
        }
      });

      connection.on('error', (err) => {
        console.log(`  Connection error: ${err.message}`);
      });

      connection.on('close', () => {
        console.log(`Connection closed: ${remote}`);
      });

      connection.start();
    });

    listener.on('error', (err) => {
      console.error('Failed to start listener:', err.message);
      process.exit(1);
    });

    // Handle graceful shutdown
    process.on('SIGINT', () => {
      console.log('\nShutting down...');
      listener.close().then(
        () => process.exit(0),
        () => process.exit(1)
      );
    });
  });
