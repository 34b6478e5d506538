#!/usr/bin/env node
/**
 * msgframe demo CLI
 */

import { Command } from 'commander';
import { serveCommand } from './commands/serve.js';
import { sendCommand } from './commands/send.js';

const program = new Command();

program
  .name('msgframe-demo')
  .description('msgframe demo CLI - length-prefixed messages over TCP and WebSocket')
  .version('0.1.0');

program.addCommand(serveCommand);
program.addCommand(sendCommand);

program.parse();
