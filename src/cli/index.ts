#!/usr/bin/env node
/**
 * toolgate CLI
 */

import { Command } from 'commander';
import { exitWithError } from './errors.js';
import { registerServeCommand } from './serve-command.js';
import { registerToolCommands } from './tool-command.js';

const program = new Command();

program
  .name('toolgate')
  .description('Expose CLI plugins as JSON-RPC tools over HTTP')
  .version('0.1.0');

registerServeCommand(program);
registerToolCommands(program);

program.parseAsync(process.argv).catch(exitWithError);
