import type { Command } from 'commander';
import { logger } from '../core/logger.js';
import { startGatewayServer } from '../server/index.js';
import { exitWithError } from './errors.js';
import { resolveCliConfig, type ServeCliOptions } from './options.js';

const log = logger.module('ServeCommand');

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the HTTP gateway (SSE manifest stream + JSON-RPC /message)')
    .option('-p, --port <port>', 'Port to listen on')
    .option('--host <host>', 'Interface to bind')
    .option('-d, --plugins-dir <dir>', 'Directory scanned for plugins')
    .option('-c, --config <file>', 'YAML config file')
    .action(async (options: ServeCliOptions) => {
      const config = resolveCliConfig(options);
      const running = await startGatewayServer(config);
      console.log(`toolgate listening on http://${running.host}:${running.port}`);

      const shutdown = (signal: NodeJS.Signals): void => {
        log.info('Shutting down', { signal });
        running
          .close()
          .then(() => process.exit(0))
          .catch(exitWithError);
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
}
