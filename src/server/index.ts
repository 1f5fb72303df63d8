import type { Server } from 'http';
import type { GatewayConfig } from '../core/config-loader.js';
import { logger } from '../core/logger.js';
import { GatewayFacade, type GatewayFacadeOptions } from '../gateway/gateway-facade.js';
import { createGatewayApp } from './app.js';

const log = logger.module('HttpServer');

export interface RunningGateway {
  gateway: GatewayFacade;
  server: Server;
  host: string;
  port: number;
  close(): Promise<void>;
}

/** Scans plugins, then listens. Port 0 picks a free port. */
export async function startGatewayServer(
  config: GatewayConfig,
  options: GatewayFacadeOptions = {},
): Promise<RunningGateway> {
  const gateway = new GatewayFacade(config, options);
  await gateway.start();
  const app = createGatewayApp(gateway);

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = app.listen(config.server.port, config.server.host);
    listening.once('listening', () => resolve(listening));
    listening.once('error', reject);
  });

  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : config.server.port;
  log.info('Gateway listening', { host: config.server.host, port });

  let closing: Promise<void> | null = null;
  const close = (): Promise<void> => {
    if (closing) return closing;
    gateway.stop();
    closing = new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
      server.closeAllConnections();
    });
    return closing;
  };

  return { gateway, server, host: config.server.host, port, close };
}
