import path from 'path';
import { loadGatewayConfig, type GatewayConfig, type GatewayConfigOverrides } from '../core/config-loader.js';
import { logger } from '../core/logger.js';
import { ExitCode, ToolgateError } from './errors.js';

export interface CommonCliOptions {
  config?: string;
  pluginsDir?: string;
}

export interface ServeCliOptions extends CommonCliOptions {
  host?: string;
  port?: string;
}

/** Loads the layered config for a command and points the logger at it. */
export function resolveCliConfig(options: ServeCliOptions): GatewayConfig {
  const overrides: GatewayConfigOverrides = {
    server: {
      host: options.host,
      port: options.port === undefined ? undefined : parsePort(options.port),
    },
    plugins: { dir: options.pluginsDir ? path.resolve(options.pluginsDir) : undefined },
  };
  const config = loadGatewayConfig({ configPath: options.config, overrides });
  logger.configure({ level: config.logging.level, logDir: config.logging.dir });
  return config;
}

export function parsePort(raw: string): number {
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ToolgateError(`Invalid port: ${raw}`, ExitCode.INVALID_ARGS);
  }
  return port;
}
