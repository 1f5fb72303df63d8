import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ConfigError, loadGatewayConfig } from '../../../src/core/config-loader.js';
import { cleanupTempDir, createTempDir } from '../../_helpers/plugin-fixtures.js';

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('loadGatewayConfig', () => {
  let home: string;

  beforeEach(() => {
    home = createTempDir('toolgate-config-');
  });

  afterEach(() => {
    cleanupTempDir(home);
  });

  it('falls back to defaults under TOOLGATE_HOME', () => {
    const config = loadGatewayConfig({ env: { TOOLGATE_HOME: home } });

    expect(config.server).toEqual({ host: '127.0.0.1', port: 8765 });
    expect(config.plugins.dir).toBe(join(home, 'plugins'));
    expect(config.plugins.entrypoints).toEqual(['cli', 'cli.py', 'cli.js', 'cli.mjs', 'cli.sh']);
    expect(config.plugins.interpreters['.py']).toEqual(['python3']);
    expect(config.execution).toEqual({ callTimeoutMs: 30_000, killGraceMs: 2_000, maxOutputBytes: 4 * 1024 * 1024 });
    expect(config.sessions).toEqual({ reapIntervalMs: 100, closeGraceMs: 1_000, keepaliveIntervalMs: 15_000 });
    expect(config.logging.level).toBe('info');
  });

  it('reads the YAML file and resolves relative directories against it', () => {
    const configPath = join(home, 'gateway.yaml');
    writeFileSync(
      configPath,
      [
        'server:',
        '  port: 9000',
        'plugins:',
        '  dir: ./my-plugins',
        '  interpreters:',
        '    py: [python3, -u]',
        'sessions:',
        '  keepaliveIntervalMs: 0',
        'logging:',
        '  level: debug',
        '  dir: logs',
      ].join('\n'),
    );

    const config = loadGatewayConfig({ configPath, env: { TOOLGATE_HOME: home } });

    expect(config.server.port).toBe(9000);
    expect(config.plugins.dir).toBe(join(home, 'my-plugins'));
    expect(config.plugins.interpreters['.py']).toEqual(['python3', '-u']);
    expect(config.sessions.keepaliveIntervalMs).toBe(0);
    expect(config.logging).toEqual({ level: 'debug', dir: join(home, 'logs') });
  });

  it('picks up the default config file in the home directory', () => {
    mkdirSync(join(home, 'config'));
    writeFileSync(join(home, 'config', 'config.yaml'), 'server:\n  host: 0.0.0.0\n');

    const config = loadGatewayConfig({ env: { TOOLGATE_HOME: home } });
    expect(config.server.host).toBe('0.0.0.0');
  });

  it('lets env beat the file and overrides beat env', () => {
    const configPath = join(home, 'gateway.yaml');
    writeFileSync(configPath, 'server:\n  port: 9000\n  host: 10.0.0.1\n');
    const env = { TOOLGATE_HOME: home, TOOLGATE_PORT: '9100', TOOLGATE_CALL_TIMEOUT_MS: '500' };

    expect(loadGatewayConfig({ configPath, env }).server.port).toBe(9100);

    const config = loadGatewayConfig({ configPath, env, overrides: { server: { port: 9200, host: undefined } } });
    expect(config.server).toEqual({ host: '10.0.0.1', port: 9200 });
    expect(config.execution.callTimeoutMs).toBe(500);
  });

  it('rejects invalid values with the offending field', () => {
    const env = { TOOLGATE_HOME: home };
    expect(configErrorOf(() => loadGatewayConfig({ env, overrides: { server: { port: 70000 } } })).field).toBe(
      'server.port',
    );
    expect(configErrorOf(() => loadGatewayConfig({ env: { ...env, TOOLGATE_PORT: 'abc' } })).field).toBe('server.port');
    expect(configErrorOf(() => loadGatewayConfig({ env: { ...env, TOOLGATE_LOG_LEVEL: 'loud' } })).field).toBe(
      'logging.level',
    );
    expect(
      configErrorOf(() => loadGatewayConfig({ env, overrides: { execution: { callTimeoutMs: 0 } } })).field,
    ).toBe('execution.callTimeoutMs');

    const configPath = join(home, 'bad.yaml');
    writeFileSync(configPath, 'server:\n  port: eighty\n');
    expect(configErrorOf(() => loadGatewayConfig({ configPath, env })).field).toBe('server.port');
  });

  it('fails when an explicit config file is missing', () => {
    const error = configErrorOf(() =>
      loadGatewayConfig({ configPath: join(home, 'missing.yaml'), env: { TOOLGATE_HOME: home } }),
    );
    expect(error.field).toBe('configPath');
  });
});
