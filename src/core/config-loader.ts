/**
 * Gateway configuration
 *
 * Layering: defaults ← config.yaml ← TOOLGATE_* env ← explicit overrides (CLI flags).
 */

import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { getToolgatePaths } from './toolgate-paths.js';
import { isLogLevel, type LogLevel } from './logger.js';

export interface ServerConfig {
  host: string;
  port: number;
}

export interface PluginsConfig {
  dir: string;
  entrypoints: string[];
  /** File extension (with dot) → argv prefix used to run scripts of that kind. */
  interpreters: Record<string, string[]>;
  introspectTimeoutMs: number;
}

export interface ExecutionConfig {
  callTimeoutMs: number;
  killGraceMs: number;
  maxOutputBytes: number;
}

export interface SessionsConfig {
  reapIntervalMs: number;
  closeGraceMs: number;
  keepaliveIntervalMs: number;
}

export interface LoggingConfig {
  level: LogLevel;
  dir?: string;
}

export interface GatewayConfig {
  server: ServerConfig;
  plugins: PluginsConfig;
  execution: ExecutionConfig;
  sessions: SessionsConfig;
  logging: LoggingConfig;
}

export interface GatewayConfigOverrides {
  server?: Partial<ServerConfig>;
  plugins?: Partial<PluginsConfig>;
  execution?: Partial<ExecutionConfig>;
  sessions?: Partial<SessionsConfig>;
  logging?: Partial<LoggingConfig>;
}

export interface LoadGatewayConfigOptions {
  configPath?: string;
  overrides?: GatewayConfigOverrides;
  env?: NodeJS.ProcessEnv;
}

export class ConfigError extends Error {
  constructor(message: string, public readonly field: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_ENTRYPOINTS = ['cli', 'cli.py', 'cli.js', 'cli.mjs', 'cli.sh'];

export function defaultInterpreters(): Record<string, string[]> {
  return {
    '.py': ['python3'],
    '.js': [process.execPath],
    '.mjs': [process.execPath],
    '.cjs': [process.execPath],
    '.sh': ['sh'],
  };
}

export function defaultGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const paths = getToolgatePaths(env.TOOLGATE_HOME);
  return {
    server: { host: '127.0.0.1', port: 8765 },
    plugins: {
      dir: paths.plugins.dir,
      entrypoints: [...DEFAULT_ENTRYPOINTS],
      interpreters: defaultInterpreters(),
      introspectTimeoutMs: 10_000,
    },
    execution: {
      callTimeoutMs: 30_000,
      killGraceMs: 2_000,
      maxOutputBytes: 4 * 1024 * 1024,
    },
    sessions: {
      reapIntervalMs: 100,
      closeGraceMs: 1_000,
      keepaliveIntervalMs: 15_000,
    },
    logging: { level: 'info' },
  };
}

export function loadGatewayConfig(options: LoadGatewayConfigOptions = {}): GatewayConfig {
  const env = options.env ?? process.env;
  const config = defaultGatewayConfig(env);

  const explicitPath = options.configPath ?? env.TOOLGATE_CONFIG;
  const configPath = explicitPath ?? getToolgatePaths(env.TOOLGATE_HOME).config.file.main;
  if (fs.existsSync(configPath)) {
    applyFileConfig(config, readConfigFile(configPath), path.dirname(configPath));
  } else if (explicitPath) {
    throw new ConfigError(`Config file not found: ${explicitPath}`, 'configPath');
  }

  applyEnvConfig(config, env);
  if (options.overrides) {
    applyOverrides(config, options.overrides);
  }
  validateConfig(config);
  return config;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  const content = fs.readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid YAML in ${filePath}: ${message}`, 'configPath');
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Invalid config at ${filePath}: expected a mapping`, 'configPath');
  }
  return parsed;
}

function applyFileConfig(config: GatewayConfig, raw: Record<string, unknown>, baseDir: string): void {
  const server = optionalRecord(raw, 'server');
  if (server) {
    assignString(server, 'host', 'server.host', (value) => { config.server.host = value; });
    assignNumber(server, 'port', 'server.port', (value) => { config.server.port = value; });
  }

  const plugins = optionalRecord(raw, 'plugins');
  if (plugins) {
    assignString(plugins, 'dir', 'plugins.dir', (value) => { config.plugins.dir = path.resolve(baseDir, value); });
    assignNumber(plugins, 'introspectTimeoutMs', 'plugins.introspectTimeoutMs', (value) => {
      config.plugins.introspectTimeoutMs = value;
    });
    if (plugins.entrypoints !== undefined) {
      config.plugins.entrypoints = requireStringArray(plugins.entrypoints, 'plugins.entrypoints');
    }
    const interpreters = optionalRecord(plugins, 'interpreters', 'plugins.interpreters');
    if (interpreters) {
      for (const [ext, argv] of Object.entries(interpreters)) {
        const key = ext.startsWith('.') ? ext : `.${ext}`;
        config.plugins.interpreters[key] = requireStringArray(argv, `plugins.interpreters.${ext}`);
      }
    }
  }

  const execution = optionalRecord(raw, 'execution');
  if (execution) {
    assignNumber(execution, 'callTimeoutMs', 'execution.callTimeoutMs', (value) => { config.execution.callTimeoutMs = value; });
    assignNumber(execution, 'killGraceMs', 'execution.killGraceMs', (value) => { config.execution.killGraceMs = value; });
    assignNumber(execution, 'maxOutputBytes', 'execution.maxOutputBytes', (value) => { config.execution.maxOutputBytes = value; });
  }

  const sessions = optionalRecord(raw, 'sessions');
  if (sessions) {
    assignNumber(sessions, 'reapIntervalMs', 'sessions.reapIntervalMs', (value) => { config.sessions.reapIntervalMs = value; });
    assignNumber(sessions, 'closeGraceMs', 'sessions.closeGraceMs', (value) => { config.sessions.closeGraceMs = value; });
    assignNumber(sessions, 'keepaliveIntervalMs', 'sessions.keepaliveIntervalMs', (value) => {
      config.sessions.keepaliveIntervalMs = value;
    });
  }

  const logging = optionalRecord(raw, 'logging');
  if (logging) {
    if (logging.level !== undefined) {
      if (!isLogLevel(logging.level)) {
        throw new ConfigError('Invalid config: field "logging.level" must be one of debug, info, warn, error, fatal', 'logging.level');
      }
      config.logging.level = logging.level;
    }
    assignString(logging, 'dir', 'logging.dir', (value) => { config.logging.dir = path.resolve(baseDir, value); });
  }
}

function applyEnvConfig(config: GatewayConfig, env: NodeJS.ProcessEnv): void {
  const host = readEnvString(env, 'TOOLGATE_HOST');
  if (host) config.server.host = host;

  const port = readEnvNumber(env, 'TOOLGATE_PORT', 'server.port');
  if (port !== undefined) config.server.port = port;

  const pluginsDir = readEnvString(env, 'TOOLGATE_PLUGINS_DIR');
  if (pluginsDir) config.plugins.dir = path.resolve(pluginsDir);

  const callTimeout = readEnvNumber(env, 'TOOLGATE_CALL_TIMEOUT_MS', 'execution.callTimeoutMs');
  if (callTimeout !== undefined) config.execution.callTimeoutMs = callTimeout;

  const introspectTimeout = readEnvNumber(env, 'TOOLGATE_INTROSPECT_TIMEOUT_MS', 'plugins.introspectTimeoutMs');
  if (introspectTimeout !== undefined) config.plugins.introspectTimeoutMs = introspectTimeout;

  const keepalive = readEnvNumber(env, 'TOOLGATE_KEEPALIVE_MS', 'sessions.keepaliveIntervalMs');
  if (keepalive !== undefined) config.sessions.keepaliveIntervalMs = keepalive;

  const level = readEnvString(env, 'TOOLGATE_LOG_LEVEL')?.toLowerCase();
  if (level) {
    if (!isLogLevel(level)) {
      throw new ConfigError(`Invalid TOOLGATE_LOG_LEVEL: ${level}`, 'logging.level');
    }
    config.logging.level = level;
  }

  const logDir = readEnvString(env, 'TOOLGATE_LOG_DIR');
  if (logDir) config.logging.dir = path.resolve(logDir);
}

function applyOverrides(config: GatewayConfig, overrides: GatewayConfigOverrides): void {
  config.server = { ...config.server, ...stripUndefined(overrides.server) };
  config.plugins = { ...config.plugins, ...stripUndefined(overrides.plugins) };
  config.execution = { ...config.execution, ...stripUndefined(overrides.execution) };
  config.sessions = { ...config.sessions, ...stripUndefined(overrides.sessions) };
  config.logging = { ...config.logging, ...stripUndefined(overrides.logging) };
}

function validateConfig(config: GatewayConfig): void {
  const { port } = config.server;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid config: field "server.port" must be an integer in 0..65535, got ${port}`, 'server.port');
  }
  const positive: Array<[string, number]> = [
    ['plugins.introspectTimeoutMs', config.plugins.introspectTimeoutMs],
    ['execution.callTimeoutMs', config.execution.callTimeoutMs],
    ['execution.maxOutputBytes', config.execution.maxOutputBytes],
    ['sessions.reapIntervalMs', config.sessions.reapIntervalMs],
  ];
  for (const [field, value] of positive) {
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigError(`Invalid config: field "${field}" must be a positive number`, field);
    }
  }
  const nonNegative: Array<[string, number]> = [
    ['execution.killGraceMs', config.execution.killGraceMs],
    ['sessions.closeGraceMs', config.sessions.closeGraceMs],
    ['sessions.keepaliveIntervalMs', config.sessions.keepaliveIntervalMs],
  ];
  for (const [field, value] of nonNegative) {
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigError(`Invalid config: field "${field}" must be zero or a positive number`, field);
    }
  }
  if (config.plugins.dir.trim().length === 0) {
    throw new ConfigError('Invalid config: field "plugins.dir" must be a non-empty string', 'plugins.dir');
  }
}

function stripUndefined<T extends object>(value: T | undefined): Partial<T> {
  if (!value) return {};
  return Object.fromEntries(Object.entries(value).filter(([, item]) => item !== undefined));
}

function optionalRecord(record: Record<string, unknown>, key: string, field = key): Record<string, unknown> | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid config: field "${field}" must be a mapping`, field);
  }
  return value;
}

function assignString(record: Record<string, unknown>, key: string, field: string, assign: (value: string) => void): void {
  const value = record[key];
  if (value === undefined) return;
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ConfigError(`Invalid config: field "${field}" must be a non-empty string`, field);
  }
  assign(value.trim());
}

function assignNumber(record: Record<string, unknown>, key: string, field: string, assign: (value: number) => void): void {
  const value = record[key];
  if (value === undefined) return;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`Invalid config: field "${field}" must be a number`, field);
  }
  assign(value);
}

function requireStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigError(`Invalid config: field "${field}" must be a non-empty string[]`, field);
  }
  const items = value.filter((item): item is string => typeof item === 'string').map((item) => item.trim());
  if (items.length !== value.length || items.some((item) => item.length === 0)) {
    throw new ConfigError(`Invalid config: field "${field}" must contain only non-empty strings`, field);
  }
  return items;
}

function readEnvString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name];
  if (typeof raw !== 'string' || raw.trim().length === 0) return undefined;
  return raw.trim();
}

function readEnvNumber(env: NodeJS.ProcessEnv, name: string, field: string): number | undefined {
  const raw = readEnvString(env, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`Invalid ${name}: expected a number, got "${raw}"`, field);
  }
  return Math.floor(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
