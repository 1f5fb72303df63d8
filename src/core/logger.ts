/**
 * toolgate logger
 *
 * - console: human-readable lines on stderr (stdout stays free for CLI output)
 * - file: structured JSONL, one entry per line, rotated by size and by day
 */

import { appendFileSync, existsSync, mkdirSync, readdirSync, renameSync, statSync, unlinkSync } from 'fs';
import { join } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogEntry {
  timestamp: {
    utc: string;
    local: string;
    tz: string;
    nowMs: number;
  };
  level: LogLevel;
  module: string;
  message: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  logDir?: string;
  maxFileSizeMB: number;
  maxFiles: number;
  level: LogLevel;
  enableConsole: boolean;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

const COLOR_RESET = '\x1b[0m';

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveDefaultConfig(): LoggerConfig {
  const envLevel = process.env.TOOLGATE_LOG_LEVEL?.trim().toLowerCase();
  const envDir = process.env.TOOLGATE_LOG_DIR?.trim();
  return {
    logDir: envDir && envDir.length > 0 ? envDir : undefined,
    maxFileSizeMB: 10,
    maxFiles: 30,
    level: isLogLevel(envLevel) ? envLevel : 'info',
    enableConsole: true,
  };
}

export class ToolgateLogger {
  private config: LoggerConfig;
  private currentLogFile: string | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...resolveDefaultConfig(), ...config };
    this.prepareLogDir();
  }

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
    this.currentLogFile = null;
    this.prepareLogDir();
  }

  get level(): LogLevel {
    return this.config.level;
  }

  get logFile(): string | null {
    return this.config.logDir ? this.getLogFileName() : null;
  }

  log(level: LogLevel, module: string, message: string, data?: Record<string, unknown>, error?: Error): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const now = new Date();
    const entry: LogEntry = {
      timestamp: {
        utc: now.toISOString(),
        local: now.toLocaleString(),
        tz: Intl.DateTimeFormat().resolvedOptions().timeZone,
        nowMs: now.getTime(),
      },
      level,
      module,
      message,
      data,
    };

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    if (this.config.logDir) {
      this.logToFile(JSON.stringify(entry));
    }

    if (this.config.enableConsole) {
      this.logToConsole(entry);
    }
  }

  debug(module: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', module, message, data);
  }

  info(module: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', module, message, data);
  }

  warn(module: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', module, message, data);
  }

  error(module: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log('error', module, message, data, error);
  }

  fatal(module: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log('fatal', module, message, data, error);
  }

  module(moduleName: string): ModuleLogger {
    return new ModuleLogger(this, moduleName);
  }

  cleanup(): void {
    const files = this.getLogFiles();

    if (files.length > this.config.maxFiles) {
      const toDelete = files.slice(0, files.length - this.config.maxFiles);
      for (const file of toDelete) {
        try {
          unlinkSync(file);
        } catch (err) {
          console.error(`Failed to remove old log file ${file}:`, err);
        }
      }
    }
  }

  private prepareLogDir(): void {
    const dir = this.config.logDir;
    if (!dir || existsSync(dir)) return;
    try {
      mkdirSync(dir, { recursive: true });
    } catch (err) {
      console.error(`Failed to create log directory ${dir}, file logging disabled:`, err);
      this.config.logDir = undefined;
    }
  }

  private getLogFileName(): string {
    const date = new Date().toISOString().split('T')[0];
    return join(this.config.logDir ?? '.', `toolgate-${date}.log`);
  }

  private logToFile(line: string): void {
    try {
      const todayFile = this.getLogFileName();
      if (todayFile !== this.currentLogFile) {
        this.currentLogFile = todayFile;
        this.cleanup();
      }

      if (existsSync(todayFile)) {
        const sizeMB = statSync(todayFile).size / (1024 * 1024);
        if (sizeMB >= this.config.maxFileSizeMB) {
          this.rotateLog(todayFile);
        }
      }

      appendFileSync(todayFile, line + '\n', 'utf-8');
    } catch (err) {
      console.error('Failed to write log file:', err);
    }
  }

  private rotateLog(file: string): void {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    try {
      renameSync(file, file.replace(/\.log$/, `-${timestamp}.log`));
    } catch (err) {
      console.error(`Failed to rotate log file ${file}:`, err);
    }
  }

  private logToConsole(entry: LogEntry): void {
    const ts = `${LEVEL_COLOR[entry.level]}[${entry.timestamp.utc}]${COLOR_RESET}`;
    console.error(`${ts} [${entry.level.toUpperCase()}] [${entry.module}] ${entry.message}`);

    if (entry.data && Object.keys(entry.data).length > 0) {
      console.error(`  → data: ${JSON.stringify(entry.data)}`);
    }

    if (entry.error) {
      console.error(`  → error: ${entry.error.name}: ${entry.error.message}`);
      if (entry.error.stack) {
        const stackLines = entry.error.stack.split('\n').slice(1, 4);
        stackLines.forEach((line) => console.error(`    ${line.trim()}`));
      }
    }
  }

  private getLogFiles(): string[] {
    const dir = this.config.logDir;
    if (!dir || !existsSync(dir)) return [];
    return readdirSync(dir)
      .filter((entry) => entry.startsWith('toolgate-') && entry.endsWith('.log'))
      .map((entry) => join(dir, entry))
      .sort();
  }
}

export class ModuleLogger {
  constructor(private logger: ToolgateLogger, private moduleName: string) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.logger.debug(this.moduleName, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.logger.info(this.moduleName, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.logger.warn(this.moduleName, message, data);
  }

  error(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.logger.error(this.moduleName, message, error, data);
  }

  fatal(message: string, error?: Error, data?: Record<string, unknown>): void {
    this.logger.fatal(this.moduleName, message, error, data);
  }
}

export const logger = new ToolgateLogger();
