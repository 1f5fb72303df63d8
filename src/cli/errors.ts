/**
 * CLI exit codes and error reporting
 */

import { ConfigError } from '../core/config-loader.js';

export enum ExitCode {
  SUCCESS = 0,
  GENERAL_ERROR = 1,
  INVALID_ARGS = 2,
  TASK_FAILED = 5,
}

export class ToolgateError extends Error {
  constructor(
    message: string,
    public code: ExitCode
  ) {
    super(message);
    this.name = 'ToolgateError';
  }
}

export function toExitCode(error: unknown): ExitCode {
  if (error instanceof ToolgateError) return error.code;
  if (error instanceof ConfigError) return ExitCode.INVALID_ARGS;
  return ExitCode.GENERAL_ERROR;
}

export function exitWithError(error: unknown): never {
  if (error instanceof ToolgateError) {
    console.error(`Error: ${error.message}`);
  } else if (error instanceof ConfigError) {
    console.error(`Config error (${error.field}): ${error.message}`);
  } else {
    console.error('Unexpected error:', error);
  }
  process.exit(toExitCode(error));
}
