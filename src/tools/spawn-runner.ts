import { spawn, type ChildProcess } from 'child_process';

export interface SpawnRunnerInput {
  commandArray: readonly string[];
  cwd: string;
  timeoutMs: number;
  env?: Record<string, string>;
  /** Bytes kept per stream; the rest is dropped and `truncated` is set. */
  maxOutputBytes?: number;
  /** Delay between SIGTERM and SIGKILL once the timeout fires. */
  killGraceMs?: number;
}

export interface SpawnRunnerOutput {
  exitCode: number;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  truncated: boolean;
  durationMs: number;
}

export type CommandRunner = (input: SpawnRunnerInput) => Promise<SpawnRunnerOutput>;

const DEFAULT_MAX_OUTPUT_BYTES = 4 * 1024 * 1024;
const DEFAULT_KILL_GRACE_MS = 2_000;

class BoundedBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer | string): void {
    const buffer = Buffer.from(chunk);
    const room = this.limit - this.size;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    if (buffer.length > room) {
      this.chunks.push(buffer.subarray(0, room));
      this.size += room;
      this.truncated = true;
      return;
    }
    this.chunks.push(buffer);
    this.size += buffer.length;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf-8');
  }
}

/**
 * Signals the child's whole process group so grandchildren started by an
 * interpreter die with it. Falls back to the child alone where groups are
 * unavailable or already gone.
 */
function killProcessTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid !== undefined && process.platform !== 'win32') {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch (error) {
      if (!isErrnoException(error) || (error.code !== 'ESRCH' && error.code !== 'EPERM')) throw error;
    }
  }
  child.kill(signal);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export async function runSpawnCommand(input: SpawnRunnerInput): Promise<SpawnRunnerOutput> {
  const [program, ...args] = input.commandArray;
  if (!program) {
    throw new Error('runSpawnCommand requires a non-empty commandArray');
  }
  const startAt = Date.now();
  const limit = input.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
  const killGraceMs = input.killGraceMs ?? DEFAULT_KILL_GRACE_MS;

  return new Promise<SpawnRunnerOutput>((resolve, reject) => {
    const child = spawn(program, args, {
      cwd: input.cwd,
      env: {
        ...process.env,
        ...(input.env ?? {}),
      },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: process.platform !== 'win32',
    });

    const stdout = new BoundedBuffer(limit);
    const stderr = new BoundedBuffer(limit);
    let timedOut = false;
    let settled = false;
    let exitSignal: NodeJS.Signals | null = null;
    let exitCode: number | null = null;
    let killTimer: NodeJS.Timeout | undefined;
    let settleTimer: NodeJS.Timeout | undefined;

    const clearTimers = (): void => {
      clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      if (settleTimer) clearTimeout(settleTimer);
    };

    const finish = (code: number | null, signal: NodeJS.Signals | null): void => {
      if (settled) return;
      settled = true;
      clearTimers();
      // A process outside the group may still hold the pipes open.
      child.stdout.destroy();
      child.stderr.destroy();
      resolve({
        exitCode: code === null ? -1 : code,
        signal,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        timedOut,
        truncated: stdout.truncated || stderr.truncated,
        durationMs: Date.now() - startAt,
      });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killProcessTree(child, 'SIGTERM');
      killTimer = setTimeout(() => {
        killProcessTree(child, 'SIGKILL');
        settleTimer = setTimeout(() => {
          finish(exitCode, exitSignal ?? 'SIGKILL');
        }, killGraceMs);
      }, killGraceMs);
    }, input.timeoutMs);

    child.stdout.on('data', (chunk: Buffer | string) => {
      stdout.push(chunk);
    });

    child.stderr.on('data', (chunk: Buffer | string) => {
      stderr.push(chunk);
    });

    child.on('error', (error) => {
      if (settled) return;
      settled = true;
      clearTimers();
      reject(error);
    });

    child.on('exit', (code, signal) => {
      exitCode = code;
      exitSignal = signal;
      if (timedOut) finish(code, signal);
    });

    child.on('close', (code, signal) => {
      finish(code, signal);
    });
  });
}
