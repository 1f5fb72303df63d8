import { describe, it, expect } from 'vitest';
import { runSpawnCommand } from '../../../src/tools/spawn-runner.js';

const node = process.execPath;
const cwd = process.cwd();

describe('runSpawnCommand', () => {
  it('captures stdout and the exit code', async () => {
    const result = await runSpawnCommand({
      commandArray: [node, '-e', 'process.stdout.write("hi"); process.stderr.write("warn"); process.exit(3)'],
      cwd,
      timeoutMs: 10_000,
    });
    expect(result.stdout).toBe('hi');
    expect(result.stderr).toBe('warn');
    expect(result.exitCode).toBe(3);
    expect(result.timedOut).toBe(false);
    expect(result.truncated).toBe(false);
  });

  it('passes extra environment variables to the child', async () => {
    const result = await runSpawnCommand({
      commandArray: [node, '-e', 'process.stdout.write(process.env.TOOLGATE_TOOL ?? "")'],
      cwd,
      timeoutMs: 10_000,
      env: { TOOLGATE_TOOL: 'demo.run' },
    });
    expect(result.stdout).toBe('demo.run');
  });

  it('truncates output past maxOutputBytes', async () => {
    const result = await runSpawnCommand({
      commandArray: [node, '-e', 'process.stdout.write("x".repeat(100))'],
      cwd,
      timeoutMs: 10_000,
      maxOutputBytes: 10,
    });
    expect(result.stdout).toBe('xxxxxxxxxx');
    expect(result.truncated).toBe(true);
  });

  it('terminates a child that outlives the timeout', async () => {
    const result = await runSpawnCommand({
      commandArray: [node, '-e', 'setTimeout(() => {}, 20000)'],
      cwd,
      timeoutMs: 300,
    });
    expect(result.timedOut).toBe(true);
    expect(result.signal).toBe('SIGTERM');
    expect(result.exitCode).toBe(-1);
  });

  it('escalates to SIGKILL when SIGTERM is ignored', async () => {
    const result = await runSpawnCommand({
      commandArray: [node, '-e', 'process.on("SIGTERM", () => {}); setInterval(() => {}, 1000)'],
      cwd,
      timeoutMs: 1_000,
      killGraceMs: 200,
    });
    expect(result.timedOut).toBe(true);
    expect(result.signal).toBe('SIGKILL');
  });

  it('kills grandchildren started by a shell plugin on timeout', async () => {
    const startedAt = Date.now();
    const result = await runSpawnCommand({
      commandArray: ['sh', '-c', 'sleep 6; echo "{}"'],
      cwd,
      timeoutMs: 300,
      killGraceMs: 200,
    });
    expect(result.timedOut).toBe(true);
    expect(result.stdout).toBe('');
    expect(Date.now() - startedAt).toBeLessThan(2_000);
  });

  it('settles on timeout while a detached grandchild still holds stdout', async () => {
    const grandchild = `require("child_process").spawn(process.execPath, ["-e", "setTimeout(() => {}, 3000)"], { detached: true, stdio: ["ignore", "inherit", "inherit"] }); setInterval(() => {}, 1000)`;
    const startedAt = Date.now();
    const result = await runSpawnCommand({
      commandArray: [node, '-e', grandchild],
      cwd,
      timeoutMs: 300,
      killGraceMs: 200,
    });
    expect(result.timedOut).toBe(true);
    expect(result.signal).toBe('SIGTERM');
    expect(Date.now() - startedAt).toBeLessThan(2_000);
  });

  it('rejects when the program cannot be started', async () => {
    await expect(
      runSpawnCommand({ commandArray: ['/nonexistent/toolgate-binary'], cwd, timeoutMs: 1_000 }),
    ).rejects.toThrow(/ENOENT/);
  });

  it('rejects an empty command', async () => {
    await expect(runSpawnCommand({ commandArray: [], cwd, timeoutMs: 1_000 })).rejects.toThrow(
      'runSpawnCommand requires a non-empty commandArray',
    );
  });
});
