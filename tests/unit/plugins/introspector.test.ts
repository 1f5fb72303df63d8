import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmodSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { defaultInterpreters } from '../../../src/core/config-loader.js';
import { PluginIntrospector } from '../../../src/plugins/introspector.js';
import { IntrospectionError } from '../../../src/plugins/types.js';
import type { SpawnRunnerInput, SpawnRunnerOutput } from '../../../src/tools/spawn-runner.js';
import {
  cleanupTempDir,
  createTempDir,
  workflowPlugin,
  writeFixturePlugin,
} from '../../_helpers/plugin-fixtures.js';

function output(partial: Partial<SpawnRunnerOutput>): SpawnRunnerOutput {
  return {
    exitCode: 0,
    signal: null,
    stdout: '',
    stderr: '',
    timedOut: false,
    truncated: false,
    durationMs: 1,
    ...partial,
  };
}

async function expectIntrospectionError(promise: Promise<unknown>, code: IntrospectionError['code']): Promise<void> {
  const error = await promise.then(
    () => null,
    (reason: unknown) => reason,
  );
  expect(error).toBeInstanceOf(IntrospectionError);
  if (error instanceof IntrospectionError) {
    expect(error.code).toBe(code);
  }
}

describe('PluginIntrospector', () => {
  let pluginsDir: string;
  const introspector = new PluginIntrospector({ interpreters: defaultInterpreters(), timeoutMs: 10_000 });

  beforeEach(() => {
    pluginsDir = createTempDir('toolgate-introspect-');
  });

  afterEach(() => {
    cleanupTempDir(pluginsDir);
  });

  it('builds a plugin from --help output of a real executable', async () => {
    const executablePath = writeFixturePlugin(pluginsDir, 'workflow_test_plugin', workflowPlugin());

    const plugin = await introspector.introspect({ name: 'workflow_test_plugin', executablePath });

    expect(plugin.name).toBe('workflow_test_plugin');
    expect(plugin.description).toBe('Test workflow plugin');
    expect(plugin.invocation).toEqual([process.execPath, executablePath]);
    expect(plugin.cwd).toBe(dirname(executablePath));
    expect(plugin.commands).toEqual([
      {
        name: 'workflow-command',
        description: 'Run the workflow',
        parameters: [
          {
            name: 'param',
            type: 'string',
            required: false,
            kind: 'option',
            flag: '--param',
            description: 'Parameter for workflow',
          },
        ],
      },
    ]);
  });

  it('fails with not_found for a missing executable', async () => {
    await expectIntrospectionError(
      introspector.introspect({ name: 'ghost', executablePath: join(pluginsDir, 'ghost', 'cli.py') }),
      'not_found',
    );
  });

  it('fails with not_executable for a file without interpreter or execute bit', async () => {
    const filePath = join(pluginsDir, 'tool.bin');
    writeFileSync(filePath, 'not a program');
    chmodSync(filePath, 0o644);
    await expectIntrospectionError(introspector.introspect({ name: 'tool', executablePath: filePath }), 'not_executable');
  });

  it('fails with help_failed when --help exits non-zero', async () => {
    const definition = { ...workflowPlugin(), helpExitCode: 3 };
    const executablePath = writeFixturePlugin(pluginsDir, 'broken', definition);
    await expectIntrospectionError(introspector.introspect({ name: 'broken', executablePath }), 'help_failed');
  });

  it('fails with unparsable when no commands are declared', async () => {
    const executablePath = writeFixturePlugin(pluginsDir, 'empty', { description: 'Nothing here', commands: {} });
    await expectIntrospectionError(introspector.introspect({ name: 'empty', executablePath }), 'unparsable');
  });

  it('fails with timeout when the runner reports one', async () => {
    const executablePath = writeFixturePlugin(pluginsDir, 'slow', workflowPlugin());
    const slow = new PluginIntrospector({
      interpreters: defaultInterpreters(),
      timeoutMs: 50,
      runner: async () => output({ exitCode: -1, timedOut: true }),
    });
    await expectIntrospectionError(slow.introspect({ name: 'slow', executablePath }), 'timeout');
  });

  it('only runs --help invocations', async () => {
    const executablePath = writeFixturePlugin(pluginsDir, 'workflow_test_plugin', workflowPlugin());
    const calls: string[][] = [];
    const recording = new PluginIntrospector({
      interpreters: defaultInterpreters(),
      timeoutMs: 1_000,
      runner: async (input: SpawnRunnerInput) => {
        calls.push(input.commandArray.slice(2));
        if (input.commandArray.length === 3) {
          return output({ stdout: 'usage: cli.py [-h] {one,two} ...\n' });
        }
        return output({ stdout: `usage: cli.py ${input.commandArray[2]} [-h]\n` });
      },
    });

    const plugin = await recording.introspect({ name: 'workflow_test_plugin', executablePath });

    expect(plugin.commands.map((command) => command.name)).toEqual(['one', 'two']);
    expect(calls).toEqual([['--help'], ['one', '--help'], ['two', '--help']]);
  });

  it('treats files with a known extension or execute bit as runnable', async () => {
    const script = join(pluginsDir, 'tool.mjs');
    const notes = join(pluginsDir, 'notes.txt');
    const binary = join(pluginsDir, 'tool');
    writeFileSync(script, '');
    writeFileSync(notes, '');
    writeFileSync(binary, '#!/bin/sh\n');
    chmodSync(notes, 0o644);
    chmodSync(binary, 0o755);

    expect(await introspector.isRunnable(script)).toBe(true);
    expect(await introspector.isRunnable(notes)).toBe(false);
    expect(await introspector.isRunnable(binary)).toBe(true);
  });
});
