import { describe, it, expect } from 'vitest';
import { createEmptySnapshot } from '../../../src/plugins/plugin-registry.js';
import type { Plugin, RegistrySnapshot, ResolvedTool } from '../../../src/plugins/types.js';
import type { JsonRpcResponse } from '../../../src/protocol/json-rpc.js';
import type { SpawnRunnerInput, SpawnRunnerOutput } from '../../../src/tools/spawn-runner.js';
import { ToolDispatcher, parseStdout, type ToolSource } from '../../../src/tools/tool-dispatcher.js';

const demoPlugin: Plugin = {
  name: 'demo',
  executablePath: '/plugins/demo/cli.mjs',
  invocation: ['node', '/plugins/demo/cli.mjs'],
  cwd: '/plugins/demo',
  description: 'Demo plugin',
  commands: [
    {
      name: 'run',
      description: 'Run the demo',
      parameters: [{ name: 'count', type: 'number', required: true, kind: 'option', flag: '--count' }],
    },
  ],
};

function toolSource(): ToolSource {
  const tools = new Map<string, ResolvedTool>();
  tools.set('demo.run', { qualifiedName: 'demo.run', plugin: demoPlugin, command: demoPlugin.commands[0] });
  const snapshot: RegistrySnapshot = { ...createEmptySnapshot('/plugins'), plugins: [demoPlugin], tools };
  return {
    lookup: (name) => tools.get(name),
    snapshot: () => snapshot,
  };
}

function output(partial: Partial<SpawnRunnerOutput>): SpawnRunnerOutput {
  return {
    exitCode: 0,
    signal: null,
    stdout: '',
    stderr: '',
    timedOut: false,
    truncated: false,
    durationMs: 5,
    ...partial,
  };
}

function dispatcherWith(result: Partial<SpawnRunnerOutput>, calls: SpawnRunnerInput[] = []): ToolDispatcher {
  return new ToolDispatcher(toolSource(), {
    timeoutMs: 1_000,
    killGraceMs: 100,
    maxOutputBytes: 1024,
    runner: async (input) => {
      calls.push(input);
      return output(result);
    },
  });
}

function call(name: string, args: Record<string, unknown> = {}, id: string | number = 1): unknown {
  return { jsonrpc: '2.0', id, method: 'tools/call', params: { name, arguments: args } };
}

function errorOf(response: JsonRpcResponse): { code: number; message: string } {
  if (!('error' in response)) throw new Error(`expected an error response, got ${JSON.stringify(response)}`);
  return { code: response.error.code, message: response.error.message };
}

describe('ToolDispatcher', () => {
  describe('request validation', () => {
    it('answers a non-object body with -32600 and a null id', async () => {
      const response = await dispatcherWith({}).dispatch('hello');
      expect(response.id).toBeNull();
      expect(errorOf(response).code).toBe(-32600);
    });

    it('answers an unsupported method with -32600', async () => {
      const response = await dispatcherWith({}).dispatch({ jsonrpc: '2.0', id: 4, method: 'resources/list' });
      expect(response.id).toBe(4);
      expect(errorOf(response)).toEqual({ code: -32600, message: 'Unsupported method: resources/list' });
    });

    it('answers bad params with -32602', async () => {
      const response = await dispatcherWith({}).dispatch({ jsonrpc: '2.0', id: 2, method: 'tools/call', params: {} });
      expect(errorOf(response).code).toBe(-32602);
    });

    it('answers an unknown tool with -32601', async () => {
      const calls: SpawnRunnerInput[] = [];
      const response = await dispatcherWith({}, calls).dispatch(call('demo.missing'));
      expect(errorOf(response)).toEqual({ code: -32601, message: 'Tool not found: demo.missing' });
      expect(calls).toHaveLength(0);
    });
  });

  it('lists the manifest for tools/list', async () => {
    const response = await dispatcherWith({}).dispatch({ jsonrpc: '2.0', id: 'l', method: 'tools/list' });
    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 'l',
      result: {
        tools: [
          {
            name: 'demo.run',
            description: 'Run the demo',
            inputSchema: { type: 'object', properties: { count: { type: 'number' } }, required: ['count'] },
          },
        ],
      },
    });
  });

  it('spawns the plugin with the encoded command line', async () => {
    const calls: SpawnRunnerInput[] = [];
    await dispatcherWith({ stdout: '{"result":"ok"}' }, calls).dispatch(call('demo.run', { count: 2 }));

    expect(calls).toHaveLength(1);
    expect(calls[0].commandArray).toEqual(['node', '/plugins/demo/cli.mjs', 'run', '--count=2']);
    expect(calls[0].cwd).toBe('/plugins/demo');
    expect(calls[0].timeoutMs).toBe(1_000);
    expect(calls[0].maxOutputBytes).toBe(1024);
    expect(calls[0].env?.TOOLGATE_TOOL).toBe('demo.run');
  });

  it('forwards calls that omit required arguments', async () => {
    const calls: SpawnRunnerInput[] = [];
    await dispatcherWith({ stdout: '{"result":"ok"}' }, calls).dispatch(call('demo.run'));
    expect(calls[0].commandArray).toEqual(['node', '/plugins/demo/cli.mjs', 'run']);
  });

  describe('result mapping', () => {
    it('wraps a string result as text content', async () => {
      const response = await dispatcherWith({ stdout: '{"result": "done"}\n' }).dispatch(call('demo.run', {}, 9));
      expect(response).toEqual({ jsonrpc: '2.0', id: 9, result: { content: [{ type: 'text', text: 'done' }] } });
    });

    it('JSON-encodes a non-string result', async () => {
      const response = await dispatcherWith({ stdout: '{"result": {"a": 1}}' }).dispatch(call('demo.run'));
      expect(response).toMatchObject({ result: { content: [{ type: 'text', text: '{"a":1}' }] } });
    });

    it('uses the whole object when there is no result key', async () => {
      const response = await dispatcherWith({ stdout: '{"status": "ok"}' }).dispatch(call('demo.run'));
      expect(response).toMatchObject({ result: { content: [{ type: 'text', text: '{"status":"ok"}' }] } });
    });

    it('reads the last line when earlier lines are not JSON', async () => {
      const response = await dispatcherWith({ stdout: 'warming up\n{"result":"x"}\n' }).dispatch(call('demo.run'));
      expect(response).toMatchObject({ result: { content: [{ type: 'text', text: 'x' }] } });
    });

    it('maps an error key to -32603 with the plugin text, whatever the exit code', async () => {
      const stdout = '{"error": "This is a test error"}';
      for (const exitCode of [0, 1]) {
        const response = await dispatcherWith({ stdout, exitCode }).dispatch(call('demo.run'));
        expect(errorOf(response)).toEqual({ code: -32603, message: 'This is a test error' });
      }
    });

    it('reports a non-zero exit with the stderr excerpt', async () => {
      const response = await dispatcherWith({ exitCode: 2, stderr: 'boom\n' }).dispatch(call('demo.run'));
      expect(errorOf(response)).toEqual({ code: -32603, message: 'Tool demo.run exited with code 2: boom' });
    });

    it('reports stdout that is not a JSON object', async () => {
      const response = await dispatcherWith({ stdout: '[1,2]' }).dispatch(call('demo.run'));
      expect(errorOf(response)).toEqual({
        code: -32603,
        message: 'Tool demo.run returned invalid output: stdout JSON is not an object',
      });
    });

    it('reports a timeout', async () => {
      const response = await dispatcherWith({ exitCode: -1, timedOut: true, signal: 'SIGTERM' }).dispatch(
        call('demo.run'),
      );
      expect(errorOf(response)).toEqual({ code: -32603, message: 'Tool demo.run timed out after 1000ms' });
    });

    it('reports a spawn failure', async () => {
      const dispatcher = new ToolDispatcher(toolSource(), {
        timeoutMs: 1_000,
        killGraceMs: 100,
        maxOutputBytes: 1024,
        runner: async () => {
          throw new Error('spawn node ENOENT');
        },
      });
      const response = await dispatcher.dispatch(call('demo.run'));
      expect(errorOf(response)).toEqual({ code: -32603, message: 'Failed to start demo.run: spawn node ENOENT' });
    });
  });

  it('runs calls to the same tool concurrently', async () => {
    const release: Array<() => void> = [];
    const dispatcher = new ToolDispatcher(toolSource(), {
      timeoutMs: 1_000,
      killGraceMs: 100,
      maxOutputBytes: 1024,
      runner: (input) =>
        new Promise<SpawnRunnerOutput>((resolve) => {
          release.push(() => resolve(output({ stdout: JSON.stringify({ result: input.commandArray.join(' ') }) })));
        }),
    });

    const pending = [1, 2, 3, 4, 5].map((count) => dispatcher.dispatch(call('demo.run', { count }, count)));
    expect(release).toHaveLength(5);
    release.forEach((resolve) => resolve());

    const responses = await Promise.all(pending);
    expect(responses.map((response) => response.id)).toEqual([1, 2, 3, 4, 5]);
    expect(responses[4]).toMatchObject({
      result: { content: [{ type: 'text', text: 'node /plugins/demo/cli.mjs run --count=5' }] },
    });
  });
});

describe('parseStdout', () => {
  it('reports empty output', () => {
    expect(parseStdout('  \n')).toEqual({ ok: false, reason: 'empty stdout' });
  });
});
