import type { Command } from 'commander';
import { GatewayFacade } from '../gateway/gateway-facade.js';
import { isErrorResponse, isRecord } from '../protocol/json-rpc.js';
import type { ToolManifest } from '../tools/manifest-builder.js';
import { ExitCode, ToolgateError } from './errors.js';
import { resolveCliConfig, type CommonCliOptions } from './options.js';

interface ToolsListOptions extends CommonCliOptions {
  json?: boolean;
}

interface ToolCallOptions extends CommonCliOptions {
  args?: string;
}

export function registerToolCommands(program: Command): void {
  program
    .command('tools')
    .description('Scan the plugins directory and print the tool manifest')
    .option('-d, --plugins-dir <dir>', 'Directory scanned for plugins')
    .option('-c, --config <file>', 'YAML config file')
    .option('--json', 'Print the manifest as JSON')
    .action(async (options: ToolsListOptions) => {
      const config = resolveCliConfig(options);
      const gateway = new GatewayFacade(config);
      const snapshot = await gateway.registry.scan(config.plugins.dir);
      const manifest = gateway.listTools();

      if (options.json) {
        console.log(JSON.stringify(manifest, null, 2));
      } else {
        console.log(formatToolList(manifest));
      }
      for (const failure of snapshot.failures) {
        console.error(`skipped ${failure.plugin} (${failure.code}): ${failure.message}`);
      }
    });

  program
    .command('call')
    .description('Run one tool call locally and print the JSON-RPC response')
    .argument('<tool>', 'Qualified tool name, e.g. plugin.command')
    .option('-a, --args <json>', 'Tool arguments as a JSON object', '{}')
    .option('-d, --plugins-dir <dir>', 'Directory scanned for plugins')
    .option('-c, --config <file>', 'YAML config file')
    .action(async (tool: string, options: ToolCallOptions) => {
      const toolArguments = parseArgsOption(options.args ?? '{}');
      const config = resolveCliConfig(options);
      const gateway = new GatewayFacade(config);
      await gateway.registry.scan(config.plugins.dir);

      const response = await gateway.onMessage({
        jsonrpc: '2.0',
        id: 1,
        method: 'tools/call',
        params: { name: tool, arguments: toolArguments },
      });
      console.log(JSON.stringify(response, null, 2));
      if (isErrorResponse(response)) {
        process.exitCode = ExitCode.TASK_FAILED;
      }
    });
}

export function parseArgsOption(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ToolgateError(`--args is not valid JSON: ${message}`, ExitCode.INVALID_ARGS);
  }
  if (!isRecord(parsed)) {
    throw new ToolgateError('--args must be a JSON object', ExitCode.INVALID_ARGS);
  }
  return parsed;
}

export function formatToolList(manifest: ToolManifest): string {
  if (manifest.tools.length === 0) return 'No tools found.';

  const width = Math.max(...manifest.tools.map((tool) => tool.name.length));
  const lines: string[] = [];
  for (const tool of manifest.tools) {
    lines.push(`${tool.name.padEnd(width)}  ${tool.description}`);
    for (const [name, property] of Object.entries(tool.inputSchema.properties)) {
      const required = tool.inputSchema.required.includes(name) ? ' (required)' : '';
      lines.push(`  --${name} <${property.type ?? 'any'}>${required}`);
    }
  }
  return lines.join('\n');
}
