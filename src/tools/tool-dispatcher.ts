import { logger, type ModuleLogger } from '../core/logger.js';
import type { RegistrySnapshot, ResolvedTool } from '../plugins/types.js';
import {
  JsonRpcError,
  JsonRpcErrorCode,
  errorResponse,
  isRecord,
  parseRequestEnvelope,
  parseToolCallParams,
  successResponse,
  type JsonRpcId,
  type JsonRpcResponse,
  type ToolCallResult,
} from '../protocol/json-rpc.js';
import { encodeArguments } from './argument-encoder.js';
import { buildManifest } from './manifest-builder.js';
import { runSpawnCommand, type CommandRunner, type SpawnRunnerOutput } from './spawn-runner.js';

export interface ToolSource {
  lookup(qualifiedName: string): ResolvedTool | undefined;
  snapshot(): RegistrySnapshot;
}

export interface ToolDispatcherOptions {
  timeoutMs: number;
  killGraceMs: number;
  maxOutputBytes: number;
  logger?: ModuleLogger;
  runner?: CommandRunner;
}

const STDERR_EXCERPT_LIMIT = 500;

type ParsedStdout =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; reason: string };

/**
 * Routes `/message` requests. Every call spawns its own child, so calls to the
 * same tool run in parallel.
 */
export class ToolDispatcher {
  private readonly runner: CommandRunner;
  private readonly log: ModuleLogger;

  constructor(
    private readonly tools: ToolSource,
    private readonly options: ToolDispatcherOptions,
  ) {
    this.runner = options.runner ?? runSpawnCommand;
    this.log = options.logger ?? logger.module('ToolDispatcher');
  }

  async dispatch(body: unknown): Promise<JsonRpcResponse> {
    try {
      const request = parseRequestEnvelope(body);
      switch (request.method) {
        case 'tools/call':
          return await this.callTool(request.id, request.params);
        case 'tools/list':
          return successResponse(request.id, buildManifest(this.tools.snapshot()));
        default:
          throw new JsonRpcError(
            JsonRpcErrorCode.InvalidRequest,
            `Unsupported method: ${request.method}`,
            request.id,
          );
      }
    } catch (error) {
      if (error instanceof JsonRpcError) return error.toResponse();
      const message = error instanceof Error ? error.message : String(error);
      this.log.error('Unexpected dispatch failure', error instanceof Error ? error : undefined, { message });
      return errorResponse(recoverId(body), JsonRpcErrorCode.InternalError, `Internal error: ${message}`);
    }
  }

  private async callTool(id: JsonRpcId, rawParams: unknown): Promise<JsonRpcResponse<ToolCallResult>> {
    const params = parseToolCallParams(rawParams, id);
    const tool = this.tools.lookup(params.name);
    if (!tool) {
      throw new JsonRpcError(JsonRpcErrorCode.MethodNotFound, `Tool not found: ${params.name}`, id);
    }

    const argv = encodeArguments(tool.command, params.arguments);
    const startedAt = Date.now();
    let output: SpawnRunnerOutput;
    try {
      output = await this.runner({
        commandArray: [...tool.plugin.invocation, tool.command.name, ...argv],
        cwd: tool.plugin.cwd,
        timeoutMs: this.options.timeoutMs,
        killGraceMs: this.options.killGraceMs,
        maxOutputBytes: this.options.maxOutputBytes,
        env: {
          TOOLGATE_TOOL: tool.qualifiedName,
          PYTHONUNBUFFERED: '1',
        },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.warn('Tool call failed to start', { tool: tool.qualifiedName, error: message });
      throw new JsonRpcError(JsonRpcErrorCode.InternalError, `Failed to start ${tool.qualifiedName}: ${message}`, id);
    }

    const response = this.mapOutput(id, tool, output);
    const outcome = 'error' in response ? 'error' : 'ok';
    this.log.info('Tool call finished', {
      tool: tool.qualifiedName,
      outcome,
      exitCode: output.exitCode,
      timedOut: output.timedOut,
      truncated: output.truncated,
      durationMs: Date.now() - startedAt,
    });
    return response;
  }

  private mapOutput(id: JsonRpcId, tool: ResolvedTool, output: SpawnRunnerOutput): JsonRpcResponse<ToolCallResult> {
    if (output.timedOut) {
      return errorResponse(
        id,
        JsonRpcErrorCode.InternalError,
        `Tool ${tool.qualifiedName} timed out after ${this.options.timeoutMs}ms`,
      );
    }

    const parsed = parseStdout(output.stdout);
    if (parsed.ok && 'error' in parsed.value) {
      return errorResponse(id, JsonRpcErrorCode.InternalError, stringifyText(parsed.value.error));
    }

    if (output.exitCode !== 0) {
      const excerpt = output.stderr.trim().slice(0, STDERR_EXCERPT_LIMIT);
      return errorResponse(
        id,
        JsonRpcErrorCode.InternalError,
        `Tool ${tool.qualifiedName} exited with code ${output.exitCode}${excerpt ? `: ${excerpt}` : ''}`,
      );
    }

    if (!parsed.ok) {
      return errorResponse(
        id,
        JsonRpcErrorCode.InternalError,
        `Tool ${tool.qualifiedName} returned invalid output: ${parsed.reason}`,
      );
    }

    const payload = 'result' in parsed.value ? parsed.value.result : parsed.value;
    return successResponse(id, { content: [{ type: 'text', text: stringifyText(payload) }] });
  }
}

/** Whole stdout as JSON, falling back to its last non-empty line. */
export function parseStdout(stdout: string): ParsedStdout {
  const trimmed = stdout.trim();
  if (trimmed.length === 0) return { ok: false, reason: 'empty stdout' };

  const attempts = [trimmed];
  const lines = trimmed.split(/\r?\n/).filter((line) => line.trim().length > 0);
  const lastLine = lines[lines.length - 1];
  if (lines.length > 1 && lastLine !== undefined) attempts.push(lastLine.trim());

  let reason = 'stdout is not JSON';
  for (const candidate of attempts) {
    try {
      const value: unknown = JSON.parse(candidate);
      if (isRecord(value)) return { ok: true, value };
      reason = 'stdout JSON is not an object';
    } catch (error) {
      reason = error instanceof Error ? error.message : String(error);
    }
  }
  return { ok: false, reason };
}

function stringifyText(value: unknown): string {
  if (typeof value === 'string') return value;
  const encoded = JSON.stringify(value);
  return encoded === undefined ? String(value) : encoded;
}

function recoverId(body: unknown): JsonRpcId | null {
  if (!isRecord(body)) return null;
  return typeof body.id === 'string' || typeof body.id === 'number' ? body.id : null;
}
