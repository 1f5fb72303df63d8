import { constants } from 'fs';
import { access, stat } from 'fs/promises';
import path from 'path';
import { runSpawnCommand, type CommandRunner, type SpawnRunnerOutput } from '../tools/spawn-runner.js';
import { parseCommandNames, parseCommandParameters, parseHelpText } from './help-parser.js';
import { IntrospectionError, type Plugin, type PluginCandidate, type PluginCommand } from './types.js';

export interface PluginIntrospectorOptions {
  interpreters: Record<string, string[]>;
  timeoutMs: number;
  runner?: CommandRunner;
}

const STDERR_EXCERPT_LIMIT = 300;

/**
 * Asks a plugin executable for its command surface. Only `--help` invocations
 * are run; no subcommand logic executes during discovery.
 */
export class PluginIntrospector {
  private readonly interpreters: Record<string, string[]>;
  private readonly timeoutMs: number;
  private readonly runner: CommandRunner;

  constructor(options: PluginIntrospectorOptions) {
    this.interpreters = options.interpreters;
    this.timeoutMs = options.timeoutMs;
    this.runner = options.runner ?? runSpawnCommand;
  }

  async introspect(candidate: PluginCandidate): Promise<Plugin> {
    const invocation = await this.resolveInvocation(candidate.executablePath);
    const cwd = path.dirname(candidate.executablePath);

    const rootHelp = parseHelpText(await this.runHelp(candidate.executablePath, invocation, [], cwd));
    const summaries = parseCommandNames(rootHelp);
    if (summaries.length === 0) {
      throw new IntrospectionError(
        `Plugin ${candidate.name} declares no commands in its --help output`,
        'unparsable',
        candidate.executablePath,
      );
    }

    const commands = await Promise.all(
      summaries.map(async (summary): Promise<PluginCommand> => {
        const commandHelp = parseHelpText(
          await this.runHelp(candidate.executablePath, invocation, [summary.name], cwd),
        );
        return {
          name: summary.name,
          description: summary.description || commandHelp.description,
          parameters: parseCommandParameters(commandHelp),
        };
      }),
    );

    return {
      name: candidate.name,
      executablePath: candidate.executablePath,
      invocation,
      cwd,
      description: rootHelp.description,
      commands,
    };
  }

  /** Whether a bare file in the plugins directory can be run as a plugin at all. */
  async isRunnable(filePath: string): Promise<boolean> {
    if (this.interpreters[path.extname(filePath).toLowerCase()]) return true;
    try {
      await access(filePath, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  /** argv prefix for the executable: the configured interpreter, or the file itself when it is executable. */
  async resolveInvocation(executablePath: string): Promise<string[]> {
    let isFile: boolean;
    try {
      isFile = (await stat(executablePath)).isFile();
    } catch {
      throw new IntrospectionError(`Plugin executable not found: ${executablePath}`, 'not_found', executablePath);
    }
    if (!isFile) {
      throw new IntrospectionError(`Plugin executable is not a file: ${executablePath}`, 'not_executable', executablePath);
    }

    const interpreter = this.interpreters[path.extname(executablePath).toLowerCase()];
    if (interpreter && interpreter.length > 0) {
      return [...interpreter, executablePath];
    }

    try {
      await access(executablePath, constants.X_OK);
    } catch {
      throw new IntrospectionError(
        `Plugin file is not executable and has no interpreter configured: ${executablePath}`,
        'not_executable',
        executablePath,
      );
    }
    return [executablePath];
  }

  private async runHelp(executablePath: string, invocation: string[], prefix: string[], cwd: string): Promise<string> {
    const args = [...prefix, '--help'];
    const label = [path.basename(executablePath), ...args].join(' ');

    let output: SpawnRunnerOutput;
    try {
      output = await this.runner({ commandArray: [...invocation, ...args], cwd, timeoutMs: this.timeoutMs });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new IntrospectionError(`Failed to run "${label}": ${message}`, 'help_failed', executablePath);
    }

    if (output.timedOut) {
      throw new IntrospectionError(`"${label}" timed out after ${this.timeoutMs}ms`, 'timeout', executablePath);
    }
    if (output.exitCode !== 0) {
      const excerpt = output.stderr.trim().slice(0, STDERR_EXCERPT_LIMIT);
      throw new IntrospectionError(
        `"${label}" exited with code ${output.exitCode}${excerpt ? `: ${excerpt}` : ''}`,
        'help_failed',
        executablePath,
      );
    }

    const text = output.stdout.trim().length > 0 ? output.stdout : output.stderr;
    if (text.trim().length === 0) {
      throw new IntrospectionError(`"${label}" printed no help text`, 'unparsable', executablePath);
    }
    return text;
  }
}
