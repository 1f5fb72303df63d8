import type { Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import path from 'path';
import { logger, type ModuleLogger } from '../core/logger.js';
import type { PluginIntrospector } from './introspector.js';
import {
  IntrospectionError,
  qualifyToolName,
  type DiscoveryFailure,
  type Plugin,
  type PluginCandidate,
  type PluginCommand,
  type RegistrySnapshot,
  type ResolvedTool,
} from './types.js';

export interface PluginRegistryOptions {
  introspector: PluginIntrospector;
  entrypoints: string[];
  logger?: ModuleLogger;
}

export function createEmptySnapshot(directory = ''): RegistrySnapshot {
  return Object.freeze({
    directory,
    scannedAt: new Date(0).toISOString(),
    plugins: Object.freeze([]),
    failures: Object.freeze([]),
    tools: new Map<string, ResolvedTool>(),
  });
}

/**
 * Holds the published plugin snapshot. A scan builds a complete new snapshot
 * and swaps the reference; lookups never see a half-built one.
 */
export class PluginRegistry {
  private current: RegistrySnapshot = createEmptySnapshot();
  private scanChain: Promise<unknown> = Promise.resolve();
  private readonly introspector: PluginIntrospector;
  private readonly entrypoints: string[];
  private readonly log: ModuleLogger;

  constructor(options: PluginRegistryOptions) {
    this.introspector = options.introspector;
    this.entrypoints = options.entrypoints;
    this.log = options.logger ?? logger.module('PluginRegistry');
  }

  /** Scans are serialised; lookups keep answering from the previous snapshot meanwhile. */
  scan(directory: string): Promise<RegistrySnapshot> {
    const run = this.scanChain.then(async () => {
      const next = await this.buildSnapshot(directory);
      this.current = next;
      return next;
    });
    this.scanChain = run.catch(() => undefined);
    return run;
  }

  snapshot(): RegistrySnapshot {
    return this.current;
  }

  lookup(qualifiedName: string): ResolvedTool | undefined {
    return this.current.tools.get(qualifiedName);
  }

  count(): number {
    return this.current.plugins.length;
  }

  private async buildSnapshot(directory: string): Promise<RegistrySnapshot> {
    const startedAt = Date.now();
    const candidates = await this.discoverCandidates(directory);
    const results = await Promise.allSettled(candidates.map((candidate) => this.introspector.introspect(candidate)));

    const plugins: Plugin[] = [];
    const failures: DiscoveryFailure[] = [];
    const tools = new Map<string, ResolvedTool>();
    const pluginNames = new Set<string>();

    results.forEach((result, index) => {
      const candidate = candidates[index];
      if (result.status === 'rejected') {
        const failure = toDiscoveryFailure(candidate, result.reason);
        failures.push(failure);
        this.log.warn('Plugin excluded: introspection failed', { ...failure });
        return;
      }

      const plugin = this.dedupeCommands(result.value);
      const qualifiedNames = plugin.commands.map((command) => qualifyToolName(plugin.name, command.name));
      const clash = pluginNames.has(plugin.name)
        ? plugin.name
        : qualifiedNames.find((qualifiedName) => tools.has(qualifiedName));
      if (clash !== undefined) {
        const failure: DiscoveryFailure = {
          plugin: plugin.name,
          executablePath: plugin.executablePath,
          code: 'duplicate',
          message: `Plugin ${plugin.name} (${plugin.executablePath}) duplicates already registered name ${clash}`,
        };
        failures.push(failure);
        this.log.warn('Plugin excluded: duplicate tool name', { ...failure });
        return;
      }

      pluginNames.add(plugin.name);
      plugins.push(plugin);
      plugin.commands.forEach((command, commandIndex) => {
        const qualifiedName = qualifiedNames[commandIndex];
        tools.set(qualifiedName, { qualifiedName, plugin, command });
      });
      this.log.debug('Plugin registered', {
        plugin: plugin.name,
        commands: plugin.commands.map((command) => command.name),
      });
    });

    this.log.info('Plugin scan finished', {
      directory,
      plugins: plugins.length,
      tools: tools.size,
      failures: failures.length,
      durationMs: Date.now() - startedAt,
    });

    return Object.freeze({
      directory,
      scannedAt: new Date().toISOString(),
      plugins: Object.freeze(plugins),
      failures: Object.freeze(failures),
      tools,
    });
  }

  private dedupeCommands(plugin: Plugin): Plugin {
    const seen = new Set<string>();
    const commands: PluginCommand[] = [];
    for (const command of plugin.commands) {
      if (seen.has(command.name)) {
        this.log.warn('Duplicate command ignored', { plugin: plugin.name, command: command.name });
        continue;
      }
      seen.add(command.name);
      commands.push(command);
    }
    return Object.freeze({ ...plugin, commands: Object.freeze(commands) });
  }

  private async discoverCandidates(directory: string): Promise<PluginCandidate[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.warn('Plugins directory is not readable, registry will be empty', { directory, error: message });
      return [];
    }

    const candidates: PluginCandidate[] = [];
    for (const entry of entries) {
      if (entry.name.startsWith('.') || entry.name.startsWith('_')) continue;
      const entryPath = path.join(directory, entry.name);
      const entryStat = await stat(entryPath).catch(() => null);
      if (!entryStat) continue;

      if (entryStat.isDirectory()) {
        const executablePath = await this.findEntrypoint(entryPath);
        if (executablePath) {
          candidates.push({ name: entry.name, executablePath });
        } else {
          this.log.debug('Directory has no plugin entrypoint, skipped', { directory: entryPath });
        }
        continue;
      }

      if (entryStat.isFile() && (await this.introspector.isRunnable(entryPath))) {
        candidates.push({ name: path.parse(entry.name).name, executablePath: entryPath });
      }
    }

    return candidates.sort((a, b) => a.name.localeCompare(b.name) || a.executablePath.localeCompare(b.executablePath));
  }

  private async findEntrypoint(pluginDir: string): Promise<string | undefined> {
    for (const entrypoint of this.entrypoints) {
      const candidatePath = path.join(pluginDir, entrypoint);
      const candidateStat = await stat(candidatePath).catch(() => null);
      if (candidateStat?.isFile()) return candidatePath;
    }
    return undefined;
  }
}

function toDiscoveryFailure(candidate: PluginCandidate, reason: unknown): DiscoveryFailure {
  if (reason instanceof IntrospectionError) {
    return {
      plugin: candidate.name,
      executablePath: candidate.executablePath,
      code: reason.code,
      message: reason.message,
    };
  }
  return {
    plugin: candidate.name,
    executablePath: candidate.executablePath,
    code: 'help_failed',
    message: reason instanceof Error ? reason.message : String(reason),
  };
}
