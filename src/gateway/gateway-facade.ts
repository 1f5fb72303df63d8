import type { GatewayConfig } from '../core/config-loader.js';
import { logger } from '../core/logger.js';
import { PluginIntrospector } from '../plugins/introspector.js';
import { PluginRegistry } from '../plugins/plugin-registry.js';
import type { RegistrySnapshot } from '../plugins/types.js';
import type { JsonRpcResponse } from '../protocol/json-rpc.js';
import { notification } from '../protocol/json-rpc.js';
import {
  SessionManager,
  TOOLS_CHANGED_NOTIFICATION,
  type SessionChannel,
  type SessionHandle,
} from '../sessions/session-manager.js';
import { buildManifest, type ToolManifest } from '../tools/manifest-builder.js';
import type { CommandRunner } from '../tools/spawn-runner.js';
import { ToolDispatcher } from '../tools/tool-dispatcher.js';

const log = logger.module('GatewayFacade');

export interface GatewayHealth {
  plugins: number;
  sessions: number;
}

export interface RescanSummary {
  plugins: number;
  tools: number;
  failures: RegistrySnapshot['failures'];
}

export interface GatewayFacadeOptions {
  /** Replaces the subprocess runner for introspection and calls. */
  runner?: CommandRunner;
}

/**
 * Single entry point the transport talks to. Owns the plugin registry, the
 * session manager and the dispatcher.
 */
export class GatewayFacade {
  readonly registry: PluginRegistry;
  readonly sessions: SessionManager;
  readonly dispatcher: ToolDispatcher;
  private started = false;

  constructor(
    private readonly config: GatewayConfig,
    options: GatewayFacadeOptions = {},
  ) {
    const introspector = new PluginIntrospector({
      interpreters: config.plugins.interpreters,
      timeoutMs: config.plugins.introspectTimeoutMs,
      runner: options.runner,
    });
    this.registry = new PluginRegistry({ introspector, entrypoints: config.plugins.entrypoints });
    this.sessions = new SessionManager({
      manifest: () => this.listTools(),
      reapIntervalMs: config.sessions.reapIntervalMs,
      closeGraceMs: config.sessions.closeGraceMs,
      keepaliveIntervalMs: config.sessions.keepaliveIntervalMs,
    });
    this.dispatcher = new ToolDispatcher(this.registry, {
      timeoutMs: config.execution.callTimeoutMs,
      killGraceMs: config.execution.killGraceMs,
      maxOutputBytes: config.execution.maxOutputBytes,
      runner: options.runner,
    });
  }

  async start(): Promise<RegistrySnapshot> {
    const snapshot = await this.registry.scan(this.config.plugins.dir);
    if (!this.started) {
      this.sessions.startReaper();
      this.started = true;
    }
    log.info('Gateway started', { pluginsDir: this.config.plugins.dir, tools: snapshot.tools.size });
    return snapshot;
  }

  stop(): void {
    this.sessions.stopReaper();
    const closed = this.sessions.closeAll();
    this.started = false;
    log.info('Gateway stopped', { closedSessions: closed });
  }

  health(): GatewayHealth {
    return { plugins: this.registry.count(), sessions: this.sessions.liveCount() };
  }

  onStreamConnect(channel: SessionChannel): SessionHandle {
    return this.sessions.open(channel);
  }

  onStreamDisconnect(sessionId: string): void {
    this.sessions.close(sessionId);
  }

  onMessage(body: unknown): Promise<JsonRpcResponse> {
    return this.dispatcher.dispatch(body);
  }

  listTools(): ToolManifest {
    return buildManifest(this.registry.snapshot());
  }

  async rescan(): Promise<RescanSummary> {
    const snapshot = await this.registry.scan(this.config.plugins.dir);
    const manifest = buildManifest(snapshot);
    const notified = this.sessions.broadcast({
      kind: 'message',
      payload: notification(TOOLS_CHANGED_NOTIFICATION, { tools: manifest.tools }),
    });
    log.info('Plugins rescanned', { tools: manifest.tools.length, notifiedSessions: notified });
    return { plugins: snapshot.plugins.length, tools: manifest.tools.length, failures: snapshot.failures };
  }
}
