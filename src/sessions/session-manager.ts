import { randomUUID } from 'crypto';
import { logger, type ModuleLogger } from '../core/logger.js';
import { notification } from '../protocol/json-rpc.js';
import type { ToolManifest } from '../tools/manifest-builder.js';

export type SessionState = 'active' | 'closing' | 'closed';

/** Transport behind one connected stream client. */
export interface SessionChannel {
  send(frame: string): Promise<void>;
  close(): void;
}

export type SessionEvent =
  | { kind: 'message'; payload: unknown }
  | { kind: 'comment'; text: string };

export interface SessionHandle {
  id: string;
  state: SessionState;
  createdAt: number;
}

export interface SessionManagerOptions {
  /** Current tool manifest; read when a session opens. */
  manifest: () => ToolManifest;
  reapIntervalMs: number;
  closeGraceMs: number;
  keepaliveIntervalMs: number;
  logger?: ModuleLogger;
  now?: () => number;
}

interface SessionRecord {
  id: string;
  channel: SessionChannel;
  state: SessionState;
  createdAt: number;
  closingSince?: number;
  pending: number;
  tail: Promise<void>;
}

export const TOOLS_NOTIFICATION = 'notifications/tools';
export const TOOLS_CHANGED_NOTIFICATION = 'notifications/tools/list_changed';

export function encodeEvent(event: SessionEvent): string {
  if (event.kind === 'comment') return `: ${event.text}\n\n`;
  return `data: ${JSON.stringify(event.payload)}\n\n`;
}

/**
 * Tracks stream sessions. State only moves forward:
 * active → closing → closed, and closed sessions leave the map.
 */
export class SessionManager {
  private readonly sessions = new Map<string, SessionRecord>();
  private readonly log: ModuleLogger;
  private readonly now: () => number;
  private reapTimer: NodeJS.Timeout | null = null;
  private keepaliveTimer: NodeJS.Timeout | null = null;

  constructor(private readonly options: SessionManagerOptions) {
    this.log = options.logger ?? logger.module('SessionManager');
    this.now = options.now ?? Date.now;
  }

  open(channel: SessionChannel): SessionHandle {
    const record: SessionRecord = {
      id: `session-${randomUUID()}`,
      channel,
      state: 'active',
      createdAt: this.now(),
      pending: 0,
      tail: Promise.resolve(),
    };
    this.sessions.set(record.id, record);

    const { tools } = this.options.manifest();
    this.enqueue(record, {
      kind: 'message',
      payload: notification(TOOLS_NOTIFICATION, { sessionId: record.id, tools }),
    });
    this.log.info('Session opened', { sessionId: record.id, tools: tools.length, live: this.liveCount() });
    return toHandle(record);
  }

  push(id: string, event: SessionEvent): boolean {
    const record = this.sessions.get(id);
    if (!record || record.state !== 'active') return false;
    this.enqueue(record, event);
    return true;
  }

  broadcast(event: SessionEvent): number {
    let delivered = 0;
    for (const record of this.sessions.values()) {
      if (record.state !== 'active') continue;
      this.enqueue(record, event);
      delivered += 1;
    }
    return delivered;
  }

  /** Marks the session closing; the reaper finishes it once its writes drain. */
  close(id: string): boolean {
    const record = this.sessions.get(id);
    if (!record || record.state !== 'active') return false;
    this.markClosing(record, 'client disconnected');
    return true;
  }

  get(id: string): SessionHandle | undefined {
    const record = this.sessions.get(id);
    return record ? toHandle(record) : undefined;
  }

  /** Sessions not yet closed; closing sessions count until the reaper finalises them. */
  liveCount(): number {
    return this.sessions.size;
  }

  /** Finalises closing sessions; returns how many were removed. */
  reap(now: number = this.now()): number {
    let removed = 0;
    for (const record of Array.from(this.sessions.values())) {
      if (record.state !== 'closing') continue;
      const closingFor = now - (record.closingSince ?? now);
      if (record.pending > 0 && closingFor < this.options.closeGraceMs) continue;
      if (record.pending > 0) {
        this.log.warn('Session writes did not drain, forcing close', {
          sessionId: record.id,
          pending: record.pending,
        });
      }
      this.finalize(record);
      removed += 1;
    }
    return removed;
  }

  startReaper(): void {
    if (!this.reapTimer) {
      this.reapTimer = setInterval(() => {
        this.reap();
      }, this.options.reapIntervalMs);
      this.reapTimer.unref();
    }
    if (!this.keepaliveTimer && this.options.keepaliveIntervalMs > 0) {
      this.keepaliveTimer = setInterval(() => {
        this.broadcast({ kind: 'comment', text: 'keepalive' });
      }, this.options.keepaliveIntervalMs);
      this.keepaliveTimer.unref();
    }
  }

  stopReaper(): void {
    if (this.reapTimer) {
      clearInterval(this.reapTimer);
      this.reapTimer = null;
    }
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer);
      this.keepaliveTimer = null;
    }
  }

  /** Closes every session immediately, without waiting for pending writes. */
  closeAll(): number {
    const records = Array.from(this.sessions.values());
    for (const record of records) {
      if (record.state === 'active') this.markClosing(record, 'gateway shutting down');
      this.finalize(record);
    }
    return records.length;
  }

  private enqueue(record: SessionRecord, event: SessionEvent): void {
    const frame = encodeEvent(event);
    record.pending += 1;
    record.tail = record.tail
      .then(async () => {
        if (record.state !== 'active') return;
        await record.channel.send(frame);
      })
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.markClosing(record, `write failed: ${message}`);
      })
      .finally(() => {
        record.pending -= 1;
      });
  }

  private markClosing(record: SessionRecord, reason: string): void {
    if (record.state !== 'active') return;
    record.state = 'closing';
    record.closingSince = this.now();
    this.log.debug('Session closing', { sessionId: record.id, reason });
  }

  private finalize(record: SessionRecord): void {
    record.state = 'closed';
    this.sessions.delete(record.id);
    try {
      record.channel.close();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.debug('Channel close failed', { sessionId: record.id, error: message });
    }
    this.log.info('Session closed', { sessionId: record.id, live: this.liveCount() });
  }
}

function toHandle(record: SessionRecord): SessionHandle {
  return { id: record.id, state: record.state, createdAt: record.createdAt };
}
