import { randomUUID } from 'crypto';
import { log } from '../log';
import { CallSession, type CallServices, type CallSessionConfig } from './callSession';
import type { CallSessionId } from './types';
import type { MediaSocket } from '../transport/types';

const DEFAULT_IDLE_TTL_MINUTES = 10;
const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

export interface SessionLogContext {
  requestId?: string;
  remoteAddress?: string;
}

export interface SessionManagerOptions {
  services: CallServices;
  config: CallSessionConfig;
  idleTtlMinutes?: number;
  sweepIntervalMs?: number;
  now?: () => number;
}

/** Registry of live calls, keyed by the id minted when the media socket opens. */
export class SessionManager {
  private readonly sessions = new Map<CallSessionId, CallSession>();
  private readonly idleTtlMs: number;
  private readonly sweepTimer: NodeJS.Timeout;
  private readonly services: CallServices;
  private readonly config: CallSessionConfig;
  private readonly now: () => number;

  constructor(options: SessionManagerOptions) {
    this.services = options.services;
    this.config = options.config;
    this.now = options.now ?? Date.now;

    const idleMinutes = options.idleTtlMinutes ?? DEFAULT_IDLE_TTL_MINUTES;
    this.idleTtlMs = Math.max(idleMinutes, 1) * 60_000;

    const sweepInterval = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.sweepTimer = setInterval(() => this.sweepIdleSessions(), sweepInterval);
    this.sweepTimer.unref?.();
  }

  public open(socket: MediaSocket, context: SessionLogContext = {}): CallSession {
    const sessionId = randomUUID();
    const session = new CallSession({
      ...this.services,
      sessionId,
      socket,
      config: this.config,
      requestId: context.requestId,
      now: this.now,
      onClosed: (closed) => this.forget(closed.sessionId),
    });
    this.sessions.set(sessionId, session);

    log.info(
      {
        event: 'call_session_created',
        session_id: sessionId,
        remote_address: context.remoteAddress,
        active_sessions: this.sessions.size,
        requestId: context.requestId,
      },
      'call session created',
    );

    void session.connect().catch((error: unknown) => {
      log.error({ err: error, event: 'call_session_connect_failed', session_id: sessionId }, 'session connect failed');
      void session.teardown('connect_failed');
    });

    return session;
  }

  public get(sessionId: CallSessionId): CallSession | undefined {
    return this.sessions.get(sessionId);
  }

  public count(): number {
    return this.sessions.size;
  }

  public handleMessage(sessionId: CallSessionId, raw: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) {
      log.warn({ event: 'call_session_missing_message', session_id: sessionId }, 'call session missing for message');
      return;
    }
    session.handleMessage(raw);
  }

  public handleClose(sessionId: CallSessionId, reason = 'transport_closed'): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return Promise.resolve();
    }
    return session.onTransportClosed(reason);
  }

  /** Tears down every live call; used on process shutdown. */
  public async shutdown(reason = 'shutdown'): Promise<void> {
    clearInterval(this.sweepTimer);
    const sessions = [...this.sessions.values()];
    log.info({ event: 'session_manager_shutdown', active_sessions: sessions.length, reason }, 'closing live calls');
    await Promise.all(sessions.map((session) => session.teardown(reason)));
  }

  private forget(sessionId: CallSessionId): void {
    if (this.sessions.delete(sessionId)) {
      log.info(
        { event: 'call_session_removed', session_id: sessionId, active_sessions: this.sessions.size },
        'call session removed',
      );
    }
  }

  private sweepIdleSessions(): void {
    const nowMs = this.now();

    for (const [sessionId, session] of this.sessions.entries()) {
      const idleMs = nowMs - session.getLastActivityAt().getTime();
      if (idleMs <= this.idleTtlMs) {
        continue;
      }

      log.warn({ event: 'call_session_idle', session_id: sessionId, idle_ms: idleMs }, 'idle call session swept');
      void session.teardown('idle_timeout');
    }
  }
}
