import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { Session, SessionSource } from '../domain/index.js';
import type { KeyValueStore } from './ports.js';
import { sessionSchema } from './event-schema.js';
import { StorageKeys, readRecord, removeRecord, writeRecord } from './persistence.js';
import { SerialLane } from './serial-lane.js';

export const DEFAULT_SESSION_TIMEOUT_MS = 1800 * 1000;

export type SessionEndReason = 'replaced' | 'timeout' | 'background' | 'manual';

export type SessionLifecycleEvent =
  | { readonly type: 'started'; readonly session: Session }
  | { readonly type: 'ended'; readonly session: Session; readonly reason: SessionEndReason };

/**
 * Called inside the session lane. Must not await further SessionManager
 * calls; schedule them instead.
 */
export type SessionListener = (event: SessionLifecycleEvent) => void;

export interface SessionManagerOptions {
  readonly log: Logger;
  readonly storage: KeyValueStore;
  readonly timeoutMs?: number;
  readonly nowFn?: () => number;
  readonly idFn?: () => string;
}

/**
 * Session state machine: NoSession → Active → Active(renewed) → Ended.
 *
 * All mutations run through one lane. The idle timer fires on wall-clock
 * time since it was last armed; activity does not re-arm it, a foreground
 * resume does. Each arming bumps a generation so a stale timer callback is
 * a no-op.
 */
export class SessionManager {
  private readonly log: Logger;
  private readonly storage: KeyValueStore;
  private readonly timeoutMs: number;
  private readonly nowFn: () => number;
  private readonly idFn: () => string;
  private readonly lane = new SerialLane();
  private readonly listeners = new Set<SessionListener>();
  private session: Session | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private generation = 0;
  private disposed = false;

  constructor(options: SessionManagerOptions) {
    this.log = options.log;
    this.storage = options.storage;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
    this.nowFn = options.nowFn ?? Date.now;
    this.idFn = options.idFn ?? randomUUID;
  }

  /**
   * Restores the persisted session if it started less than one timeout ago.
   * Older or corrupt records are discarded.
   */
  restore(): Promise<Session | null> {
    return this.lane.run(async () => {
      const stored = await readRecord(this.storage, StorageKeys.currentSession, sessionSchema, this.log);
      if (stored === null) return null;

      const age = this.nowFn() - stored.start_time;
      if (stored.end_time !== null || age >= this.timeoutMs) {
        await removeRecord(this.storage, StorageKeys.currentSession, this.log);
        this.log.debug({ session_id: stored.session_id, age_ms: age }, 'Stored session expired, removed');
        return null;
      }

      this.session = stored;
      this.armTimer();
      this.log.info({ session_id: stored.session_id }, 'Session restored');
      return stored;
    });
  }

  /** Starts a new session, ending the active one first. */
  start(source: SessionSource = 'manual'): Promise<Session> {
    return this.lane.run(() => this.startLocked(source));
  }

  /** Ends the active session. Resolves to the final record, or null if none was active. */
  end(reason: SessionEndReason = 'manual'): Promise<Session | null> {
    return this.lane.run(() => this.endLocked(reason));
  }

  /** Records a user interaction. */
  updateActivity(): Promise<void> {
    return this.mutate((s, now) => ({
      ...s,
      last_activity_time: now,
      interaction_count: s.interaction_count + 1,
    }));
  }

  /** Appends a screen; the screen count only grows for screens not seen before. */
  addScreenView(screenName: string): Promise<void> {
    return this.mutate((s, now) => ({
      ...s,
      last_activity_time: now,
      screen_count: s.screens_viewed.includes(screenName) ? s.screen_count : s.screen_count + 1,
      screens_viewed: [...s.screens_viewed, screenName],
    }));
  }

  /**
   * Counts an event against the active session.
   * Resolves to the session id the event belongs to, or null.
   */
  addEvent(): Promise<string | null> {
    return this.lane.run(async () => {
      const s = this.session;
      if (!s) return null;
      await this.replaceLocked({ ...s, last_activity_time: this.nowFn(), event_count: s.event_count + 1 });
      return s.session_id;
    });
  }

  updateScrollDepth(depth: number): Promise<void> {
    return this.mutate((s, now) => ({
      ...s,
      last_activity_time: now,
      max_scroll_depth: Math.max(s.max_scroll_depth, depth),
    }));
  }

  addInterruption(): Promise<void> {
    return this.mutate((s) => ({ ...s, interruption_count: s.interruption_count + 1 }));
  }

  /**
   * Foreground transition: starts a session when none is active, starts a
   * fresh one when the last activity is older than the timeout, otherwise
   * resumes and re-arms the idle timer.
   */
  onForeground(): Promise<Session> {
    return this.lane.run(async () => {
      const s = this.session;
      if (!s) return this.startLocked('app_foreground');

      const now = this.nowFn();
      if (now - s.last_activity_time > this.timeoutMs) {
        return this.startLocked('foreground_timeout');
      }

      const resumed: Session = { ...s, last_activity_time: now };
      await this.replaceLocked(resumed);
      this.armTimer();
      this.log.debug({ session_id: s.session_id }, 'Session resumed');
      return resumed;
    });
  }

  /** Host is about to lose focus: pause the idle timer and count an interruption. */
  onInactive(): Promise<void> {
    return this.lane.run(async () => {
      this.cancelTimer();
      const s = this.session;
      if (s) await this.replaceLocked({ ...s, interruption_count: s.interruption_count + 1 });
    });
  }

  onBackground(): Promise<Session | null> {
    return this.end('background');
  }

  /** Cached read; never waits on the lane. */
  getCurrentSessionId(): string | null {
    return this.session?.session_id ?? null;
  }

  getCurrentSession(): Session | null {
    return this.session;
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once every queued mutation has settled. */
  settled(): Promise<void> {
    return this.lane.idle();
  }

  /** Cancels the idle timer for good. The session record stays persisted. */
  dispose(): void {
    this.disposed = true;
    this.cancelTimer();
  }

  private mutate(update: (session: Session, now: number) => Session): Promise<void> {
    return this.lane.run(async () => {
      const s = this.session;
      if (!s) return;
      await this.replaceLocked(update(s, this.nowFn()));
    });
  }

  private async replaceLocked(next: Session): Promise<void> {
    this.session = next;
    await writeRecord(this.storage, StorageKeys.currentSession, next, this.log);
  }

  private async startLocked(source: SessionSource): Promise<Session> {
    await this.endLocked('replaced');

    const now = this.nowFn();
    const session: Session = {
      session_id: this.idFn(),
      start_time: now,
      end_time: null,
      duration_ms: 0,
      last_activity_time: now,
      screen_count: 0,
      event_count: 0,
      interaction_count: 0,
      max_scroll_depth: 0,
      interruption_count: 0,
      screens_viewed: [],
      source,
    };

    await this.replaceLocked(session);
    this.armTimer();
    this.log.info({ session_id: session.session_id, source }, 'Session started');
    this.publish({ type: 'started', session });
    return session;
  }

  private async endLocked(reason: SessionEndReason): Promise<Session | null> {
    const s = this.session;
    if (!s) return null;

    this.cancelTimer();
    const now = this.nowFn();
    const ended: Session = { ...s, end_time: now, duration_ms: now - s.start_time };
    this.session = null;

    await writeRecord(this.storage, StorageKeys.lastSession, ended, this.log);
    await removeRecord(this.storage, StorageKeys.currentSession, this.log);

    this.log.info({ session_id: ended.session_id, duration_ms: ended.duration_ms, reason }, 'Session ended');
    this.publish({ type: 'ended', session: ended, reason });
    return ended;
  }

  private armTimer(): void {
    this.cancelTimer();
    if (this.disposed) return;

    const generation = this.generation;
    this.timer = setTimeout(() => {
      void this.lane.run(async () => {
        if (generation !== this.generation || this.disposed) return;
        this.timer = null;
        await this.endLocked('timeout');
      });
    }, this.timeoutMs);
  }

  private cancelTimer(): void {
    this.generation++;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private publish(event: SessionLifecycleEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err: unknown) {
        this.log.warn({ err, type: event.type }, 'Session listener failed');
      }
    }
  }
}
