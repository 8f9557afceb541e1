import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { z } from 'zod';
import type {
  AnalyticsErrorCode,
  AnalyticsEvent,
  ConsentChange,
  ConsentExport,
  ConsentPurpose,
  ConsentStatus,
  EventProperties,
  PropertyValue,
  Rule,
  RuleAction,
  RuleFacts,
  RuleResult,
  Session,
  UserProfile,
} from '../domain/index.js';
import { AnalyticsError } from '../domain/index.js';
import type { SdkConfig } from '../infrastructure/config.js';
import type { CryptoProvider, DeviceInfoProvider, KeyValueStore, LocationProvider, Transport } from './ports.js';
import type { ConsentImportResult } from './consent-gate.js';
import { ConsentGate } from './consent-gate.js';
import type { DeliveryOutcome } from './delivery-client.js';
import { DeliveryClient } from './delivery-client.js';
import { EventFactory, validateTrackInput } from './event-factory.js';
import { EventQueue } from './event-queue.js';
import type { ActionHandlers } from './rule-engine.js';
import { RuleEngine } from './rule-engine.js';
import type { RuleSyncResult } from './rule-sync.js';
import { RuleSyncClient } from './rule-sync.js';
import type { SessionLifecycleEvent } from './session-manager.js';
import { SessionManager } from './session-manager.js';
import { UserProfileStore } from './user-profile.js';
import { StorageKeys, readRecord, writeRecord } from './persistence.js';

export const SDK_VERSION = '0.1.0';

export type TrackResult =
  | { readonly status: 'queued'; readonly event_id: string }
  | { readonly status: 'rejected'; readonly reason: AnalyticsErrorCode };

export type FlushResult =
  | { readonly status: 'skipped'; readonly reason: 'in_progress' | 'offline' | 'not_initialized' }
  | {
      readonly status: 'completed';
      readonly delivered: number;
      readonly dropped: number;
      readonly outcome: DeliveryOutcome['kind'] | null;
    };

/** Host UI capabilities a rule may invoke. Unset hooks make those actions `skipped`. */
export interface HostHooks {
  readonly showInAppMessage?: (messageId: string, parameters: Readonly<Record<string, PropertyValue>>) => void | Promise<void>;
  readonly sendPushNotification?: (parameters: Readonly<Record<string, PropertyValue>>) => void | Promise<void>;
}

export interface AnalyticsClientDeps {
  readonly config: SdkConfig;
  readonly log: Logger;
  readonly storage: KeyValueStore;
  readonly transport: Transport;
  readonly crypto: CryptoProvider;
  readonly device: DeviceInfoProvider;
  readonly location?: LocationProvider | undefined;
  readonly hooks?: HostHooks | undefined;
  readonly authToken?: (() => string | null) | undefined;
  readonly nowFn?: (() => number) | undefined;
  readonly idFn?: (() => string) | undefined;
  readonly sleep?: ((ms: number) => Promise<void>) | undefined;
  /** Local wall-clock offset for temporal rule facts; defaults to the process time zone. */
  readonly utcOffsetMinutes?: (() => number) | undefined;
}

interface TrackOptions {
  /** Stamp this session instead of counting the event against the current one. */
  readonly sessionId?: string | null;
  readonly fromRule?: boolean;
}

const deviceIdSchema = z.string().min(1);
const flagSchema = z.boolean();

function stringParam(parameters: Readonly<Record<string, PropertyValue>>, key: string): string | null {
  const value = parameters[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function platformOf(snapshot: Readonly<Record<string, PropertyValue>>, key: string): string {
  const value = snapshot[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Public face of the SDK core.
 *
 * Composes consent, sessions, the durable queue, delivery and the rule
 * engine. Nothing here throws to host code: failures come back as
 * discriminated results or end up in the log.
 */
export class AnalyticsClient {
  private readonly config: SdkConfig;
  private readonly log: Logger;
  private readonly storage: KeyValueStore;
  private readonly deviceInfo: DeviceInfoProvider;
  private readonly location: LocationProvider | undefined;
  private readonly hooks: HostHooks;
  private readonly nowFn: () => number;
  private readonly idFn: () => string;
  private readonly utcOffsetMinutes: () => number;

  private readonly consent: ConsentGate;
  private readonly sessions: SessionManager;
  private readonly queue: EventQueue;
  private readonly delivery: DeliveryClient;
  private readonly engine: RuleEngine;
  private readonly ruleSync: RuleSyncClient;
  private readonly profile: UserProfileStore;
  private readonly factory: EventFactory;

  private readonly pending = new Set<Promise<void>>();
  private readonly unsubscribers: Array<() => void> = [];
  private flushTimer: ReturnType<typeof setInterval> | null = null;
  private syncTimer: ReturnType<typeof setInterval> | null = null;
  private deviceId = '';
  private started = false;
  private stopped = false;
  private flushing = false;
  private online = true;
  private foreground = true;
  private foregroundSince = 0;
  private backgroundSince: number | null = null;
  private screen: { readonly name: string; readonly since: number } | null = null;
  /** Session whose `session_start` has been queued by this process. */
  private announcedSessionId: string | null = null;

  constructor(deps: AnalyticsClientDeps) {
    this.config = deps.config;
    this.log = deps.log;
    this.storage = deps.storage;
    this.deviceInfo = deps.device;
    this.location = deps.location;
    this.hooks = deps.hooks ?? {};
    this.nowFn = deps.nowFn ?? Date.now;
    this.idFn = deps.idFn ?? randomUUID;
    this.utcOffsetMinutes = deps.utcOffsetMinutes ?? (() => -new Date(this.nowFn()).getTimezoneOffset());

    const log = deps.log;
    const nowFn = this.nowFn;
    const identity = {
      appId: this.config.app_id,
      deviceId: () => this.deviceId,
      sdkVersion: SDK_VERSION,
      platform: platformOf(deps.device.currentDeviceSnapshot(), 'platform'),
      authToken: deps.authToken,
    };

    this.consent = new ConsentGate({
      log: log.child({ component: 'consent' }),
      storage: deps.storage,
      ttlMs: this.config.consent_ttl_days * 24 * 60 * 60 * 1000,
      requiresUserConsent: this.config.requires_user_consent,
      nowFn,
    });
    this.sessions = new SessionManager({
      log: log.child({ component: 'session' }),
      storage: deps.storage,
      timeoutMs: this.config.session_timeout_seconds * 1000,
      nowFn,
      idFn: this.idFn,
    });
    this.queue = new EventQueue({
      log: log.child({ component: 'queue' }),
      storage: deps.storage,
      maxSize: this.config.max_queue_size,
      nowFn,
    });
    this.delivery = new DeliveryClient({
      log: log.child({ component: 'delivery' }),
      transport: deps.transport,
      crypto: deps.crypto,
      identity,
      maxAttempts: this.config.max_retries,
      maxBackoffMs: this.config.max_backoff_seconds * 1000,
      sleep: deps.sleep,
    });
    this.engine = new RuleEngine({
      log: log.child({ component: 'rules' }),
      storage: deps.storage,
      handlers: this.actionHandlers(),
    });
    this.ruleSync = new RuleSyncClient({
      log: log.child({ component: 'rule-sync' }),
      transport: deps.transport,
      identity,
      engine: this.engine,
      storage: deps.storage,
      isOnline: () => this.online,
      nowFn,
    });
    this.profile = new UserProfileStore(deps.storage, log.child({ component: 'user' }));
    this.factory = new EventFactory({
      sdkVersion: SDK_VERSION,
      device: {
        currentDeviceSnapshot: () => ({ ...this.deviceInfo.currentDeviceSnapshot(), device_id: this.deviceId }),
      },
      location: deps.location,
      locationAllowed: () => this.config.location_tracking_enabled && this.consent.hasConsent('location'),
      idFn: this.idFn,
      nowFn,
    });
  }

  // ── Lifecycle ──────────────────────────────────────────────────────

  /**
   * Loads persisted state, restores or starts a session, queues the launch
   * events, arms the flush and rule-sync timers and kicks off the first
   * rule sync.
   */
  async start(): Promise<void> {
    if (this.started || this.stopped) return;
    this.started = true;

    await this.consent.load();
    await this.profile.load();
    await this.queue.load();
    if (this.config.local_rules_enabled) await this.engine.load();
    this.deviceId = await this.resolveDeviceId();

    this.unsubscribers.push(
      this.consent.onChange((change) => this.onConsentChange(change)),
      this.sessions.subscribe((event) => this.onSessionEvent(event)),
    );

    const restored = await this.sessions.restore();
    if (restored) {
      if (this.consent.isTrackingAllowed()) this.announcedSessionId = restored.session_id;
    } else {
      await this.sessions.start('app_launch');
    }
    this.foregroundSince = this.nowFn();
    if (this.config.auto_tracking_enabled) await this.trackLaunch();

    this.flushTimer = setInterval(() => {
      this.background(this.flush(), 'periodic_flush');
    }, this.config.flush_interval_seconds * 1000);

    if (this.config.local_rules_enabled) {
      this.syncTimer = setInterval(() => {
        this.background(this.syncRules(), 'rule_sync');
      }, this.config.rules_sync_interval_seconds * 1000);
      this.background(this.syncRules(), 'rule_sync');
    }

    if (this.queue.length >= this.config.batch_size) {
      this.background(this.flush(), 'threshold_flush');
    }

    this.log.info(
      { app_id: this.config.app_id, queued: this.queue.length, session_id: this.sessions.getCurrentSessionId() },
      'Analytics client started',
    );
  }

  /** Cancels timers, waits for background work, then turns every call into a no-op. */
  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    if (this.flushTimer !== null) clearInterval(this.flushTimer);
    if (this.syncTimer !== null) clearInterval(this.syncTimer);
    this.flushTimer = null;
    this.syncTimer = null;
    this.sessions.dispose();
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();

    await this.settled();
    this.log.info('Analytics client shut down');
  }

  /** Resolves once every background task scheduled so far has finished. */
  async settled(): Promise<void> {
    do {
      await Promise.all([...this.pending]);
      await Promise.all([
        this.sessions.settled(),
        this.queue.settled(),
        this.consent.settled(),
        this.profile.settled(),
      ]);
    } while (this.pending.size > 0);
  }

  onForeground(): Promise<void> {
    this.foreground = true;
    return this.guard(async () => {
      await this.sessions.onForeground();

      const backgroundSince = this.backgroundSince;
      this.backgroundSince = null;
      this.foregroundSince = this.nowFn();
      if (backgroundSince !== null && this.config.auto_tracking_enabled) {
        const backgroundDuration = (this.foregroundSince - backgroundSince) / 1000;
        await this.track('app_foreground', { background_duration: backgroundDuration }, {});
      }
    });
  }

  onInactive(): Promise<void> {
    return this.guard(() => this.sessions.onInactive());
  }

  /** Ends the session and pushes out whatever is queued. */
  onBackground(): Promise<void> {
    this.foreground = false;
    return this.guard(async () => {
      if (this.backgroundSince === null) {
        const now = this.nowFn();
        this.backgroundSince = now;
        await this.endScreenView();
        if (this.config.auto_tracking_enabled) {
          await this.track('app_background', { foreground_duration: (now - this.foregroundSince) / 1000 }, {});
        }
      }
      await this.sessions.onBackground();
      this.background(this.flush(), 'background_flush');
    });
  }

  /** Reachability change; regaining the network triggers an immediate flush. */
  setNetworkReachable(reachable: boolean): void {
    const wasOnline = this.online;
    this.online = reachable;
    if (!wasOnline && reachable && this.isRunning()) {
      this.log.debug('Network reachable again, flushing');
      this.background(this.flush(), 'reconnect_flush');
    }
  }

  // ── Tracking ───────────────────────────────────────────────────────

  trackEvent(name: string, properties?: EventProperties): Promise<TrackResult> {
    return this.track(name, properties, {});
  }

  trackScreenView(screenName: string, properties: EventProperties = {}): Promise<TrackResult> {
    if (!this.isRunning()) return Promise.resolve(this.rejected('not_initialized'));
    return this.catching(async () => {
      const previous = this.screen?.name ?? '';
      if (this.consent.isTrackingAllowed()) {
        await this.sessions.addScreenView(screenName);
        await this.endScreenView();
        this.screen = { name: screenName, since: this.nowFn() };
      }
      return this.track('screen_view', { ...properties, screen_name: screenName, previous_screen_name: previous }, {});
    });
  }

  trackConversion(
    name: string,
    value: number,
    currency: string = 'USD',
    properties: EventProperties = {},
  ): Promise<TrackResult> {
    return this.track(
      name,
      {
        ...properties,
        conversion_value: value,
        currency,
        conversion_timestamp: new Date(this.nowFn()).toISOString(),
      },
      {},
    );
  }

  recordInteraction(): Promise<void> {
    return this.guard(() => this.sessions.updateActivity());
  }

  updateScrollDepth(depth: number): Promise<void> {
    return this.guard(() => this.sessions.updateScrollDepth(depth));
  }

  /**
   * Delivers queued events, one batch at a time.
   *
   * Coalesced: while a flush is running further requests are skipped.
   * Offline state skips before any request is built.
   */
  async flush(): Promise<FlushResult> {
    if (!this.isRunning()) return { status: 'skipped', reason: 'not_initialized' };
    if (this.flushing) return { status: 'skipped', reason: 'in_progress' };
    if (!this.online) {
      this.log.debug('Offline, skipping flush');
      return { status: 'skipped', reason: 'offline' };
    }

    this.flushing = true;
    let delivered = 0;
    let dropped = 0;
    let outcome: DeliveryOutcome['kind'] | null = null;
    try {
      for (;;) {
        const batch = await this.queue.drain(this.config.batch_size);
        if (batch.length === 0) break;

        const ids = batch.map((item) => item.event.event_id);
        await this.queue.markAttempt(ids);
        const result = await this.delivery.sendBatch(batch.map((item) => item.event));
        outcome = result.kind;

        if (result.kind === 'delivered') {
          delivered += await this.queue.ack(result.event_ids);
          if (this.queue.length >= this.config.batch_size && this.online) continue;
          break;
        }

        if (result.kind === 'permanent_failure') {
          dropped += await this.queue.drop(ids, 'permanent_failure');
        } else if (result.kind === 'transient_failure') {
          const exhausted = batch
            .filter((item) => item.delivery_attempts + 1 >= this.config.max_delivery_attempts)
            .map((item) => item.event.event_id);
          if (exhausted.length > 0) {
            dropped += await this.queue.drop(exhausted, 'max_delivery_attempts');
          }
        }
        break;
      }
    } catch (err: unknown) {
      this.log.error({ err, delivered, dropped }, 'Flush failed, events kept for the next attempt');
      outcome = 'transient_failure';
    } finally {
      this.flushing = false;
    }

    return { status: 'completed', delivered, dropped, outcome };
  }

  // ── Consent ────────────────────────────────────────────────────────

  setConsent(purpose: ConsentPurpose, status: ConsentStatus): Promise<void> {
    return this.guard(() => this.consent.setConsent(purpose, status));
  }

  hasConsent(purpose: ConsentPurpose): boolean {
    return this.consent.hasConsent(purpose);
  }

  consentStatuses(): Record<ConsentPurpose, ConsentStatus> {
    return this.consent.statuses();
  }

  revokeAllConsent(): Promise<void> {
    return this.guard(() => this.consent.revokeAll());
  }

  exportConsentData(): ConsentExport {
    return this.consent.exportConsentData();
  }

  async importConsentData(data: unknown): Promise<ConsentImportResult> {
    if (!this.isRunning()) {
      return { ok: false, error: new AnalyticsError('not_initialized', 'Analytics client is not running') };
    }
    try {
      return await this.consent.importConsentData(data);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      const error = err instanceof AnalyticsError ? err : new AnalyticsError('unknown', message, { cause: err });
      this.log.error({ err: error }, 'Consent import failed');
      return { ok: false, error };
    }
  }

  // ── User ───────────────────────────────────────────────────────────

  identify(userId: string, attributes: Readonly<Record<string, PropertyValue>> = {}): Promise<void> {
    return this.guard(async () => {
      await this.profile.identify(userId, attributes);
      this.log.info({ user_id: userId }, 'User identified');
    });
  }

  setUserAttribute(key: string, value: PropertyValue): Promise<void> {
    return this.guard(async () => {
      await this.profile.setAttribute(key, value);
    });
  }

  removeUserAttribute(key: string): Promise<void> {
    return this.guard(async () => {
      await this.profile.removeAttribute(key);
    });
  }

  resetUser(): Promise<void> {
    return this.guard(() => this.profile.reset());
  }

  getUserProfile(): UserProfile {
    return this.profile.current();
  }

  // ── Rules ──────────────────────────────────────────────────────────

  addRule(rule: Rule): Promise<void> {
    return this.guard(() => this.engine.addRule(rule));
  }

  removeRule(ruleId: string): Promise<void> {
    return this.guard(async () => {
      await this.engine.removeRule(ruleId);
    });
  }

  replaceRules(rules: readonly Rule[]): Promise<void> {
    return this.guard(() => this.engine.replaceRules(rules));
  }

  getRules(): readonly Rule[] {
    return this.engine.getRules();
  }

  async syncRules(): Promise<RuleSyncResult> {
    if (!this.isRunning() || !this.config.local_rules_enabled) {
      return { status: 'skipped', reason: 'offline' };
    }
    try {
      return await this.ruleSync.sync();
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      const error = err instanceof AnalyticsError ? err : new AnalyticsError('unknown', message, { cause: err });
      this.log.error({ err: error }, 'Rule sync failed');
      return { status: 'failed', error };
    }
  }

  // ── Reads ──────────────────────────────────────────────────────────

  getCurrentSessionId(): string | null {
    return this.sessions.getCurrentSessionId();
  }

  getCurrentSession(): Session | null {
    return this.sessions.getCurrentSession();
  }

  get queueLength(): number {
    return this.queue.length;
  }

  // ── Internals ──────────────────────────────────────────────────────

  private async track(name: string, properties: EventProperties | undefined, options: TrackOptions): Promise<TrackResult> {
    if (!this.isRunning()) return this.rejected('not_initialized');

    if (!this.consent.isTrackingAllowed()) {
      this.log.debug({ event: name }, 'Analytics consent missing, event not tracked');
      return this.rejected('consent_required');
    }

    const validation = validateTrackInput(name, properties);
    if (!validation.ok) {
      this.log.warn({ event: name, reason: validation.error.message }, 'Rejected invalid event');
      return this.rejected(validation.error.code);
    }

    return this.catching(async () => {
      const sessionId = options.sessionId !== undefined ? options.sessionId : await this.sessions.addEvent();
      const event = this.factory.build({
        name: validation.value.name,
        properties: validation.value.properties,
        session_id: sessionId,
        user_id: this.profile.current().user_id,
      });

      const result = await this.queue.enqueue(event);
      this.log.debug({ event: event.name, event_id: event.event_id, queued: result.length }, 'Event queued');

      if (this.config.local_rules_enabled && !options.fromRule) {
        this.background(this.evaluateRules(event), 'rule_evaluation');
      }
      if (result.length >= this.config.batch_size) {
        this.background(this.flush(), 'threshold_flush');
      }
      return { status: 'queued', event_id: event.event_id };
    });
  }

  private async evaluateRules(event: AnalyticsEvent): Promise<RuleResult[]> {
    return this.engine.evaluate(event, this.currentFacts());
  }

  private currentFacts(): RuleFacts {
    const snapshot = this.deviceInfo.currentDeviceSnapshot();
    const locationAllowed = this.config.location_tracking_enabled && this.consent.hasConsent('location');
    return {
      session: this.sessions.getCurrentSession(),
      user: this.profile.current(),
      location: locationAllowed && this.location ? this.location.currentLocation() : null,
      now: this.nowFn(),
      utc_offset_minutes: this.utcOffsetMinutes(),
      app: {
        is_foreground: this.foreground,
        network_reachable: this.online,
        app_version: this.config.app_version,
        os_version: platformOf(snapshot, 'os_version'),
        platform: platformOf(snapshot, 'platform'),
      },
    };
  }

  private actionHandlers(): ActionHandlers {
    const handlers: ActionHandlers = {
      track_event: (action, { rule }) => this.runTrackAction(action, rule.id),
      update_user_property: async (action) => {
        const property = stringParam(action.parameters, 'property');
        if (property === null) {
          throw new AnalyticsError('invalid_event_data', 'update_user_property needs a "property" parameter');
        }
        await this.profile.setAttribute(property, action.parameters['value'] ?? null);
      },
      sync_to_server: async () => {
        await this.flush();
      },
    };

    const { showInAppMessage, sendPushNotification } = this.hooks;
    if (showInAppMessage) {
      handlers.show_in_app_message = async (action) => {
        const messageId = stringParam(action.parameters, 'message_id');
        if (messageId === null) {
          throw new AnalyticsError('invalid_event_data', 'show_in_app_message needs a "message_id" parameter');
        }
        await showInAppMessage(messageId, action.parameters);
      };
    }
    if (sendPushNotification) {
      handlers.send_push_notification = async (action) => {
        await sendPushNotification(action.parameters);
      };
    }
    return handlers;
  }

  private async runTrackAction(action: RuleAction, ruleId: string): Promise<void> {
    const { event_name: eventName, name, ...rest } = action.parameters;
    const target = typeof eventName === 'string' ? eventName : name;
    if (typeof target !== 'string') {
      throw new AnalyticsError('invalid_event_name', 'track_event needs an "event_name" parameter');
    }

    const result = await this.track(
      target,
      { ...rest, triggered_by_rule: true, rule_id: ruleId },
      { fromRule: true },
    );
    if (result.status === 'rejected') {
      throw new AnalyticsError(result.reason, `Rule event "${target}" was rejected`);
    }
  }

  private onConsentChange(change: ConsentChange): void {
    this.background(
      this.track(
        'consent_changed',
        { consent_type: change.purpose, new_status: change.status, previous_status: change.previous },
        {},
      ),
      'consent_changed_event',
    );
    if (change.purpose !== 'analytics') return;

    if (change.status === 'granted' || change.status === 'not_required') {
      const session = this.sessions.getCurrentSession();
      if (session === null) {
        if (this.foreground) this.background(this.sessions.start('manual'), 'consent_start_session');
      } else if (session.session_id !== this.announcedSessionId) {
        this.announceSession(session);
      }
      return;
    }
    if (change.status !== 'denied' && change.status !== 'restricted') return;

    this.log.info({ status: change.status }, 'Analytics consent revoked, purging queue');
    this.background(this.queue.clear().then(() => undefined), 'consent_purge');
    this.background(this.sessions.end('manual').then(() => undefined), 'consent_end_session');
  }

  private onSessionEvent(event: SessionLifecycleEvent): void {
    const { session } = event;
    if (event.type === 'started') {
      this.announceSession(session);
      return;
    }

    this.background(
      this.track(
        'session_end',
        {
          session_id: session.session_id,
          session_source: session.source,
          session_start_timestamp: new Date(session.start_time).toISOString(),
          session_end_timestamp: new Date(session.end_time ?? this.nowFn()).toISOString(),
          session_duration: session.duration_ms / 1000,
          screen_count: session.screen_count,
          event_count: session.event_count,
          interaction_count: session.interaction_count,
          screens_viewed: [...session.screens_viewed],
          max_scroll_depth: session.max_scroll_depth,
          interruption_count: session.interruption_count,
          end_reason: event.reason,
        },
        { sessionId: session.session_id },
      ),
      'session_end_event',
    );
  }

  /** Queues `session_start` once per session, as soon as analytics may be collected. */
  private announceSession(session: Session): void {
    if (!this.consent.isTrackingAllowed()) return;
    this.announcedSessionId = session.session_id;
    this.background(
      this.track(
        'session_start',
        {
          session_id: session.session_id,
          session_source: session.source,
          session_start_timestamp: new Date(session.start_time).toISOString(),
        },
        { sessionId: session.session_id },
      ),
      'session_start_event',
    );
  }

  /**
   * `app_install` until one has been queued, then `app_launch` on every
   * start. Both need analytics consent at launch time.
   */
  private async trackLaunch(): Promise<void> {
    const snapshot = this.deviceInfo.currentDeviceSnapshot();
    const context = {
      app_version: this.config.app_version,
      device_platform: platformOf(snapshot, 'platform'),
      os_version: platformOf(snapshot, 'os_version'),
    };
    const timestamp = new Date(this.nowFn()).toISOString();

    const installed = await readRecord(this.storage, StorageKeys.appInstalled, flagSchema, this.log);
    if (installed !== true) {
      const install = await this.track('app_install', { ...context, install_timestamp: timestamp }, {});
      if (install.status === 'queued') await writeRecord(this.storage, StorageKeys.appInstalled, true, this.log);
    }

    const launchedBefore = (await readRecord(this.storage, StorageKeys.appLaunched, flagSchema, this.log)) === true;
    const launch = await this.track(
      'app_launch',
      { ...context, launch_type: 'cold_start', is_first_launch: !launchedBefore, launch_timestamp: timestamp },
      {},
    );
    if (launch.status === 'queued' && !launchedBefore) {
      await writeRecord(this.storage, StorageKeys.appLaunched, true, this.log);
    }
  }

  private async endScreenView(): Promise<void> {
    const screen = this.screen;
    this.screen = null;
    if (screen === null || !this.config.auto_tracking_enabled) return;

    const now = this.nowFn();
    await this.track(
      'screen_view_end',
      {
        screen_name: screen.name,
        time_on_screen: (now - screen.since) / 1000,
        end_timestamp: new Date(now).toISOString(),
      },
      {},
    );
  }

  private async resolveDeviceId(): Promise<string> {
    const fromDevice = this.deviceInfo.currentDeviceSnapshot()['device_id'];
    if (typeof fromDevice === 'string' && fromDevice.length > 0) return fromDevice;

    const stored = await readRecord(this.storage, StorageKeys.deviceId, deviceIdSchema, this.log);
    if (stored !== null) return stored;

    const generated = this.idFn();
    await writeRecord(this.storage, StorageKeys.deviceId, generated, this.log);
    return generated;
  }

  private isRunning(): boolean {
    return this.started && !this.stopped;
  }

  private rejected(reason: AnalyticsErrorCode): TrackResult {
    return { status: 'rejected', reason };
  }

  /** Runs a host-facing operation; internal failures are logged, never thrown. */
  private async guard(operation: () => Promise<void>): Promise<void> {
    if (!this.isRunning()) {
      this.log.debug('Client not running, call ignored');
      return;
    }
    try {
      await operation();
    } catch (err: unknown) {
      this.log.error({ err }, 'Analytics operation failed');
    }
  }

  private async catching(operation: () => Promise<TrackResult>): Promise<TrackResult> {
    try {
      return await operation();
    } catch (err: unknown) {
      this.log.error({ err }, 'Failed to track event');
      return this.rejected(err instanceof AnalyticsError ? err.code : 'unknown');
    }
  }

  /** Schedules fire-and-forget work that `settled()` and `shutdown()` wait for. */
  private background(task: Promise<unknown>, label: string): void {
    const tracked: Promise<void> = task
      .then(
        () => undefined,
        (err: unknown) => {
          this.log.warn({ err, task: label }, 'Background task failed');
        },
      )
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }
}
