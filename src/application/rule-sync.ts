import type { Logger } from 'pino';
import { z } from 'zod';
import { AnalyticsError, errorForStatus } from '../domain/index.js';
import type { KeyValueStore, Transport, TransportResponse } from './ports.js';
import type { ClientIdentity } from './delivery-client.js';
import { classifyTransportFailure, identityHeaders, isSuccess } from './delivery-client.js';
import type { RuleEngine } from './rule-engine.js';
import { parseRules, rulesResponseSchema } from './rule-schema.js';
import { StorageKeys, decodeJson, readRecord, writeRecord } from './persistence.js';

export const RULES_PATH = '/rules';

const lastSyncSchema = z.number().int().min(0);

export type RuleSyncResult =
  | { readonly status: 'synced'; readonly count: number; readonly rejected: number }
  | { readonly status: 'skipped'; readonly reason: 'in_progress' | 'offline' }
  | { readonly status: 'failed'; readonly error: AnalyticsError };

export interface RuleSyncClientOptions {
  readonly log: Logger;
  readonly transport: Transport;
  readonly identity: ClientIdentity;
  readonly engine: RuleEngine;
  readonly storage: KeyValueStore;
  readonly isOnline?: () => boolean;
  readonly nowFn?: () => number;
}

/**
 * Pulls the rule set from `GET /rules?last_sync=<epoch seconds>` and
 * swaps it into the engine wholesale.
 *
 * Only one sync runs at a time; a request made while one is in flight is
 * skipped, as is any request while offline.
 */
export class RuleSyncClient {
  private readonly log: Logger;
  private readonly transport: Transport;
  private readonly identity: ClientIdentity;
  private readonly engine: RuleEngine;
  private readonly storage: KeyValueStore;
  private readonly isOnline: () => boolean;
  private readonly nowFn: () => number;
  private syncing = false;

  constructor(options: RuleSyncClientOptions) {
    this.log = options.log;
    this.transport = options.transport;
    this.identity = options.identity;
    this.engine = options.engine;
    this.storage = options.storage;
    this.isOnline = options.isOnline ?? (() => true);
    this.nowFn = options.nowFn ?? Date.now;
  }

  get inProgress(): boolean {
    return this.syncing;
  }

  async sync(): Promise<RuleSyncResult> {
    if (this.syncing) {
      this.log.debug('Rule sync already in progress, skipping');
      return { status: 'skipped', reason: 'in_progress' };
    }
    if (!this.isOnline()) {
      this.log.debug('Offline, skipping rule sync');
      return { status: 'skipped', reason: 'offline' };
    }

    this.syncing = true;
    try {
      return await this.fetchAndApply();
    } finally {
      this.syncing = false;
    }
  }

  /** Epoch seconds of the last successful sync, 0 if never. */
  async lastSync(): Promise<number> {
    return (await readRecord(this.storage, StorageKeys.rulesLastSync, lastSyncSchema, this.log)) ?? 0;
  }

  private async fetchAndApply(): Promise<RuleSyncResult> {
    const since = await this.lastSync();

    let headers: Record<string, string>;
    try {
      headers = { ...identityHeaders(this.identity), Accept: 'application/json' };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      const error = new AnalyticsError('unknown', `Failed to prepare rule sync request: ${message}`, { cause: err });
      this.log.warn({ err: error }, 'Rule sync request not sent');
      return { status: 'failed', error };
    }

    let response: TransportResponse;
    try {
      response = await this.transport.request({
        method: 'GET',
        path: `${RULES_PATH}?last_sync=${since}`,
        headers,
      });
    } catch (err: unknown) {
      const failure = classifyTransportFailure(err);
      const error = failure.ok ? new AnalyticsError('unknown', 'Rule sync failed') : failure.error;
      this.log.warn({ err: error }, 'Rule sync request failed');
      return { status: 'failed', error };
    }

    if (!isSuccess(response)) {
      const error = errorForStatus(response.status);
      this.log.warn({ err: error, status: response.status }, 'Rule sync rejected');
      return { status: 'failed', error };
    }

    const parsed = rulesResponseSchema.safeParse(decodeJson(response.body));
    if (!parsed.success) {
      const error = new AnalyticsError('invalid_response', 'Malformed rules response', { cause: parsed.error });
      this.log.warn({ err: error }, 'Rule sync returned an invalid body');
      return { status: 'failed', error };
    }

    const { rules, rejected } = parseRules(parsed.data.rules);
    if (rejected > 0) {
      this.log.warn({ rejected }, 'Discarded invalid rules from server');
    }

    await this.engine.replaceRules(rules);
    await writeRecord(this.storage, StorageKeys.rulesLastSync, Math.floor(this.nowFn() / 1000), this.log);

    this.log.info({ ruleCount: rules.length, version: parsed.data.version }, 'Rules synced');
    return { status: 'synced', count: rules.length, rejected };
  }
}
