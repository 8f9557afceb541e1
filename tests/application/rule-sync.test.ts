import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RuleEngine } from '../../src/application/rule-engine.js';
import { RuleSyncClient } from '../../src/application/rule-sync.js';
import type { RuleSyncClientOptions } from '../../src/application/rule-sync.js';
import type { Transport, TransportRequest, TransportResponse } from '../../src/application/ports.js';
import { TransportError } from '../../src/application/ports.js';
import { MemoryKeyValueStore } from '../../src/infrastructure/storage/memory-store.js';
import { FIXED_NOW, ScriptedTransport, fakeLogger, jsonBytes, makeRule, parseBytes, status } from '../helpers.js';

const identity = { appId: 'app-123', deviceId: () => 'device-9', sdkVersion: '0.1.0', platform: 'ios' };

/** Transport whose single response is released by the test. */
class GatedTransport implements Transport {
  readonly requests: TransportRequest[] = [];
  private release: (response: TransportResponse) => void = () => undefined;

  request(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request);
    return new Promise((resolve) => {
      this.release = resolve;
    });
  }

  respond(response: TransportResponse): void {
    this.release(response);
  }
}

describe('RuleSyncClient', () => {
  let log: ReturnType<typeof fakeLogger>;
  let storage: MemoryKeyValueStore;
  let engine: RuleEngine;

  beforeEach(() => {
    log = fakeLogger();
    storage = new MemoryKeyValueStore();
    engine = new RuleEngine({ log, storage, initialRules: [makeRule({ id: 'stale' })] });
  });

  function client(transport: Transport, overrides: Partial<RuleSyncClientOptions> = {}): RuleSyncClient {
    return new RuleSyncClient({ log, transport, identity, engine, storage, nowFn: () => FIXED_NOW, ...overrides });
  }

  it('replaces the rule set and records the sync time', async () => {
    const rules = [makeRule({ id: 'a', priority: 1 }), makeRule({ id: 'b', priority: 9 })];
    const transport = new ScriptedTransport([status(200, { rules, version: 3 })]);

    const result = await client(transport).sync();

    expect(result).toEqual({ status: 'synced', count: 2, rejected: 0 });
    expect(engine.getRules().map((r) => r.id)).toEqual(['b', 'a']);
    expect(parseBytes(await storage.get('rules_last_sync'))).toBe(Math.floor(FIXED_NOW / 1000));
  });

  it('sends identity headers and the last sync time', async () => {
    const transport = new ScriptedTransport([status(200, { rules: [] }), status(200, { rules: [] })]);
    const sync = client(transport);

    await sync.sync();
    await sync.sync();

    expect(transport.requests.map((r) => r.path)).toEqual([
      '/rules?last_sync=0',
      `/rules?last_sync=${Math.floor(FIXED_NOW / 1000)}`,
    ]);
    expect(transport.requests[0]).toMatchObject({
      method: 'GET',
      headers: { 'X-App-ID': 'app-123', 'X-Device-ID': 'device-9', Accept: 'application/json' },
    });
  });

  it('an empty server set clears the local rules', async () => {
    const transport = new ScriptedTransport([status(200, { rules: [] })]);
    await client(transport).sync();
    expect(engine.getRules()).toEqual([]);
  });

  it('drops invalid rules and keeps the rest', async () => {
    const transport = new ScriptedTransport([
      status(200, { rules: [makeRule({ id: 'ok' }), { id: 'broken', conditions: 'nope' }] }),
    ]);

    const result = await client(transport).sync();

    expect(result).toEqual({ status: 'synced', count: 1, rejected: 1 });
    expect(engine.getRules().map((r) => r.id)).toEqual(['ok']);
  });

  it('skips while offline without a request', async () => {
    const transport = new ScriptedTransport();
    const result = await client(transport, { isOnline: () => false }).sync();
    expect(result).toEqual({ status: 'skipped', reason: 'offline' });
    expect(transport.requests).toHaveLength(0);
  });

  it('skips a second sync while one is in flight', async () => {
    const transport = new GatedTransport();
    const sync = client(transport);

    const first = sync.sync();
    expect(sync.inProgress).toBe(true);
    expect(await sync.sync()).toEqual({ status: 'skipped', reason: 'in_progress' });

    await vi.waitFor(() => expect(transport.requests).toHaveLength(1));
    transport.respond(status(200, { rules: [] }));
    expect((await first).status).toBe('synced');
    expect(sync.inProgress).toBe(false);
    expect(transport.requests).toHaveLength(1);
  });

  it('keeps the current rules when the server errors', async () => {
    const transport = new ScriptedTransport([status(500)]);

    const result = await client(transport).sync();

    expect(result.status === 'failed' && result.error.code).toBe('server_error');
    expect(engine.getRules().map((r) => r.id)).toEqual(['stale']);
    expect(await storage.get('rules_last_sync')).toBeNull();
  });

  it('reports a malformed body as invalid_response', async () => {
    const transport = new ScriptedTransport([status(200, { items: [] })]);
    const result = await client(transport).sync();
    expect(result.status === 'failed' && result.error.code).toBe('invalid_response');
  });

  it('reports network failures', async () => {
    const transport = new ScriptedTransport([new TransportError('transient', 'offline')]);
    const result = await client(transport).sync();
    expect(result.status === 'failed' && result.error.code).toBe('network_unavailable');
  });

  it('a throwing auth token fails the sync without a request', async () => {
    const transport = new ScriptedTransport();
    const locked = {
      ...identity,
      authToken: () => {
        throw new Error('keychain locked');
      },
    };

    const result = await client(transport, { identity: locked }).sync();

    expect(result.status === 'failed' && result.error.code).toBe('unknown');
    expect(transport.requests).toHaveLength(0);
    expect(engine.getRules().map((r) => r.id)).toEqual(['stale']);
  });

  it('lastSync() reads the stored time', async () => {
    await storage.put('rules_last_sync', jsonBytes(1_700_000_000));
    expect(await client(new ScriptedTransport()).lastSync()).toBe(1_700_000_000);
  });
});
