import { describe, it, expect, beforeEach } from 'vitest';
import { UserProfileStore } from '../../src/application/user-profile.js';
import { MemoryKeyValueStore } from '../../src/infrastructure/storage/memory-store.js';
import { fakeLogger, jsonBytes, parseBytes } from '../helpers.js';

describe('UserProfileStore', () => {
  let log: ReturnType<typeof fakeLogger>;
  let storage: MemoryKeyValueStore;

  beforeEach(() => {
    log = fakeLogger();
    storage = new MemoryKeyValueStore();
  });

  it('starts anonymous', () => {
    expect(new UserProfileStore(storage, log).current()).toEqual({ user_id: null, attributes: {} });
  });

  it('identify() sets the id and merges attributes', async () => {
    const profiles = new UserProfileStore(storage, log);
    await profiles.identify('u-1', { tier: 'gold', age: 30 });
    const profile = await profiles.identify('u-2', { tier: 'silver' });

    expect(profile).toEqual({ user_id: 'u-2', attributes: { tier: 'silver', age: 30 } });
    expect(parseBytes(await storage.get('user_profile'))).toEqual(profile);
  });

  it('sets and removes single attributes', async () => {
    const profiles = new UserProfileStore(storage, log);
    await profiles.setAttribute('plan', 'pro');
    await profiles.setAttribute('beta', true);
    const profile = await profiles.removeAttribute('plan');

    expect(profile).toEqual({ user_id: null, attributes: { beta: true } });
  });

  it('reset() returns to anonymous and deletes the record', async () => {
    const profiles = new UserProfileStore(storage, log);
    await profiles.identify('u-1');
    await profiles.reset();

    expect(profiles.current()).toEqual({ user_id: null, attributes: {} });
    expect(await storage.get('user_profile')).toBeNull();
  });

  it('load() restores a stored profile and discards a corrupt one', async () => {
    await storage.put('user_profile', jsonBytes({ user_id: 'u-7', attributes: { vip: true } }));
    expect(await new UserProfileStore(storage, log).load()).toEqual({ user_id: 'u-7', attributes: { vip: true } });

    await storage.put('user_profile', jsonBytes({ user_id: 7 }));
    expect(await new UserProfileStore(storage, log).load()).toEqual({ user_id: null, attributes: {} });
    expect(await storage.get('user_profile')).toBeNull();
  });
});
