import { describe, it, expect } from 'vitest';
import { EventFactory, validateTrackInput } from '../../src/application/event-factory.js';
import type { LocationProvider } from '../../src/application/ports.js';
import { FIXED_NOW, sequentialIds, staticDevice } from '../helpers.js';

describe('validateTrackInput', () => {
  it('accepts a valid call and defaults the properties', () => {
    expect(validateTrackInput('purchase', undefined)).toEqual({
      ok: true,
      value: { name: 'purchase', properties: {} },
    });
  });

  it('trims the name', () => {
    const result = validateTrackInput('  add_to-cart ', { sku: 'A1' });
    expect(result.ok && result.value.name).toBe('add_to-cart');
  });

  it.each(['', '   ', 'bad name', 'emoji🎉', 'x'.repeat(101)])('rejects the name %j', (name) => {
    const result = validateTrackInput(name, {});
    expect(!result.ok && result.error.code).toBe('invalid_event_name');
  });

  it('rejects a non-string name', () => {
    const result = validateTrackInput(42, {});
    expect(!result.ok && result.error.code).toBe('invalid_event_name');
  });

  it('accepts a name of exactly 100 characters', () => {
    expect(validateTrackInput('x'.repeat(100), {}).ok).toBe(true);
  });

  it('rejects too many properties', () => {
    const properties = Object.fromEntries(Array.from({ length: 51 }, (_, i) => [`k${i}`, i]));
    const result = validateTrackInput('purchase', properties);
    expect(!result.ok && result.error.code).toBe('invalid_event_data');
  });

  it('rejects long keys, long strings and non-finite numbers', () => {
    for (const properties of [{ ['k'.repeat(51)]: 1 }, { note: 'x'.repeat(501) }, { value: Number.NaN }]) {
      const result = validateTrackInput('purchase', properties);
      expect(!result.ok && result.error.code).toBe('invalid_event_data');
    }
  });

  it('accepts nested JSON values', () => {
    const properties = { items: [{ sku: 'A1', qty: 2 }], meta: { gift: false, note: null } };
    const result = validateTrackInput('purchase', properties);
    expect(result.ok && result.value.properties).toEqual(properties);
  });
});

describe('EventFactory', () => {
  const here = { latitude: 52.52, longitude: 13.4, accuracy: 5, timestamp: FIXED_NOW };
  const location: LocationProvider = { currentLocation: () => here };

  function factory(locationAllowed: boolean): EventFactory {
    return new EventFactory({
      sdkVersion: '0.1.0',
      device: staticDevice,
      location,
      locationAllowed: () => locationAllowed,
      idFn: sequentialIds('evt'),
      nowFn: () => FIXED_NOW,
    });
  }

  it('stamps id, timestamp, device and sdk version', () => {
    const event = factory(false).build({
      name: 'purchase',
      properties: { value: 9.99 },
      session_id: 's-1',
      user_id: 'u-1',
    });

    expect(event).toEqual({
      event_id: 'evt-1',
      name: 'purchase',
      timestamp: '2026-02-18T12:00:00.000Z',
      session_id: 's-1',
      user_id: 'u-1',
      properties: { value: 9.99, sdk_version: '0.1.0' },
      device: { platform: 'ios', os_version: '17.4', device_model: 'iPhone15,2' },
      location: null,
    });
  });

  it('attaches a location only when allowed', () => {
    const draft = { name: 'visit', properties: {}, session_id: null, user_id: null };
    expect(factory(true).build(draft).location).toEqual(here);
    expect(factory(false).build(draft).location).toBeNull();
  });
});
