import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NotFoundError, ProviderUnavailableError, SessionExpiredError } from '../lib/godaikin/errors';
import DeviceRegistry from '../lib/registry/DeviceRegistry';
import SessionManager from '../lib/session/SessionManager';
import type { RawState, RegistryEvent } from '../types';
import { FakeCloudApi, TEST_CREDENTIAL, makeShadow } from './helpers/FakeCloudApi';
import { deferred } from './helpers/deferred';

const START = new Date('2024-06-01T08:00:00Z').getTime();

describe('DeviceRegistry', () => {
  let api: FakeCloudApi;
  let session: SessionManager;
  let registry: DeviceRegistry;
  let events: RegistryEvent[];

  beforeEach(async () => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
    api = new FakeCloudApi();
    api.addDevice('ac-1');
    api.addDevice('ac-2', makeShadow({ Set_OnOff: 0 }));
    session = new SessionManager({ provider: api });
    await session.authenticate(TEST_CREDENTIAL);
    registry = new DeviceRegistry({ api, session, staleAfterMs: 60 * 1000 });
    events = [];
    registry.subscribe((event) => {
      events.push(event);
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('discovers devices with capabilities and normalized state', async () => {
    const devices = await registry.discover();

    expect(devices.map((device) => device.id)).toEqual(['ac-1', 'ac-2']);
    expect(events.filter((event) => event.type === 'discovered')).toHaveLength(2);

    const device = registry.get('ac-1');
    expect(device.capabilities.presets).toEqual(['none', 'boost', 'eco']);
    expect(device.capabilities.led).toBe(true);
    expect(device.lastKnownState).toMatchObject({
      power: 'on',
      mode: 'cool',
      targetTemperature: 24,
      currentTemperature: 27,
      outdoorTemperature: 31,
      fanSpeed: 'medium',
      preset: 'none',
      energyKwh: 0,
    });
    expect(device.lastSyncedAt).toBe(START);
    expect(registry.isAvailable('ac-1')).toBe(true);
  });

  it('reports only the fields that changed', async () => {
    await registry.discover();
    events = [];

    const unchanged = await registry.poll();
    expect(unchanged).toEqual([
      { deviceId: 'ac-1', changes: [] },
      { deviceId: 'ac-2', changes: [] },
    ]);
    expect(events).toEqual([]);

    api.report('ac-1', { Set_Temp: 22 });
    const results = await registry.poll();

    expect(results[0]).toEqual({
      deviceId: 'ac-1',
      changes: [{ field: 'targetTemperature', previous: 24, current: 22 }],
    });
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: 'state', deviceId: 'ac-1', origin: 'sync' });
    expect(registry.get('ac-1').lastKnownState?.targetTemperature).toBe(22);
  });

  it('emits a power transition alongside the field change', async () => {
    await registry.discover();
    events = [];

    api.report('ac-1', { Set_OnOff: 0 });
    await registry.poll();

    const power = events.find((event) => event.type === 'power');
    expect(power).toMatchObject({ type: 'power', deviceId: 'ac-1', from: 'on', to: 'off', origin: 'sync' });
  });

  it('keeps the last state of a device whose fetch fails', async () => {
    await registry.discover();
    api.statusFailures.set('ac-2', new ProviderUnavailableError('gateway timeout'));
    api.report('ac-1', { Set_Fan: 3 });

    const results = await registry.poll();

    expect(results[0].changes).toEqual([{ field: 'fanSpeed', previous: 'medium', current: 'high' }]);
    expect(results[1].deviceId).toBe('ac-2');
    expect(results[1].error?.message).toBe('gateway timeout');
    expect(registry.get('ac-2').lastKnownState?.power).toBe('off');
    expect(registry.get('ac-2').lastError).toBe('gateway timeout');
    expect(registry.isAvailable('ac-2')).toBe(true);
  });

  it('reports a status request that never answers as a failure of that device only', async () => {
    registry = new DeviceRegistry({ api, session, pollTimeoutMs: 5000 });
    await registry.discover();
    const hung = deferred<RawState>();
    vi.spyOn(api, 'getStatus').mockReturnValueOnce(hung.promise);
    api.report('ac-2', { Set_OnOff: 1 });

    const polling = registry.poll();
    await vi.advanceTimersByTimeAsync(5000);
    const results = await polling;

    expect(results[0].error).toBeInstanceOf(ProviderUnavailableError);
    expect(results[0].error?.message).toBe('getStatus(ac-1) timed out after 5000ms');
    expect(registry.get('ac-1').lastKnownState?.power).toBe('on');
    expect(results[1]).toEqual({
      deviceId: 'ac-2',
      changes: [{ field: 'power', previous: 'off', current: 'on' }],
    });
  });

  it('marks a device unavailable once its data is stale', async () => {
    await registry.discover();
    api.statusFailures.set('ac-2', new ProviderUnavailableError('unreachable'));
    vi.setSystemTime(START + 61 * 1000);

    await registry.poll();

    expect(registry.isAvailable('ac-1')).toBe(true);
    expect(registry.isAvailable('ac-2')).toBe(false);
    expect(events).toContainEqual({ type: 'availability', deviceId: 'ac-2', available: false });

    api.statusFailures.delete('ac-2');
    await registry.poll();
    expect(registry.isAvailable('ac-2')).toBe(true);
    expect(events).toContainEqual({ type: 'availability', deviceId: 'ac-2', available: true });
  });

  it('propagates authentication failures instead of reporting them per device', async () => {
    await registry.discover();
    api.statusFailures.set('ac-1', new SessionExpiredError());

    await expect(registry.poll()).rejects.toBeInstanceOf(SessionExpiredError);
  });

  it('rebases the energy total when the unit meter resets', async () => {
    api.report('ac-1', { Sta_TotalKWh: 120.4 });
    await registry.discover();
    expect(registry.energyKwh('ac-1')).toBe(120.4);

    api.report('ac-1', { Sta_TotalKWh: 0.3 });
    await registry.poll();

    const reset = events.find((event) => event.type === 'energyReset');
    expect(reset).toMatchObject({ type: 'energyReset', deviceId: 'ac-1', previousRawKwh: 120.4, rawKwh: 0.3 });
    expect(registry.get('ac-1').lastKnownState?.energyKwh).toBeCloseTo(120.7, 6);
  });

  it('drops a status response that arrives after a newer one', async () => {
    await registry.discover();
    const older = deferred<RawState>();
    const newer = deferred<RawState>();
    vi.spyOn(api, 'getStatus').mockReturnValueOnce(older.promise).mockReturnValueOnce(newer.promise);

    const first = registry.refresh('ac-1');
    const second = registry.refresh('ac-1');
    await vi.advanceTimersByTimeAsync(0);

    newer.resolve(makeShadow({ Set_Temp: 20 }));
    await second;
    older.resolve(makeShadow({ Set_Temp: 26 }));
    await first;

    expect(registry.get('ac-1').lastKnownState?.targetTemperature).toBe(20);
  });

  it('adds and removes devices on rediscovery', async () => {
    await registry.discover();
    api.removeDevice('ac-2');
    api.addDevice('ac-3');

    const devices = await registry.discover();

    expect(devices.map((device) => device.id)).toEqual(['ac-1', 'ac-3']);
    expect(events).toContainEqual({ type: 'removed', deviceId: 'ac-2' });
    expect(registry.has('ac-2')).toBe(false);
  });

  it('projects optimistic commands over the confirmed state', async () => {
    await registry.discover();
    events = [];

    registry.setOptimistic('ac-1', { mode: 'fan' }, 'user');

    expect(registry.get('ac-1').lastKnownState?.mode).toBe('fan');
    expect(registry.confirmedState('ac-1')?.mode).toBe('cool');
    expect(events[0]).toMatchObject({ type: 'state', origin: 'user' });

    registry.clearOptimistic('ac-1', 'user');
    expect(registry.get('ac-1').lastKnownState?.mode).toBe('cool');
  });

  it('rejects unknown device ids', () => {
    expect(() => registry.get('missing')).toThrow(NotFoundError);
  });
});
