import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import CommandDispatcher from '../lib/commands/CommandDispatcher';
import type { CommandDispatcherOptions, CommandNotice } from '../lib/commands/CommandDispatcher';
import {
  BusyError,
  CommandError,
  GoDaikinError,
  NotFoundError,
  ProviderUnavailableError,
  StaleConfirmationError,
  UnsupportedError,
} from '../lib/godaikin/errors';
import type { CommandReceipt } from '../lib/godaikin/CloudApi';
import DeviceRegistry from '../lib/registry/DeviceRegistry';
import SessionManager from '../lib/session/SessionManager';
import type { CommandAck, RegistryEvent } from '../types';
import { FakeCloudApi, TEST_CREDENTIAL } from './helpers/FakeCloudApi';
import { deferred } from './helpers/deferred';

describe('CommandDispatcher', () => {
  let api: FakeCloudApi;
  let session: SessionManager;
  let registry: DeviceRegistry;
  let events: RegistryEvent[];

  const createDispatcher = (options: Partial<CommandDispatcherOptions> = {}): CommandDispatcher =>
    new CommandDispatcher({
      registry,
      session,
      api,
      retryLimit: 2,
      backoffBaseMs: 100,
      confirmAttempts: 3,
      confirmDelayMs: 1000,
      ...options,
    });

  beforeEach(async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-06-01T08:00:00Z'));
    api = new FakeCloudApi();
    api.addDevice('ac-1');
    session = new SessionManager({ provider: api });
    await session.authenticate(TEST_CREDENTIAL);
    registry = new DeviceRegistry({ api, session });
    await registry.discover();
    events = [];
    registry.subscribe((event) => {
      events.push(event);
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('rejects a preset the unit lacks without touching state or network', async () => {
    const dispatcher = createDispatcher();
    const before = registry.get('ac-1').lastKnownState;

    await expect(dispatcher.apply('ac-1', { preset: 'comfort' })).rejects.toBeInstanceOf(UnsupportedError);

    expect(api.sendAttempts).toBe(0);
    expect(events).toEqual([]);
    expect(registry.get('ac-1').lastKnownState).toEqual(before);
  });

  it('rejects modes outside the capability set', async () => {
    const dispatcher = createDispatcher();

    await expect(dispatcher.apply('ac-1', { mode: 'heat' })).rejects.toBeInstanceOf(UnsupportedError);
    await expect(dispatcher.apply('ac-1', {})).rejects.toBeInstanceOf(UnsupportedError);
    await expect(dispatcher.apply('missing', { power: 'on' })).rejects.toBeInstanceOf(NotFoundError);
    expect(api.sendAttempts).toBe(0);
  });

  it('shows the intent at once and confirms it from the next poll', async () => {
    const dispatcher = createDispatcher();

    const pending = dispatcher.apply('ac-1', { mode: 'fan' });

    expect(registry.get('ac-1').lastKnownState).toMatchObject({
      power: 'on',
      mode: 'fan',
      targetTemperature: 24,
      currentTemperature: 27,
    });
    expect(registry.confirmedState('ac-1')?.mode).toBe('cool');

    await vi.advanceTimersByTimeAsync(1000);
    const ack = await pending;

    expect(ack).toEqual({ deviceId: 'ac-1', status: 'confirmed', command: { mode: 'fan' }, attempts: 1, coalesced: false });
    expect(api.sent).toEqual([{ deviceId: 'ac-1', command: { Set_OnOff: 1, Set_Mode: 3 } }]);
    expect(registry.confirmedState('ac-1')?.mode).toBe('fan');
    expect(registry.get('ac-1').lastKnownState?.mode).toBe('fan');
    expect(registry.get('ac-1').lastCommandInFlight).toBeUndefined();
  });

  it('sends an identical command only once while it is in flight', async () => {
    const dispatcher = createDispatcher();

    const first = dispatcher.apply('ac-1', { targetTemperature: 20 });
    const second = dispatcher.apply('ac-1', { targetTemperature: 20 });
    await vi.advanceTimersByTimeAsync(1000);

    const [firstAck, secondAck] = await Promise.all([first, second]);
    expect(api.sent).toEqual([{ deviceId: 'ac-1', command: { Set_Temp: 20 } }]);
    expect(firstAck).toMatchObject({ status: 'confirmed', coalesced: false });
    expect(secondAck).toMatchObject({ status: 'confirmed', coalesced: true });
    expect(registry.confirmedState('ac-1')?.targetTemperature).toBe(20);
  });

  it('replaces a queued command with the newest intent', async () => {
    const dispatcher = createDispatcher();

    const first = dispatcher.apply('ac-1', { targetTemperature: 20 });
    const replaced = dispatcher.apply('ac-1', { targetTemperature: 21 });
    const latest = dispatcher.apply('ac-1', { targetTemperature: 22 });

    expect(registry.get('ac-1').lastKnownState?.targetTemperature).toBe(22);

    await vi.advanceTimersByTimeAsync(2000);
    const [firstAck, replacedAck, latestAck] = await Promise.all([first, replaced, latest]);

    expect(api.sent.map((entry) => entry.command)).toEqual([{ Set_Temp: 20 }, { Set_Temp: 22 }]);
    expect(firstAck).toMatchObject({ command: { targetTemperature: 20 }, coalesced: false });
    expect(replacedAck).toMatchObject({ command: { targetTemperature: 22 }, status: 'confirmed', coalesced: true });
    expect(latestAck).toMatchObject({ command: { targetTemperature: 22 }, status: 'confirmed', coalesced: false });
    expect(registry.get('ac-1').lastKnownState?.targetTemperature).toBe(22);
  });

  it('rejects a second command under the reject policy', async () => {
    const dispatcher = createDispatcher({ busyPolicy: 'reject' });

    const first = dispatcher.apply('ac-1', { targetTemperature: 20 });
    await expect(dispatcher.apply('ac-1', { targetTemperature: 21 })).rejects.toBeInstanceOf(BusyError);
    expect(dispatcher.isBusy('ac-1')).toBe(true);

    await vi.advanceTimersByTimeAsync(1000);
    await expect(first).resolves.toMatchObject({ status: 'confirmed' });
    expect(dispatcher.isBusy('ac-1')).toBe(false);
  });

  it('retries transient send failures with backoff', async () => {
    const dispatcher = createDispatcher();
    api.commandFailures = [new ProviderUnavailableError('503'), new ProviderUnavailableError('503')];

    const pending = dispatcher.apply('ac-1', { fanSpeed: 'high' });
    await vi.advanceTimersByTimeAsync(100);
    expect(api.sendAttempts).toBe(2);
    await vi.advanceTimersByTimeAsync(200);
    expect(api.sendAttempts).toBe(3);
    await vi.advanceTimersByTimeAsync(1000);

    await expect(pending).resolves.toMatchObject({ status: 'confirmed', attempts: 3 });
  });

  it('reverts the optimistic state once retries run out', async () => {
    const dispatcher = createDispatcher();
    api.commandFailures = [
      new ProviderUnavailableError('503'),
      new ProviderUnavailableError('503'),
      new ProviderUnavailableError('503'),
    ];

    const pending = dispatcher.apply('ac-1', { targetTemperature: 18 });
    const failed = expect(pending).rejects.toMatchObject({ code: 'COMMAND_FAILED', attempts: 3 });
    expect(registry.get('ac-1').lastKnownState?.targetTemperature).toBe(18);

    await vi.advanceTimersByTimeAsync(300);
    await failed;

    expect(api.sendAttempts).toBe(3);
    expect(api.sent).toEqual([]);
    expect(registry.get('ac-1').lastKnownState?.targetTemperature).toBe(24);
    const temperatures = events
      .filter((event) => event.type === 'state')
      .map((event) => (event.type === 'state' ? event.state.targetTemperature : undefined));
    expect(temperatures).toEqual([18, 24]);
  });

  it('does not retry a request the API refused outright', async () => {
    const dispatcher = createDispatcher();
    api.commandFailures = [new GoDaikinError('SYNC_FAILED', 'bad request')];

    const error = await dispatcher.apply('ac-1', { ledOn: false }).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(CommandError);
    expect(api.sendAttempts).toBe(1);
    expect(registry.get('ac-1').lastKnownState?.ledOn).toBe(true);
  });

  it('reverts and warns when the unit never reports the change', async () => {
    const dispatcher = createDispatcher();
    api.applyCommands = false;

    const pending = dispatcher.apply('ac-1', { targetTemperature: 20 });
    await vi.advanceTimersByTimeAsync(1000 + 2000 + 4000);
    const ack = await pending;

    expect(ack.status).toBe('stale');
    expect(ack.warning).toBeInstanceOf(StaleConfirmationError);
    expect(api.sent).toHaveLength(1);
    expect(registry.get('ac-1').lastKnownState?.targetTemperature).toBe(24);
  });

  it('confirms a change the unit only reports on a later poll', async () => {
    const dispatcher = createDispatcher();
    api.applyCommands = false;
    const readStatus = api.getStatus.bind(api);
    let polls = 0;
    vi.spyOn(api, 'getStatus').mockImplementation(async (token, device) => {
      polls += 1;
      if (polls === 2) {
        api.report('ac-1', { Set_Temp: 20 });
      }
      return readStatus(token, device);
    });

    const pending = dispatcher.apply('ac-1', { targetTemperature: 20 });
    await vi.advanceTimersByTimeAsync(1000 + 2000);

    await expect(pending).resolves.toMatchObject({ status: 'confirmed', attempts: 1 });
    expect(polls).toBe(2);
    expect(registry.confirmedState('ac-1')?.targetTemperature).toBe(20);
  });

  it('cancels and reverts a send that never completes', async () => {
    const dispatcher = createDispatcher({ retryLimit: 0, commandTimeoutMs: 5000 });
    const hung = deferred<CommandReceipt>();
    let signal: AbortSignal | undefined;
    vi.spyOn(api, 'sendCommand').mockImplementationOnce((_token, _device, _command, options) => {
      signal = options?.signal;
      return hung.promise;
    });

    const pending = dispatcher.apply('ac-1', { targetTemperature: 18 });
    const failed = expect(pending).rejects.toBeInstanceOf(CommandError);
    expect(registry.get('ac-1').lastKnownState?.targetTemperature).toBe(18);
    await vi.advanceTimersByTimeAsync(5000);
    await failed;

    expect(signal?.aborted).toBe(true);
    expect(registry.get('ac-1').lastKnownState?.targetTemperature).toBe(24);
    expect(dispatcher.isBusy('ac-1')).toBe(false);
  });

  it('tells command listeners when a command is accepted and when it is confirmed', async () => {
    const dispatcher = createDispatcher();
    const listener = vi.fn<(notice: CommandNotice) => void>();
    dispatcher.onCommand(listener);

    const pending = dispatcher.apply('ac-1', { power: 'off' });
    expect(listener).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1000);
    await pending;

    expect(listener.mock.calls).toEqual([
      [{ deviceId: 'ac-1', command: { power: 'off' }, origin: 'user', stage: 'accepted' }],
      [{ deviceId: 'ac-1', command: { power: 'off' }, origin: 'user', stage: 'confirmed' }],
    ]);
  });

  it('does not report a failed command as confirmed', async () => {
    const dispatcher = createDispatcher();
    const listener = vi.fn<(notice: CommandNotice) => void>();
    dispatcher.onCommand(listener);
    api.commandFailures = [new GoDaikinError('SYNC_FAILED', 'bad request')];

    await expect(dispatcher.apply('ac-1', { power: 'off' })).rejects.toBeInstanceOf(CommandError);

    expect(listener.mock.calls.map(([notice]) => notice.stage)).toEqual(['accepted']);
  });

  it('runs a command applied by a listener after the one it follows', async () => {
    const dispatcher = createDispatcher();
    const followUps: Array<Promise<CommandAck>> = [];
    dispatcher.onCommand((notice) => {
      if (notice.stage === 'confirmed' && notice.command.power === 'off') {
        followUps.push(dispatcher.apply('ac-1', { fanSpeed: 'low' }, { origin: 'mold-proof' }));
      }
    });

    const off = dispatcher.apply('ac-1', { power: 'off' });
    await vi.advanceTimersByTimeAsync(1000);
    await off;
    expect(followUps).toHaveLength(1);
    expect(dispatcher.isBusy('ac-1')).toBe(true);

    await vi.advanceTimersByTimeAsync(1000);
    await expect(Promise.all(followUps)).resolves.toMatchObject([{ status: 'confirmed', attempts: 1 }]);

    expect(api.sent.map((entry) => entry.command)).toEqual([{ Set_OnOff: 0 }, { Set_Fan: 1 }]);
    expect(dispatcher.isBusy('ac-1')).toBe(false);
  });
});
