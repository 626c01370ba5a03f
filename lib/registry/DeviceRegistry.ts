import type {
  ChangeOrigin,
  Device,
  DeviceCommand,
  DeviceDescriptor,
  DeviceState,
  FieldChange,
  RawState,
  RegistryEvent,
  RegistryListener,
} from '../../types';
import type { CloudApi } from '../godaikin/CloudApi';
import {
  InvalidCredentialsError,
  NotFoundError,
  SessionExpiredError,
  SyncError,
  errorMessage,
} from '../godaikin/errors';
import { diffStates, mapCapabilities, mapDeviceState, projectCommand } from '../godaikin/Mappers';
import type { Logger } from '../logger';
import type { SessionManager } from '../session/SessionManager';
import { withTimeout } from '../timeout';
import EnergyCounter from './EnergyCounter';

export type CommandOrigin = Exclude<ChangeOrigin, 'sync'>;

export interface DeviceRegistryOptions {
  api: CloudApi;
  session: SessionManager;
  energy?: EnergyCounter;
  pollTimeoutMs?: number;
  /** A device with no successful sync for this long is reported unavailable */
  staleAfterMs?: number;
  logger?: Logger;
  debug?: boolean;
}

export interface PollResult {
  deviceId: string;
  changes: FieldChange[];
  error?: Error;
}

interface DeviceRecord {
  device: Device;
  overlay?: { command: DeviceCommand; origin: CommandOrigin };
  /** Sequence of the latest fetch started / applied, so late responses are dropped */
  fetchSeq: number;
  appliedSeq: number;
  available: boolean;
}

const isAuthFailure = (error: unknown): boolean =>
  error instanceof InvalidCredentialsError || error instanceof SessionExpiredError;

/**
 * In-process snapshot of every unit on the account. Confirmed state is only
 * written by `discover`, `poll` and `refresh`; the optimistic overlay only by
 * the command dispatcher. Observers see the overlay projected onto the
 * confirmed state.
 */
export class DeviceRegistry {
  private readonly api: CloudApi;
  private readonly session: SessionManager;
  private readonly energy: EnergyCounter;
  private readonly pollTimeoutMs: number;
  private readonly staleAfterMs: number;
  private readonly logger?: Logger;
  private readonly debug: boolean;
  private readonly records = new Map<string, DeviceRecord>();
  private readonly listeners = new Set<RegistryListener>();
  private readonly outbox: RegistryEvent[] = [];
  private emitting = false;

  constructor(options: DeviceRegistryOptions) {
    this.api = options.api;
    this.session = options.session;
    this.energy = options.energy ?? new EnergyCounter();
    this.pollTimeoutMs = options.pollTimeoutMs ?? 10000;
    this.staleAfterMs = options.staleAfterMs ?? 5 * 60 * 1000;
    this.logger = options.logger;
    this.debug = Boolean(options.debug);
  }

  async discover(): Promise<Device[]> {
    let descriptors: DeviceDescriptor[];
    try {
      descriptors = await this.session.withSession((token) =>
        withTimeout(this.api.listDevices(token), this.pollTimeoutMs, 'listDevices'),
      );
    } catch (error) {
      if (isAuthFailure(error)) {
        throw error;
      }
      this.logError('Discovery failed: %s', errorMessage(error));
      throw new SyncError(`Device discovery failed: ${errorMessage(error)}`, { cause: error });
    }

    const seen = new Set<string>();
    for (const descriptor of descriptors) {
      seen.add(descriptor.id);
      const existing = this.records.get(descriptor.id);
      if (existing) {
        // Identity and capabilities stay fixed; only descriptive fields move.
        existing.device.descriptor = { ...descriptor, shadow: descriptor.shadow ?? existing.device.descriptor.shadow };
        existing.device.name = descriptor.name;
        continue;
      }
      await this.add(descriptor);
    }

    for (const id of Array.from(this.records.keys())) {
      if (!seen.has(id)) {
        this.records.delete(id);
        this.energy.forget(id);
        this.logInfo('Device %s no longer on account, removed', id);
        this.emit({ type: 'removed', deviceId: id });
      }
    }

    this.logInfo('Discovered %d device(s)', this.records.size);
    return this.list();
  }

  /**
   * Fetches every known device once. One device failing leaves its previous
   * state in place and does not affect the others; only authentication
   * failures reject the whole cycle.
   */
  async poll(): Promise<PollResult[]> {
    await this.session.ensureValid();

    const records = Array.from(this.records.values());
    const results = await Promise.all(
      records.map(async (record): Promise<PollResult> => {
        const deviceId = record.device.id;
        try {
          const changes = await this.fetch(record);
          return { deviceId, changes };
        } catch (error) {
          if (isAuthFailure(error)) {
            throw error;
          }
          const failure = error instanceof Error ? error : new Error(String(error));
          record.device.lastError = failure.message;
          this.logError('Poll failed for %s: %s', deviceId, failure.message);
          return { deviceId, changes: [], error: failure };
        } finally {
          this.updateAvailability(record);
        }
      }),
    );

    this.logDebug('Poll cycle finished for %d device(s)', results.length);
    return results;
  }

  /** Fetches a single device now; used to confirm commands. */
  async refresh(deviceId: string): Promise<DeviceState | undefined> {
    const record = this.requireRecord(deviceId);
    try {
      await this.fetch(record);
    } finally {
      this.updateAvailability(record);
    }
    return record.device.lastKnownState;
  }

  get(deviceId: string): Device {
    return this.snapshot(this.requireRecord(deviceId));
  }

  has(deviceId: string): boolean {
    return this.records.has(deviceId);
  }

  list(): Device[] {
    return Array.from(this.records.values()).map((record) => this.snapshot(record));
  }

  confirmedState(deviceId: string): DeviceState | undefined {
    return this.requireRecord(deviceId).device.confirmedState;
  }

  isAvailable(deviceId: string): boolean {
    return this.computeAvailability(this.requireRecord(deviceId));
  }

  energyKwh(deviceId: string): number {
    return this.energy.get(deviceId);
  }

  subscribe(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setOptimistic(deviceId: string, command: DeviceCommand, origin: CommandOrigin): FieldChange[] {
    const record = this.requireRecord(deviceId);
    record.overlay = { command, origin };
    record.device.lastCommandInFlight = command;
    return this.publish(record, origin);
  }

  clearOptimistic(deviceId: string, origin: CommandOrigin): FieldChange[] {
    const record = this.records.get(deviceId);
    if (!record) {
      return [];
    }
    record.overlay = undefined;
    record.device.lastCommandInFlight = undefined;
    return this.publish(record, origin);
  }

  private async add(descriptor: DeviceDescriptor): Promise<void> {
    let shadow = descriptor.shadow;
    if (!shadow) {
      try {
        shadow = await this.session.withSession((token) =>
          withTimeout(this.api.getStatus(token, descriptor), this.pollTimeoutMs, `getStatus(${descriptor.id})`),
        );
      } catch (error) {
        if (isAuthFailure(error)) {
          throw error;
        }
        this.logError('Capability fetch failed for %s: %s', descriptor.id, errorMessage(error));
      }
    }

    const record: DeviceRecord = {
      device: {
        id: descriptor.id,
        name: descriptor.name,
        descriptor,
        capabilities: mapCapabilities(shadow),
      },
      fetchSeq: 0,
      appliedSeq: 0,
      available: false,
    };
    this.records.set(descriptor.id, record);
    this.emit({ type: 'discovered', device: this.snapshot(record) });

    if (shadow) {
      this.applyShadow(record, shadow);
    }
    this.updateAvailability(record);
  }

  private async fetch(record: DeviceRecord): Promise<FieldChange[]> {
    const deviceId = record.device.id;
    record.fetchSeq += 1;
    const seq = record.fetchSeq;

    const shadow = await this.session.withSession((token) =>
      withTimeout(this.api.getStatus(token, record.device.descriptor), this.pollTimeoutMs, `getStatus(${deviceId})`),
    );

    if (this.records.get(deviceId) !== record) {
      return [];
    }
    if (seq < record.appliedSeq) {
      this.logDebug('Dropping out-of-order status for %s (seq %d < %d)', deviceId, seq, record.appliedSeq);
      return [];
    }
    record.appliedSeq = seq;
    return this.applyShadow(record, shadow);
  }

  private applyShadow(record: DeviceRecord, shadow: RawState): FieldChange[] {
    const deviceId = record.device.id;
    const now = Date.now();
    const { meterKwh, ...reading } = mapDeviceState(shadow, record.device.descriptor.connected, now);
    const energy = this.energy.record(deviceId, { watts: reading.powerWatts, meterKwh, at: now });

    if (energy.reset) {
      this.logInfo('Energy meter of %s went from %d to %d kWh, rebased', deviceId, energy.reset.previousRawKwh, energy.reset.rawKwh);
      this.emit({
        type: 'energyReset',
        deviceId,
        previousRawKwh: energy.reset.previousRawKwh,
        rawKwh: energy.reset.rawKwh,
        totalKwh: energy.totalKwh,
      });
    }

    record.device.confirmedState = { ...reading, energyKwh: energy.totalKwh };
    record.device.descriptor = { ...record.device.descriptor, shadow };
    record.device.lastSyncedAt = now;
    record.device.lastError = undefined;
    return this.publish(record, 'sync');
  }

  private publish(record: DeviceRecord, origin: ChangeOrigin): FieldChange[] {
    const confirmed = record.device.confirmedState;
    if (!confirmed) {
      return [];
    }

    const previous = record.device.lastKnownState;
    const next = record.overlay ? projectCommand(confirmed, record.overlay.command) : confirmed;
    record.device.lastKnownState = next;

    const changes = diffStates(previous, next);
    if (changes.length === 0) {
      return changes;
    }

    const deviceId = record.device.id;
    this.emit({ type: 'state', deviceId, changes, state: next, origin });
    if (previous && previous.power !== next.power) {
      this.emit({ type: 'power', deviceId, from: previous.power, to: next.power, state: next, origin });
    }
    return changes;
  }

  private computeAvailability(record: DeviceRecord): boolean {
    const { lastSyncedAt, descriptor, confirmedState } = record.device;
    if (lastSyncedAt === undefined || !descriptor.connected || confirmedState?.connected === false) {
      return false;
    }
    return Date.now() - lastSyncedAt <= this.staleAfterMs;
  }

  private updateAvailability(record: DeviceRecord): void {
    const available = this.computeAvailability(record);
    if (available !== record.available) {
      record.available = available;
      this.emit({ type: 'availability', deviceId: record.device.id, available });
    }
  }

  private requireRecord(deviceId: string): DeviceRecord {
    const record = this.records.get(deviceId);
    if (!record) {
      throw new NotFoundError(deviceId);
    }
    return record;
  }

  private snapshot(record: DeviceRecord): Device {
    return { ...record.device };
  }

  /**
   * Events raised by a listener are delivered after the current one has
   * reached every listener, so all observers see transitions in order.
   */
  private emit(event: RegistryEvent): void {
    this.outbox.push(event);
    if (this.emitting) {
      return;
    }

    this.emitting = true;
    try {
      for (let next = this.outbox.shift(); next; next = this.outbox.shift()) {
        for (const listener of this.listeners) {
          try {
            listener(next);
          } catch (error) {
            this.logError('Listener for "%s" failed: %s', next.type, errorMessage(error));
          }
        }
      }
    } finally {
      this.emitting = false;
    }
  }

  private logInfo(message: string, ...args: unknown[]): void {
    this.logger?.log(this.formatLog(message), ...args);
  }

  private logDebug(message: string, ...args: unknown[]): void {
    if (this.debug) {
      this.logInfo(message, ...args);
    }
  }

  private logError(message: string, ...args: unknown[]): void {
    this.logger?.error(this.formatLog(message), ...args);
  }

  private formatLog(message: string): string {
    return `[DeviceRegistry] ${message}`;
  }
}

export default DeviceRegistry;
