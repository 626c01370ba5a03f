import type { DeviceCommand, FanSpeed, MoldProofTimer, RegistryEvent } from '../../types';
import type { CommandDispatcher, CommandNotice } from '../commands/CommandDispatcher';
import { errorMessage } from '../godaikin/errors';
import type { Logger } from '../logger';
import type { DeviceRegistry } from '../registry/DeviceRegistry';

export interface MoldProofSchedulerOptions {
  registry: DeviceRegistry;
  dispatcher: CommandDispatcher;
  /** Applies to devices without their own override */
  enabled?: boolean;
  durationMs?: number;
  logger?: Logger;
  debug?: boolean;
}

interface CycleRecord extends MoldProofTimer {
  handle?: ReturnType<typeof setTimeout>;
  busy: boolean;
}

const FAN_ONLY: DeviceCommand = { mode: 'fan', fanSpeed: 'low' };

/**
 * Runs the unit on fan only for a while after it is switched off, drying the
 * coil. Purely client side; commands go through the dispatcher with the
 * `mold-proof` origin so the scheduler can tell its own power events apart.
 */
export class MoldProofScheduler {
  private readonly registry: DeviceRegistry;
  private readonly dispatcher: CommandDispatcher;
  private readonly defaultEnabled: boolean;
  private readonly durationMs: number;
  private readonly logger?: Logger;
  private readonly debug: boolean;
  private readonly cycles = new Map<string, CycleRecord>();
  private readonly overrides = new Map<string, boolean>();
  /** Devices whose next observed power-off came from a user cancelling the cycle */
  private readonly suppressed = new Set<string>();
  private readonly inflight = new Set<Promise<void>>();
  private unsubscribers: Array<() => void> = [];

  constructor(options: MoldProofSchedulerOptions) {
    this.registry = options.registry;
    this.dispatcher = options.dispatcher;
    this.defaultEnabled = Boolean(options.enabled);
    this.durationMs = options.durationMs ?? 60 * 60 * 1000;
    this.logger = options.logger;
    this.debug = Boolean(options.debug);
  }

  start(): void {
    if (this.unsubscribers.length > 0) {
      return;
    }
    this.unsubscribers = [
      this.registry.subscribe((event) => this.handleEvent(event)),
      this.dispatcher.onCommand((notice) => this.handleCommand(notice)),
    ];
  }

  handleEvent(event: RegistryEvent): void {
    if (event.type === 'removed') {
      this.cancel(event.deviceId, 'device removed');
      return;
    }
    if (event.type !== 'power' || event.origin === 'mold-proof') {
      return;
    }

    const { deviceId } = event;
    if (event.to === 'on') {
      this.suppressed.delete(deviceId);
      if (this.cycles.has(deviceId)) {
        this.cancel(deviceId, 'unit switched on');
      }
      return;
    }

    // Optimistic power-offs are not observed yet; a user's command arms
    // through its confirmation notice instead.
    if (event.origin === 'sync') {
      this.handlePowerOff(deviceId);
    }
  }

  handleCommand(notice: CommandNotice): void {
    if (notice.origin === 'mold-proof') {
      return;
    }
    const { deviceId, command } = notice;

    if (notice.stage === 'confirmed') {
      if (command.power === 'off') {
        this.handlePowerOff(deviceId);
      }
      return;
    }

    if (!this.cycles.has(deviceId)) {
      return;
    }
    if (command.power === 'off') {
      this.suppressed.add(deviceId);
    }
    this.cancel(deviceId, 'superseded by user command');
  }

  setEnabled(deviceId: string, enabled: boolean): void {
    this.overrides.set(deviceId, enabled);
    this.logInfo('Mold-proof %s for %s', enabled ? 'enabled' : 'disabled', deviceId);
    if (!enabled) {
      this.cancel(deviceId, 'disabled');
    }
  }

  isEnabled(deviceId: string): boolean {
    return this.overrides.get(deviceId) ?? this.defaultEnabled;
  }

  /** Retries any fire or finish that failed earlier; driven by the poll scheduler. */
  tick(now: number = Date.now()): void {
    for (const cycle of this.cycles.values()) {
      if (cycle.busy) {
        continue;
      }
      if (cycle.state === 'Armed') {
        this.track(this.fire(cycle));
      } else if (cycle.state === 'Running' && cycle.endsAt !== undefined && cycle.endsAt <= now) {
        this.track(this.finish(cycle));
      }
    }
  }

  getTimer(deviceId: string): MoldProofTimer {
    const cycle = this.cycles.get(deviceId);
    if (!cycle) {
      return { deviceId, state: 'Idle' };
    }
    return {
      deviceId,
      state: cycle.state,
      armedAt: cycle.armedAt,
      fireAt: cycle.fireAt,
      startedAt: cycle.startedAt,
      endsAt: cycle.endsAt,
      previousFanSpeed: cycle.previousFanSpeed,
    };
  }

  getRemainingSeconds(deviceId: string, now: number = Date.now()): number {
    const cycle = this.cycles.get(deviceId);
    if (!cycle || cycle.state !== 'Running' || cycle.endsAt === undefined) {
      return 0;
    }
    return Math.max(0, Math.floor((cycle.endsAt - now) / 1000));
  }

  /** Resolves once every command the scheduler started has finished. */
  async settle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled(Array.from(this.inflight));
    }
  }

  dispose(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
    for (const cycle of this.cycles.values()) {
      this.stopTimer(cycle);
      cycle.state = 'Cancelled';
    }
    this.cycles.clear();
    this.suppressed.clear();
  }

  private handlePowerOff(deviceId: string): void {
    if (this.suppressed.delete(deviceId)) {
      this.logDebug('Power-off of %s follows a cancelled cycle, not arming', deviceId);
      return;
    }
    if (this.cycles.has(deviceId)) {
      // Switched off from outside while the cycle ran.
      this.cancel(deviceId, 'unit switched off externally');
      return;
    }
    const state = this.registry.confirmedState(deviceId);
    if (!this.isEnabled(deviceId) || !state || state.power !== 'off' || this.dispatcher.isBusy(deviceId)) {
      return;
    }
    this.arm(deviceId, state.fanSpeed);
  }

  private arm(deviceId: string, previousFanSpeed: FanSpeed): void {
    const { capabilities } = this.registry.get(deviceId);
    if (!capabilities.modes.includes('fan') || !capabilities.fanSpeeds.includes('low')) {
      this.logDebug('%s has no fan-only low speed, skipping mold-proof', deviceId);
      return;
    }

    const now = Date.now();
    const cycle: CycleRecord = {
      deviceId,
      state: 'Armed',
      armedAt: now,
      fireAt: now,
      previousFanSpeed,
      busy: false,
    };
    this.cycles.set(deviceId, cycle);
    this.logInfo('Unit %s switched off, starting mold-proof for %ds', deviceId, Math.round(this.durationMs / 1000));
    this.track(this.fire(cycle));
  }

  private async fire(cycle: CycleRecord): Promise<void> {
    const { deviceId } = cycle;
    cycle.busy = true;

    const startedAt = Date.now();
    cycle.state = 'Running';
    cycle.startedAt = startedAt;
    cycle.endsAt = startedAt + this.durationMs;
    cycle.handle = setTimeout(() => {
      cycle.handle = undefined;
      this.track(this.finish(cycle));
    }, this.durationMs);

    try {
      const ack = await this.dispatcher.apply(deviceId, FAN_ONLY, { origin: 'mold-proof' });
      if (ack.status === 'stale') {
        this.rearm(cycle, 'fan-only command not confirmed');
      }
    } catch (error) {
      this.rearm(cycle, errorMessage(error));
    } finally {
      cycle.busy = false;
    }
  }

  private async finish(cycle: CycleRecord): Promise<void> {
    if (!this.isCurrent(cycle) || cycle.state !== 'Running' || cycle.busy) {
      return;
    }
    const { deviceId } = cycle;
    cycle.busy = true;

    const command: DeviceCommand = { power: 'off' };
    if (cycle.previousFanSpeed !== undefined) {
      command.fanSpeed = cycle.previousFanSpeed;
    }

    try {
      await this.dispatcher.apply(deviceId, command, { origin: 'mold-proof' });
      if (this.isCurrent(cycle)) {
        this.cycles.delete(deviceId);
        cycle.state = 'Idle';
        this.logInfo('Mold-proof finished for %s', deviceId);
      }
    } catch (error) {
      this.logError('Failed to switch %s off after mold-proof, retrying on next tick: %s', deviceId, errorMessage(error));
    } finally {
      cycle.busy = false;
    }
  }

  private rearm(cycle: CycleRecord, reason: string): void {
    if (!this.isCurrent(cycle)) {
      return;
    }
    this.stopTimer(cycle);
    cycle.state = 'Armed';
    cycle.startedAt = undefined;
    cycle.endsAt = undefined;
    this.logError('Mold-proof could not start on %s, retrying on next tick: %s', cycle.deviceId, reason);
  }

  private cancel(deviceId: string, reason: string): void {
    const cycle = this.cycles.get(deviceId);
    if (!cycle) {
      return;
    }
    this.stopTimer(cycle);
    cycle.state = 'Cancelled';
    this.cycles.delete(deviceId);
    this.logInfo('Mold-proof cancelled for %s: %s', deviceId, reason);
  }

  private isCurrent(cycle: CycleRecord): boolean {
    return this.cycles.get(cycle.deviceId) === cycle;
  }

  private stopTimer(cycle: CycleRecord): void {
    if (cycle.handle) {
      clearTimeout(cycle.handle);
      cycle.handle = undefined;
    }
  }

  private track(operation: Promise<void>): void {
    this.inflight.add(operation);
    operation
      .finally(() => {
        this.inflight.delete(operation);
      })
      .catch((error: unknown) => {
        this.logError('Mold-proof operation failed: %s', errorMessage(error));
      });
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
    return `[MoldProofScheduler] ${message}`;
  }
}

export default MoldProofScheduler;
