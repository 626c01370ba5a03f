import type { BusyPolicy, CommandAck, Device, DeviceCommand } from '../../types';
import type { CloudApi } from '../godaikin/CloudApi';
import {
  BusyError,
  CommandError,
  InvalidCredentialsError,
  SessionExpiredError,
  StaleConfirmationError,
  UnsupportedError,
  errorMessage,
  isTransient,
} from '../godaikin/errors';
import { commandSatisfied, createCommandPayload } from '../godaikin/Mappers';
import type { Logger } from '../logger';
import type { CommandOrigin, DeviceRegistry } from '../registry/DeviceRegistry';
import type { SessionManager } from '../session/SessionManager';
import { delay, withTimeout } from '../timeout';

export interface CommandDispatcherOptions {
  registry: DeviceRegistry;
  session: SessionManager;
  api: CloudApi;
  /** Resends after the first attempt on transient failures */
  retryLimit?: number;
  backoffBaseMs?: number;
  confirmAttempts?: number;
  confirmDelayMs?: number;
  commandTimeoutMs?: number;
  busyPolicy?: BusyPolicy;
  logger?: Logger;
  debug?: boolean;
}

export interface ApplyOptions {
  origin?: CommandOrigin;
}

/** `accepted` before anything is sent, `confirmed` once the unit reports the command. */
export type CommandStage = 'accepted' | 'confirmed';

export interface CommandNotice {
  deviceId: string;
  command: DeviceCommand;
  origin: CommandOrigin;
  stage: CommandStage;
}

export type CommandListener = (notice: CommandNotice) => void;

interface Waiter {
  coalesced: boolean;
  resolve: (ack: CommandAck) => void;
  reject: (reason: unknown) => void;
}

interface PendingCommand {
  command: DeviceCommand;
  origin: CommandOrigin;
  waiters: Waiter[];
}

interface DeviceWorker {
  running?: boolean;
  current?: PendingCommand;
  /** Not yet sent; replaced in place by newer intents */
  queued?: PendingCommand;
}

type SendResult = Pick<CommandAck, 'status' | 'attempts' | 'warning'>;

const isAuthFailure = (error: unknown): boolean =>
  error instanceof InvalidCredentialsError || error instanceof SessionExpiredError;

function sameCommand(a: DeviceCommand, b: DeviceCommand): boolean {
  const keysA = Object.keys(a).sort();
  const keysB = Object.keys(b).sort();
  if (keysA.length !== keysB.length || keysA.some((key, index) => key !== keysB[index])) {
    return false;
  }
  return (Object.keys(a) as Array<keyof DeviceCommand>).every((key) => a[key] === b[key]);
}

/**
 * Applies commands one device at a time. Each device has at most one command
 * on the wire; later intents wait in a single queued slot where the newest one
 * wins.
 */
export class CommandDispatcher {
  private readonly registry: DeviceRegistry;
  private readonly session: SessionManager;
  private readonly api: CloudApi;
  private readonly retryLimit: number;
  private readonly backoffBaseMs: number;
  private readonly confirmAttempts: number;
  private readonly confirmDelayMs: number;
  private readonly commandTimeoutMs: number;
  private readonly busyPolicy: BusyPolicy;
  private readonly logger?: Logger;
  private readonly debug: boolean;
  private readonly workers = new Map<string, DeviceWorker>();
  private readonly listeners = new Set<CommandListener>();

  constructor(options: CommandDispatcherOptions) {
    this.registry = options.registry;
    this.session = options.session;
    this.api = options.api;
    this.retryLimit = Math.max(0, options.retryLimit ?? 3);
    this.backoffBaseMs = Math.max(0, options.backoffBaseMs ?? 500);
    this.confirmAttempts = Math.max(1, options.confirmAttempts ?? 3);
    this.confirmDelayMs = Math.max(0, options.confirmDelayMs ?? 2000);
    this.commandTimeoutMs = options.commandTimeoutMs ?? 10000;
    this.busyPolicy = options.busyPolicy ?? 'queue';
    this.logger = options.logger;
    this.debug = Boolean(options.debug);
  }

  async apply(deviceId: string, command: DeviceCommand, options: ApplyOptions = {}): Promise<CommandAck> {
    const origin = options.origin ?? 'user';
    const device = this.registry.get(deviceId);
    this.validate(device, command);

    const worker = this.workers.get(deviceId) ?? {};
    this.workers.set(deviceId, worker);

    if (worker.current && this.busyPolicy === 'reject') {
      throw new BusyError(deviceId);
    }

    this.notify({ deviceId, command, origin, stage: 'accepted' });

    if (!worker.current) {
      const pending: PendingCommand = { command, origin, waiters: [] };
      worker.current = pending;
      const result = this.addWaiter(pending, false);
      // A listener applying from inside a notice joins the loop already running.
      if (!worker.running) {
        this.drive(deviceId, worker).catch((error: unknown) => {
          this.logError('Worker for %s stopped: %s', deviceId, errorMessage(error));
        });
      }
      return result;
    }

    if (!worker.queued && sameCommand(worker.current.command, command)) {
      this.logDebug('Command for %s matches the one in flight, joining it', deviceId);
      return this.addWaiter(worker.current, true);
    }

    if (worker.queued) {
      this.logDebug('Replacing queued command for %s', deviceId);
      for (const waiter of worker.queued.waiters) {
        waiter.coalesced = true;
      }
      worker.queued.command = command;
      worker.queued.origin = origin;
    } else {
      worker.queued = { command, origin, waiters: [] };
    }

    this.registry.setOptimistic(deviceId, { ...worker.current.command, ...command }, origin);
    return this.addWaiter(worker.queued, false);
  }

  /**
   * Listeners hear about every accepted command before it is applied, and
   * again once the unit confirms it and the device has no command in flight.
   */
  onCommand(listener: CommandListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  isBusy(deviceId: string): boolean {
    return this.workers.get(deviceId)?.current !== undefined;
  }

  validate(device: Device, command: DeviceCommand): void {
    const { capabilities } = device;
    const fields = Object.keys(command);
    if (fields.length === 0) {
      throw new UnsupportedError(device.id, 'command', 'empty');
    }

    if (command.mode !== undefined && !capabilities.modes.includes(command.mode)) {
      throw new UnsupportedError(device.id, 'mode', command.mode);
    }
    if (command.fanSpeed !== undefined && !capabilities.fanSpeeds.includes(command.fanSpeed)) {
      throw new UnsupportedError(device.id, 'fanSpeed', command.fanSpeed);
    }
    if (command.preset !== undefined && !capabilities.presets.includes(command.preset)) {
      throw new UnsupportedError(device.id, 'preset', command.preset);
    }
    if (command.verticalSwing !== undefined && !capabilities.verticalSwing.includes(command.verticalSwing)) {
      throw new UnsupportedError(device.id, 'verticalSwing', command.verticalSwing);
    }
    if (command.horizontalSwing !== undefined && !capabilities.horizontalSwing.includes(command.horizontalSwing)) {
      throw new UnsupportedError(device.id, 'horizontalSwing', command.horizontalSwing);
    }
    if (command.ledOn !== undefined && !capabilities.led) {
      throw new UnsupportedError(device.id, 'ledOn', command.ledOn);
    }
    if (command.targetTemperature !== undefined && !Number.isFinite(command.targetTemperature)) {
      throw new UnsupportedError(device.id, 'targetTemperature', command.targetTemperature);
    }
  }

  private addWaiter(pending: PendingCommand, coalesced: boolean): Promise<CommandAck> {
    return new Promise<CommandAck>((resolve, reject) => {
      pending.waiters.push({ coalesced, resolve, reject });
    });
  }

  private async drive(deviceId: string, worker: DeviceWorker): Promise<void> {
    worker.running = true;
    try {
      while (worker.current) {
        const pending = worker.current;
        let confirmed = false;
        try {
          const result = await this.execute(deviceId, worker, pending);
          confirmed = result.status === 'confirmed';
          for (const waiter of pending.waiters) {
            waiter.resolve({ deviceId, command: pending.command, coalesced: waiter.coalesced, ...result });
          }
        } catch (error) {
          for (const waiter of pending.waiters) {
            waiter.reject(error);
          }
        }
        worker.current = worker.queued;
        worker.queued = undefined;
        if (confirmed && !worker.current) {
          this.notify({ deviceId, command: pending.command, origin: pending.origin, stage: 'confirmed' });
        }
      }
    } finally {
      worker.running = false;
      this.workers.delete(deviceId);
    }
  }

  private async execute(deviceId: string, worker: DeviceWorker, pending: PendingCommand): Promise<SendResult> {
    const device = this.registry.get(deviceId);
    this.registry.setOptimistic(deviceId, { ...pending.command, ...worker.queued?.command }, pending.origin);

    const attempts = await this.send(device, worker, pending);
    this.logDebug('Command for %s accepted after %d attempt(s), confirming', deviceId, attempts);

    for (let poll = 0; poll < this.confirmAttempts; poll += 1) {
      await delay(this.confirmDelayMs * Math.pow(2, poll));
      try {
        await this.registry.refresh(deviceId);
      } catch (error) {
        if (isAuthFailure(error)) {
          this.revert(deviceId, worker, pending);
          throw error;
        }
        this.logError('Confirmation poll %d for %s failed: %s', poll + 1, deviceId, errorMessage(error));
        continue;
      }

      const confirmed = this.registry.confirmedState(deviceId);
      if (confirmed && commandSatisfied(pending.command, confirmed)) {
        this.revert(deviceId, worker, pending);
        return { status: 'confirmed', attempts };
      }
    }

    this.revert(deviceId, worker, pending);
    const warning = new StaleConfirmationError(deviceId, this.confirmAttempts);
    this.logError('%s', warning.message);
    return { status: 'stale', attempts, warning };
  }

  private async send(device: Device, worker: DeviceWorker, pending: PendingCommand): Promise<number> {
    const payload = createCommandPayload(pending.command);
    let attempts = 0;

    for (;;) {
      attempts += 1;
      const controller = new AbortController();
      try {
        await this.session.withSession((token) =>
          withTimeout(
            this.api.sendCommand(token, device.descriptor, payload, { signal: controller.signal }),
            this.commandTimeoutMs,
            `sendCommand(${device.id})`,
            controller,
          ),
        );
        return attempts;
      } catch (error) {
        if (isAuthFailure(error)) {
          this.revert(device.id, worker, pending);
          throw error;
        }
        if (!isTransient(error) || attempts > this.retryLimit) {
          this.revert(device.id, worker, pending);
          this.logError('Command for %s failed after %d attempt(s): %s', device.id, attempts, errorMessage(error));
          throw new CommandError(device.id, attempts, { cause: error });
        }

        const backoff = this.backoffBaseMs * Math.pow(2, attempts - 1);
        this.logDebug('Command for %s failed (%s), retrying in %dms', device.id, errorMessage(error), backoff);
        await delay(backoff);
      }
    }
  }

  /** Drops this command's overlay, keeping the intent of anything still queued. */
  private revert(deviceId: string, worker: DeviceWorker, pending: PendingCommand): void {
    if (worker.queued) {
      this.registry.setOptimistic(deviceId, worker.queued.command, worker.queued.origin);
      return;
    }
    this.registry.clearOptimistic(deviceId, pending.origin);
  }

  private notify(notice: CommandNotice): void {
    for (const listener of this.listeners) {
      try {
        listener(notice);
      } catch (error) {
        this.logError('Command listener failed: %s', errorMessage(error));
      }
    }
  }

  private logDebug(message: string, ...args: unknown[]): void {
    if (this.debug) {
      this.logger?.log(this.formatLog(message), ...args);
    }
  }

  private logError(message: string, ...args: unknown[]): void {
    this.logger?.error(this.formatLog(message), ...args);
  }

  private formatLog(message: string): string {
    return `[CommandDispatcher] ${message}`;
  }
}

export default CommandDispatcher;
