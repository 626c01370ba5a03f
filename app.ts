import CommandDispatcher from './lib/commands/CommandDispatcher';
import { parseConfig } from './lib/config';
import type { CoreConfig, CoreConfigInput } from './lib/config';
import type { CloudApi } from './lib/godaikin/CloudApi';
import CloudApiClient from './lib/godaikin/CloudApiClient';
import { NotFoundError } from './lib/godaikin/errors';
import RateLimiter from './lib/godaikin/RateLimiter';
import { createLogger } from './lib/logger';
import type { Logger } from './lib/logger';
import MoldProofScheduler from './lib/moldproof/MoldProofScheduler';
import DeviceRegistry from './lib/registry/DeviceRegistry';
import EnergyCounter from './lib/registry/EnergyCounter';
import SessionManager from './lib/session/SessionManager';
import PollScheduler from './polling/PollScheduler';
import type {
  CommandAck,
  Device,
  DeviceCommand,
  DeviceState,
  MoldProofTimer,
  RawState,
  RegistryListener,
} from './types';

export const SYNC_TASK = 'sync';
export const MOLD_PROOF_TASK = 'mold-proof';

export interface GoDaikinAppDependencies {
  /** Replaces the HTTP client; the rate limiter is then unused */
  api?: CloudApi;
  logger?: Logger;
}

export interface MoldProofStatus extends MoldProofTimer {
  enabled: boolean;
  remainingSeconds: number;
}

export interface DeviceDiagnostics {
  id: string;
  name: string;
  group?: string;
  ipAddress?: string;
  macAddress?: string;
  thingName: string;
  manufacturer?: string;
  available: boolean;
  lastSyncedAt: string | null;
  lastError?: string;
  shadow?: RawState;
  energy: { accumulatedKwh: number };
  moldProof: MoldProofStatus;
}

export interface Diagnostics {
  config: Omit<CoreConfig, 'username' | 'password'> & { username: string };
  session: { authenticated: boolean; expiresAt: string | null };
  scheduler: { running: boolean; lastSync: string | null };
  devices: DeviceDiagnostics[];
}

const REDACTED = 'REDACTED';

const isoOrNull = (epochMs: number | undefined): string | null =>
  epochMs === undefined ? null : new Date(epochMs).toISOString();

/**
 * Composition root: builds every component from one validated config and
 * exposes the read and write model for a host to bind entities to.
 */
export default class GoDaikinApp {
  readonly config: CoreConfig;
  readonly session: SessionManager;
  readonly registry: DeviceRegistry;
  readonly dispatcher: CommandDispatcher;
  readonly moldProof: MoldProofScheduler;
  readonly poller: PollScheduler;
  private readonly rateLimiter: RateLimiter;
  private readonly logger: Logger;
  private started = false;

  constructor(config: CoreConfigInput, dependencies: GoDaikinAppDependencies = {}) {
    this.config = parseConfig(config);
    const { debug } = this.config;

    this.logger =
      dependencies.logger ??
      createLogger('godaikin', { level: this.config.logLevel, pretty: this.config.logPretty });

    this.rateLimiter = new RateLimiter({
      maxConcurrent: 2,
      minInterval: 400,
      logger: this.logger,
    });

    const api =
      dependencies.api ??
      new CloudApiClient({
        account: this.config.username,
        rateLimiter: this.rateLimiter,
        logger: this.logger,
        debug,
        region: this.config.region,
        cognitoClientId: this.config.cognitoClientId,
        baseUrl: this.config.apiBaseUrl,
        timeout: Math.max(this.config.pollTimeoutMs, this.config.commandTimeoutMs),
      });

    this.session = new SessionManager({
      provider: api,
      safetyMarginMs: this.config.sessionSafetyMarginSeconds * 1000,
      authTimeoutMs: this.config.authTimeoutMs,
      logger: this.logger,
      debug,
    });

    this.registry = new DeviceRegistry({
      api,
      session: this.session,
      energy: new EnergyCounter(),
      pollTimeoutMs: this.config.pollTimeoutMs,
      staleAfterMs: this.config.staleAfterSeconds * 1000,
      logger: this.logger,
      debug,
    });

    this.dispatcher = new CommandDispatcher({
      registry: this.registry,
      session: this.session,
      api,
      retryLimit: this.config.commandRetryLimit,
      backoffBaseMs: this.config.commandBackoffBaseMs,
      confirmAttempts: this.config.confirmAttempts,
      confirmDelayMs: this.config.confirmDelayMs,
      commandTimeoutMs: this.config.commandTimeoutMs,
      busyPolicy: this.config.busyPolicy,
      logger: this.logger,
      debug,
    });

    this.moldProof = new MoldProofScheduler({
      registry: this.registry,
      dispatcher: this.dispatcher,
      enabled: this.config.moldProofEnabled,
      durationMs: this.config.moldProofDurationSeconds * 1000,
      logger: this.logger,
      debug,
    });

    this.poller = new PollScheduler({ logger: this.logger });
    this.poller.register({
      id: SYNC_TASK,
      interval: this.config.pollIntervalSeconds * 1000,
      immediate: false,
      run: async () => {
        await this.registry.poll();
      },
    });
    this.poller.register({
      id: MOLD_PROOF_TASK,
      interval: this.config.moldProofTickSeconds * 1000,
      immediate: false,
      run: () => this.moldProof.tick(),
    });
  }

  /** Logs in, discovers the account's units and starts the background tasks. */
  async start(): Promise<Device[]> {
    if (this.started) {
      return this.registry.list();
    }

    await this.session.authenticate({ username: this.config.username, password: this.config.password });
    const devices = await this.registry.discover();
    this.moldProof.start();
    this.poller.start();
    this.started = true;
    this.logger.log('GO DAIKIN core started with %d device(s)', devices.length);
    return devices;
  }

  stop(): void {
    this.poller.stop();
    this.moldProof.dispose();
    this.rateLimiter.clear('Stopped');
    this.started = false;
  }

  async rediscover(): Promise<Device[]> {
    return this.registry.discover();
  }

  /** Polls every device now instead of waiting for the next cycle. */
  async syncNow(): Promise<void> {
    await this.poller.runNow(SYNC_TASK);
  }

  listDevices(): Device[] {
    return this.registry.list();
  }

  getDevice(deviceId: string): Device {
    return this.registry.get(deviceId);
  }

  getState(deviceId: string): DeviceState | undefined {
    return this.registry.get(deviceId).lastKnownState;
  }

  isAvailable(deviceId: string): boolean {
    return this.registry.isAvailable(deviceId);
  }

  subscribe(listener: RegistryListener): () => void {
    return this.registry.subscribe(listener);
  }

  async apply(deviceId: string, command: DeviceCommand): Promise<CommandAck> {
    return this.dispatcher.apply(deviceId, command, { origin: 'user' });
  }

  setMoldProofEnabled(deviceId: string, enabled: boolean): void {
    this.requireDevice(deviceId);
    this.moldProof.setEnabled(deviceId, enabled);
  }

  getMoldProofStatus(deviceId: string): MoldProofStatus {
    this.requireDevice(deviceId);
    return {
      ...this.moldProof.getTimer(deviceId),
      enabled: this.moldProof.isEnabled(deviceId),
      remainingSeconds: this.moldProof.getRemainingSeconds(deviceId),
    };
  }

  getDiagnostics(): Diagnostics {
    const { password: _password, ...config } = this.config;
    const session = this.session.getSession();

    return {
      config: { ...config, username: REDACTED },
      session: {
        authenticated: session !== null,
        expiresAt: session ? new Date(session.expiresAt).toISOString() : null,
      },
      scheduler: {
        running: this.poller.isRunning(),
        lastSync: isoOrNull(this.poller.lastRun(SYNC_TASK)),
      },
      devices: this.registry.list().map((device) => ({
        id: device.id,
        name: device.name,
        group: device.descriptor.group,
        ipAddress: device.descriptor.ipAddress,
        macAddress: device.descriptor.macAddress,
        thingName: device.descriptor.thingName,
        manufacturer: device.descriptor.manufacturer,
        available: this.registry.isAvailable(device.id),
        lastSyncedAt: isoOrNull(device.lastSyncedAt),
        lastError: device.lastError,
        shadow: device.descriptor.shadow,
        energy: { accumulatedKwh: Math.round(this.registry.energyKwh(device.id) * 1000) / 1000 },
        moldProof: this.getMoldProofStatus(device.id),
      })),
    };
  }

  /** Stops everything and forgets the credential. */
  logout(): void {
    this.stop();
    this.session.logout();
  }

  private requireDevice(deviceId: string): void {
    if (!this.registry.has(deviceId)) {
      throw new NotFoundError(deviceId);
    }
  }
}

export { GoDaikinApp };
