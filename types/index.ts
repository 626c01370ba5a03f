export type PowerState = 'on' | 'off';
export type ThermostatMode = 'auto' | 'cool' | 'dry' | 'fan' | 'heat';
export type FanSpeed = 'auto' | 'low' | 'medium' | 'high';
export type SwingPosition = 'off' | 'auto' | 'step_1' | 'step_2' | 'step_3' | 'step_4' | 'step_5';
export type Preset = 'none' | 'comfort' | 'eco' | 'boost' | 'sleep';

/** Raw vendor shadow, keyed by the vendor's `Set_*`, `Sta_*` and `Ena_*` field names. */
export type RawState = Record<string, unknown>;
export type RawCommand = Record<string, number>;

export interface Credential {
  username: string;
  password: string;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  /** Seconds */
  expiresIn: number;
}

export interface Session {
  accessToken: string;
  refreshToken: string;
  /** Epoch millis */
  expiresAt: number;
}

export interface DeviceDescriptor {
  id: string;
  name: string;
  thingName: string;
  shadowKey: string;
  group?: string;
  ipAddress?: string;
  macAddress?: string;
  manufacturer?: string;
  connected: boolean;
  shadow?: RawState;
}

export interface DeviceCapabilities {
  modes: ThermostatMode[];
  fanSpeeds: FanSpeed[];
  presets: Preset[];
  verticalSwing: SwingPosition[];
  horizontalSwing: SwingPosition[];
  led: boolean;
  minTemperature: number;
  maxTemperature: number;
}

export interface DeviceState {
  power: PowerState;
  mode: ThermostatMode;
  targetTemperature: number;
  currentTemperature?: number;
  outdoorTemperature?: number;
  fanSpeed: FanSpeed;
  verticalSwing: SwingPosition;
  horizontalSwing?: SwingPosition;
  preset: Preset;
  powerWatts: number;
  /** Process-lifetime counter, never decreases */
  energyKwh: number;
  ledOn: boolean;
  connected: boolean;
  timestamp: number;
}

export type CommandField =
  | 'power'
  | 'mode'
  | 'targetTemperature'
  | 'fanSpeed'
  | 'verticalSwing'
  | 'horizontalSwing'
  | 'preset'
  | 'ledOn';

export type DeviceCommand = Partial<Pick<DeviceState, CommandField>>;

export type StateField = Exclude<keyof DeviceState, 'timestamp'>;

export interface FieldChange {
  field: StateField;
  previous: unknown;
  current: unknown;
}

/** Who caused a change to the effective device state. */
export type ChangeOrigin = 'sync' | 'user' | 'mold-proof';

export interface Device {
  id: string;
  name: string;
  descriptor: DeviceDescriptor;
  capabilities: DeviceCapabilities;
  /** Confirmed state with any optimistic overlay applied */
  lastKnownState?: DeviceState;
  confirmedState?: DeviceState;
  lastSyncedAt?: number;
  lastCommandInFlight?: DeviceCommand;
  lastError?: string;
}

export type RegistryEvent =
  | {
      type: 'state';
      deviceId: string;
      changes: FieldChange[];
      state: DeviceState;
      origin: ChangeOrigin;
    }
  | {
      type: 'power';
      deviceId: string;
      from: PowerState;
      to: PowerState;
      state: DeviceState;
      origin: ChangeOrigin;
    }
  | {
      type: 'energyReset';
      deviceId: string;
      previousRawKwh: number;
      rawKwh: number;
      totalKwh: number;
    }
  | {
      type: 'availability';
      deviceId: string;
      available: boolean;
    }
  | {
      type: 'discovered';
      device: Device;
    }
  | {
      type: 'removed';
      deviceId: string;
    };

export type RegistryListener = (event: RegistryEvent) => void;

export type CommandStatus = 'confirmed' | 'stale';

export interface CommandAck {
  deviceId: string;
  status: CommandStatus;
  command: DeviceCommand;
  /** Number of send attempts the network command took */
  attempts: number;
  /** The caller's command was merged into another one instead of being sent itself */
  coalesced: boolean;
  warning?: Error;
}

export type MoldProofState = 'Idle' | 'Armed' | 'Running' | 'Cancelled';

export interface MoldProofTimer {
  deviceId: string;
  state: MoldProofState;
  armedAt?: number;
  fireAt?: number;
  startedAt?: number;
  endsAt?: number;
  previousFanSpeed?: FanSpeed;
}

export type BusyPolicy = 'queue' | 'reject';
