import type {
  DeviceCapabilities,
  DeviceCommand,
  DeviceDescriptor,
  DeviceState,
  FanSpeed,
  FieldChange,
  Preset,
  RawCommand,
  RawState,
  StateField,
  SwingPosition,
  ThermostatMode,
} from '../../types';

export const MIN_TEMPERATURE = 16;
export const MAX_TEMPERATURE = 31;

const MODE_MAP: Record<number, ThermostatMode> = {
  0: 'auto',
  1: 'cool',
  2: 'dry',
  3: 'fan',
  4: 'heat',
};

const MODE_REVERSE_MAP = Object.fromEntries(
  Object.entries(MODE_MAP).map(([key, value]) => [value, Number(key)]),
) as Record<ThermostatMode, number>;

const FAN_SPEED_MAP: Record<number, FanSpeed> = {
  0: 'auto',
  1: 'low',
  2: 'medium',
  3: 'high',
};

const FAN_SPEED_REVERSE_MAP = Object.fromEntries(
  Object.entries(FAN_SPEED_MAP).map(([key, value]) => [value, Number(key)]),
) as Record<FanSpeed, number>;

const SWING_MAP: Record<number, SwingPosition> = {
  0: 'off',
  1: 'step_1',
  2: 'step_2',
  3: 'step_3',
  4: 'step_4',
  5: 'step_5',
  6: 'auto',
};

const SWING_REVERSE_MAP = Object.fromEntries(
  Object.entries(SWING_MAP).map(([key, value]) => [value, Number(key)]),
) as Record<SwingPosition, number>;

const SWING_STEPS: SwingPosition[] = ['step_1', 'step_2', 'step_3', 'step_4', 'step_5'];
const DEFAULT_MODES: ThermostatMode[] = ['cool', 'dry', 'fan'];
const DEFAULT_FAN_SPEEDS: FanSpeed[] = ['auto', 'low', 'medium', 'high'];

// Vendor flag per preset, checked in this order when reading state.
const PRESET_FLAGS: Array<[Exclude<Preset, 'none'>, string]> = [
  ['boost', 'Set_Turbo'],
  ['comfort', 'Set_Breeze'],
  ['eco', 'Set_Ecoplus'],
  ['sleep', 'Set_Sleep'],
];

const PRESET_RESET: RawCommand = {
  Set_Breeze: 0,
  Set_Ecoplus: 0,
  Set_Silent: 0,
  Set_Sleep: 0,
  Set_SmEcomax: 0,
  Set_SmSleepplus: 0,
  Set_SmPwrfulplus: 0,
  Set_Turbo: 0,
};

export const STATE_FIELDS: StateField[] = [
  'power',
  'mode',
  'targetTemperature',
  'currentTemperature',
  'outdoorTemperature',
  'fanSpeed',
  'verticalSwing',
  'horizontalSwing',
  'preset',
  'powerWatts',
  'energyKwh',
  'ledOn',
  'connected',
];

/** Normalized state before the energy counter has run. */
export type VendorReading = Omit<DeviceState, 'energyKwh'> & {
  /** Cumulative meter reported by the unit, when it has one */
  meterKwh?: number;
};

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toFlag(value: unknown): boolean {
  return value === true || value === 1 || value === '1';
}

function toOptionalString(value: unknown): string | undefined {
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

function parseTimestamp(value: unknown, fallback: number): number {
  const numeric = toNumber(value);
  if (numeric !== undefined) {
    // Shadow versions report seconds, not millis.
    return numeric < 1e12 ? numeric * 1000 : numeric;
  }
  if (typeof value === 'string') {
    const parsed = Date.parse(value);
    if (!Number.isNaN(parsed)) {
      return parsed;
    }
  }
  return fallback;
}

export function mapDeviceDescriptor(raw: unknown): DeviceDescriptor | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }

  const thingName = toOptionalString(raw.ThingName);
  if (!thingName) {
    return undefined;
  }

  const shadow = isRecord(raw.shadowState) ? raw.shadowState : undefined;
  const connectedValue = raw.isConnected ?? raw.connected ?? shadow?.connected;

  return {
    id: thingName,
    name: toOptionalString(raw.ACName) ?? 'GO DAIKIN',
    thingName,
    shadowKey: toOptionalString(shadow?.key) ?? '',
    group: toOptionalString(raw.ACGroup),
    ipAddress: toOptionalString(raw.IP),
    macAddress: toOptionalString(raw.MACAddress ?? raw.macAddress),
    manufacturer: toOptionalString(raw.manufacturer),
    connected: connectedValue === undefined ? true : toFlag(connectedValue),
    shadow,
  };
}

export function mapDevicesFromResponse(raw: unknown): DeviceDescriptor[] {
  if (!isRecord(raw) || !Array.isArray(raw.data)) {
    return [];
  }

  return raw.data
    .map(mapDeviceDescriptor)
    .filter((descriptor): descriptor is DeviceDescriptor => descriptor !== undefined);
}

export function mapCapabilities(shadow: RawState | undefined): DeviceCapabilities {
  const presets: Preset[] = ['none'];
  if (toFlag(shadow?.Ena_Turbo)) {
    presets.push('boost');
  }
  if (toFlag(shadow?.Ena_Breeze)) {
    presets.push('comfort');
  }
  if (toFlag(shadow?.Ena_Ecoplus)) {
    presets.push('eco');
  }
  if (toFlag(shadow?.Ena_Silent)) {
    presets.push('sleep');
  }

  const verticalSwing: SwingPosition[] = ['off', 'auto'];
  if (toFlag(shadow?.Ena_UDStep)) {
    verticalSwing.push(...SWING_STEPS);
  }

  const horizontalSwing: SwingPosition[] = [];
  if (toFlag(shadow?.Ena_LRSwing)) {
    horizontalSwing.push('off', 'auto');
    if (toFlag(shadow?.Ena_LRStep)) {
      horizontalSwing.push(...SWING_STEPS);
    }
  }

  return {
    modes: [...DEFAULT_MODES],
    fanSpeeds: [...DEFAULT_FAN_SPEEDS],
    presets,
    verticalSwing,
    horizontalSwing,
    led: toFlag(shadow?.Ena_LEDOff),
    minTemperature: MIN_TEMPERATURE,
    maxTemperature: MAX_TEMPERATURE,
  };
}

export function mapThermostatMode(rawMode: unknown): ThermostatMode {
  const numeric = toNumber(rawMode);
  if (numeric !== undefined && numeric in MODE_MAP) {
    return MODE_MAP[numeric];
  }
  return 'auto';
}

export function mapFanSpeed(rawSpeed: unknown): FanSpeed {
  const numeric = toNumber(rawSpeed);
  if (numeric !== undefined && numeric in FAN_SPEED_MAP) {
    return FAN_SPEED_MAP[numeric];
  }
  return 'auto';
}

export function mapSwing(rawPosition: unknown): SwingPosition {
  const numeric = toNumber(rawPosition);
  if (numeric !== undefined && numeric in SWING_MAP) {
    return SWING_MAP[numeric];
  }
  return 'off';
}

export function mapPreset(shadow: RawState): Preset {
  for (const [preset, field] of PRESET_FLAGS) {
    if (toFlag(shadow[field])) {
      return preset;
    }
  }
  return 'none';
}

export function mapDeviceState(shadow: RawState, connected = true, now = Date.now()): VendorReading {
  const targetTemperature = toNumber(shadow.Set_Temp);

  return {
    power: toFlag(shadow.Set_OnOff) ? 'on' : 'off',
    mode: mapThermostatMode(shadow.Set_Mode),
    targetTemperature: targetTemperature ?? MIN_TEMPERATURE,
    currentTemperature: toNumber(shadow.Sta_IDRoomTemp),
    outdoorTemperature: toNumber(shadow.Sta_ODAirTemp),
    fanSpeed: mapFanSpeed(shadow.Set_Fan),
    verticalSwing: mapSwing(shadow.Set_UDLvr),
    horizontalSwing: toFlag(shadow.Ena_LRSwing) ? mapSwing(shadow.Set_LRLvr) : undefined,
    preset: mapPreset(shadow),
    powerWatts: Math.max(0, toNumber(shadow.Sta_ODPwrCon) ?? 0),
    ledOn: !toFlag(shadow.Set_LEDOff),
    connected,
    timestamp: parseTimestamp(shadow.updatedOn ?? shadow.timestamp, now),
    meterKwh: toNumber(shadow.Sta_TotalKWh),
  };
}

export function normalizeTemperature(
  value: number,
  min: number = MIN_TEMPERATURE,
  max: number = MAX_TEMPERATURE,
): number {
  return clamp(Math.round(value), min, max);
}

export function createCommandPayload(command: DeviceCommand): RawCommand {
  const payload: RawCommand = {};

  if (command.mode) {
    // The vendor app always switches the unit on together with a mode change.
    payload.Set_OnOff = 1;
    payload.Set_Mode = MODE_REVERSE_MAP[command.mode];
  }

  if (command.power) {
    payload.Set_OnOff = command.power === 'on' ? 1 : 0;
  }

  if (command.targetTemperature !== undefined) {
    payload.Set_Temp = normalizeTemperature(command.targetTemperature);
  }

  if (command.fanSpeed) {
    payload.Set_Fan = FAN_SPEED_REVERSE_MAP[command.fanSpeed];
  }

  if (command.preset) {
    Object.assign(payload, PRESET_RESET);
    switch (command.preset) {
      case 'comfort':
        payload.Set_Breeze = 1;
        break;
      case 'eco':
        payload.Set_Ecoplus = 1;
        break;
      case 'boost':
        payload.Set_Turbo = 1;
        break;
      case 'sleep':
        payload.Set_Sleep = 1;
        break;
      default:
        break;
    }
  }

  if (command.verticalSwing) {
    payload.Set_Swing = command.verticalSwing === 'auto' ? 1 : 0;
    payload.Set_UDLvr = SWING_REVERSE_MAP[command.verticalSwing];
  }

  if (command.horizontalSwing) {
    payload.Set_LRLvr = SWING_REVERSE_MAP[command.horizontalSwing];
  }

  if (command.ledOn !== undefined) {
    payload.Set_LEDOff = command.ledOn ? 0 : 1;
    payload.Set_PwrInd = command.ledOn ? 1 : 0;
  }

  return payload;
}

/** The fields a command is expected to leave on the unit, mode implying power on. */
export function expectedFields(command: DeviceCommand): DeviceCommand {
  const expected: DeviceCommand = { ...command };
  if (command.mode && command.power === undefined) {
    expected.power = 'on';
  }
  if (command.targetTemperature !== undefined) {
    expected.targetTemperature = normalizeTemperature(command.targetTemperature);
  }
  return expected;
}

export function projectCommand(state: DeviceState, command: DeviceCommand): DeviceState {
  return { ...state, ...expectedFields(command) };
}

export function commandSatisfied(command: DeviceCommand, state: DeviceState): boolean {
  const expected = expectedFields(command);
  return (Object.keys(expected) as Array<keyof DeviceCommand>).every((field) => expected[field] === state[field]);
}

export function diffStates(previous: DeviceState | undefined, next: DeviceState): FieldChange[] {
  const changes: FieldChange[] = [];
  for (const field of STATE_FIELDS) {
    const before = previous?.[field];
    const after = next[field];
    if (before !== after) {
      changes.push({ field, previous: before, current: after });
    }
  }
  return changes;
}
