export interface EnergyReading {
  /** Instantaneous draw in watts */
  watts: number;
  /** Cumulative meter reported by the unit, when available */
  meterKwh?: number;
  at: number;
}

export interface EnergySample {
  totalKwh: number;
  /** Set when the unit's meter went backwards and was rebased */
  reset?: { previousRawKwh: number; rawKwh: number };
}

interface MeterState {
  totalKwh: number;
  offsetKwh: number;
  lastRawKwh?: number;
  lastAt?: number;
}

/**
 * Process-lifetime energy totals per device. Units that report a cumulative
 * meter are tracked as `offset + raw`; the rest integrate their power draw
 * between readings. The exposed total never decreases.
 */
export class EnergyCounter {
  private readonly meters = new Map<string, MeterState>();

  record(deviceId: string, reading: EnergyReading): EnergySample {
    const meter = this.meters.get(deviceId) ?? { totalKwh: 0, offsetKwh: 0 };
    this.meters.set(deviceId, meter);

    if (reading.meterKwh !== undefined && reading.meterKwh >= 0) {
      return this.recordMeter(meter, reading);
    }

    const lastAt = meter.lastAt;
    if (lastAt !== undefined && reading.at <= lastAt) {
      return { totalKwh: meter.totalKwh };
    }
    meter.lastAt = reading.at;
    if (lastAt === undefined) {
      return { totalKwh: meter.totalKwh };
    }

    const hours = (reading.at - lastAt) / 3_600_000;
    meter.totalKwh += (Math.max(0, reading.watts) / 1000) * hours;
    return { totalKwh: meter.totalKwh };
  }

  get(deviceId: string): number {
    return this.meters.get(deviceId)?.totalKwh ?? 0;
  }

  forget(deviceId: string): void {
    this.meters.delete(deviceId);
  }

  private recordMeter(meter: MeterState, reading: EnergyReading): EnergySample {
    const raw = reading.meterKwh ?? 0;
    const previousRaw = meter.lastRawKwh;
    meter.lastAt = reading.at;
    meter.lastRawKwh = raw;

    let reset: EnergySample['reset'];
    if (previousRaw !== undefined && raw < previousRaw) {
      meter.offsetKwh += previousRaw;
      reset = { previousRawKwh: previousRaw, rawKwh: raw };
    }

    meter.totalKwh = Math.max(meter.totalKwh, meter.offsetKwh + raw);
    return reset ? { totalKwh: meter.totalKwh, reset } : { totalKwh: meter.totalKwh };
  }
}

export default EnergyCounter;
