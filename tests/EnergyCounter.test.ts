import { describe, expect, it } from 'vitest';
import EnergyCounter from '../lib/registry/EnergyCounter';

describe('EnergyCounter', () => {
  it('follows a vendor meter while it increases', () => {
    const counter = new EnergyCounter();

    expect(counter.record('ac-1', { watts: 0, meterKwh: 10, at: 0 })).toEqual({ totalKwh: 10 });
    expect(counter.record('ac-1', { watts: 0, meterKwh: 12.5, at: 1000 })).toEqual({ totalKwh: 12.5 });
    expect(counter.get('ac-1')).toBe(12.5);
  });

  it('rebases instead of going backwards when the meter resets', () => {
    const counter = new EnergyCounter();
    counter.record('ac-1', { watts: 0, meterKwh: 120.4, at: 0 });

    const sample = counter.record('ac-1', { watts: 0, meterKwh: 0.3, at: 1000 });

    expect(sample.totalKwh).toBeCloseTo(120.7, 6);
    expect(sample.reset).toEqual({ previousRawKwh: 120.4, rawKwh: 0.3 });
    expect(sample.totalKwh).toBeGreaterThanOrEqual(120.4);

    const next = counter.record('ac-1', { watts: 0, meterKwh: 1.3, at: 2000 });
    expect(next.totalKwh).toBeCloseTo(121.7, 6);
    expect(next.reset).toBeUndefined();
  });

  it('integrates power draw for units without a meter', () => {
    const counter = new EnergyCounter();

    expect(counter.record('ac-1', { watts: 1000, at: 0 }).totalKwh).toBe(0);
    expect(counter.record('ac-1', { watts: 1000, at: 30 * 60 * 1000 }).totalKwh).toBe(0.5);
    // Out-of-order timestamps add nothing
    expect(counter.record('ac-1', { watts: 1000, at: 10 * 60 * 1000 }).totalKwh).toBe(0.5);
  });

  it('keeps devices apart and forgets removed ones', () => {
    const counter = new EnergyCounter();
    counter.record('ac-1', { watts: 0, meterKwh: 5, at: 0 });
    counter.record('ac-2', { watts: 0, meterKwh: 7, at: 0 });

    counter.forget('ac-1');

    expect(counter.get('ac-1')).toBe(0);
    expect(counter.get('ac-2')).toBe(7);
  });
});
