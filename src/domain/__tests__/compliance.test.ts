import { describe, it, expect } from 'vitest';
import { Compliance } from '../compliance.js';
import { TRADE_COUNTRIES } from '../../constants/fleet.js';
import { createScriptedRandom, createSeededRandom } from '../../utils/random.js';
import { buildPort, buildVessel } from '../../__tests__/builders.js';

describe('Compliance', () => {
  it('flags vessels above the sampled zone limit', () => {
    const check = Compliance.checkSpeed(buildVessel({ speed: 13 }), createScriptedRandom([0, 0.5]));
    expect(check).toEqual({ zone: 'coastal', speedLimit: 12, violation: true });
  });

  it('does not flag a vessel exactly at the limit', () => {
    const check = Compliance.checkSpeed(buildVessel({ speed: 12 }), createScriptedRandom([0, 0]));
    expect(check).toEqual({ zone: 'port_approach', speedLimit: 12, violation: false });
  });

  it('keeps AIS quality within its range', () => {
    expect(Compliance.walkSignalQuality(buildVessel({ aisSignalQuality: 61 }), createScriptedRandom([0])).aisSignalQuality).toBe(60);
    expect(
      Compliance.walkSignalQuality(buildVessel({ aisSignalQuality: 99.5 }), createScriptedRandom([0.999])).aisSignalQuality
    ).toBe(100);
  });

  it('penalises past violations down to a floor', () => {
    expect(Compliance.recordFactor(0)).toBe(90);
    expect(Compliance.recordFactor(2)).toBe(70);
    expect(Compliance.recordFactor(5)).toBe(60);
  });

  it('averages conduct, signal and record into the score', () => {
    expect(Compliance.score(false, 90, 0)).toBeCloseTo(93.33, 2);
    expect(Compliance.score(true, 80, 2)).toBeCloseTo(73.33, 2);
  });

  it('jitters inspection rates around the port baseline', () => {
    const rates = Compliance.inspectionRates(buildPort({ baseInspectionRate: 20 }), TRADE_COUNTRIES, createSeededRandom(9));

    expect(rates).toHaveLength(5);
    expect(new Set(rates.map((rate) => rate.flagCountry)).size).toBe(5);
    rates.forEach((rate) => {
      expect(rate.ratePercent).toBeGreaterThanOrEqual(16);
      expect(rate.ratePercent).toBeLessThanOrEqual(24);
    });
  });
});
