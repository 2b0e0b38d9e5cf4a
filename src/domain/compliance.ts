import type { Port, Vessel } from '../types/maritime.js';
import { COMPLIANCE_CONSTANTS } from '../constants/simulation.js';
import { pick, sample, uniform, type RandomSource } from '../utils/random.js';
import { clamp, mean } from '../utils/math.js';

export type SpeedZone = (typeof COMPLIANCE_CONSTANTS.ZONES)[number];

export interface SpeedCheck {
  zone: SpeedZone;
  speedLimit: number;
  violation: boolean;
}

export interface InspectionRate {
  flagCountry: string;
  ratePercent: number;
}

export const Compliance = {
  /**
   * Zone and limit are re-sampled every tick; the flag is set when the vessel
   * is above the sampled limit.
   */
  checkSpeed(vessel: Vessel, rng: RandomSource): SpeedCheck {
    const speedLimit = pick(rng, COMPLIANCE_CONSTANTS.ZONE_SPEED_LIMITS);
    const zone = pick(rng, COMPLIANCE_CONSTANTS.ZONES);
    return { zone, speedLimit, violation: vessel.speed > speedLimit };
  },

  /**
   * AIS quality decays slightly faster than it recovers.
   */
  walkSignalQuality(vessel: Vessel, rng: RandomSource): Vessel {
    const step = uniform(rng, COMPLIANCE_CONSTANTS.AIS_STEP_DOWN, COMPLIANCE_CONSTANTS.AIS_STEP_UP);
    return {
      ...vessel,
      aisSignalQuality: clamp(vessel.aisSignalQuality + step, COMPLIANCE_CONSTANTS.AIS_MIN, COMPLIANCE_CONSTANTS.AIS_MAX),
    };
  },

  recordFactor(complianceViolations: number): number {
    if (complianceViolations === 0) {
      return COMPLIANCE_CONSTANTS.RECORD_BASELINE;
    }
    return Math.max(
      COMPLIANCE_CONSTANTS.RECORD_FLOOR,
      COMPLIANCE_CONSTANTS.RECORD_BASELINE - complianceViolations * COMPLIANCE_CONSTANTS.RECORD_PENALTY_PER_VIOLATION
    );
  },

  /**
   * Mean of speed conduct, AIS quality and the violation record.
   */
  score(speedViolation: boolean, aisSignalQuality: number, complianceViolations: number): number {
    return mean([
      speedViolation ? COMPLIANCE_CONSTANTS.SCORE_SPEEDING : COMPLIANCE_CONSTANTS.SCORE_CLEAN,
      aisSignalQuality,
      this.recordFactor(complianceViolations),
    ]);
  },

  /**
   * Inspection rates for a handful of flag countries at one port, each jittered
   * around the port's baseline.
   */
  inspectionRates(port: Port, flagCountries: readonly string[], rng: RandomSource): InspectionRate[] {
    return sample(rng, flagCountries, COMPLIANCE_CONSTANTS.INSPECTED_FLAGS_PER_PORT).map((flagCountry) => ({
      flagCountry,
      ratePercent:
        port.baseInspectionRate *
        uniform(rng, COMPLIANCE_CONSTANTS.INSPECTION_JITTER_MIN, COMPLIANCE_CONSTANTS.INSPECTION_JITTER_MAX),
    }));
  },
};
