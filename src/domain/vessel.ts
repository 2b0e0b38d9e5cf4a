import { addHours, differenceInMilliseconds } from 'date-fns';
import type { Vessel, VesselStatus } from '../types/maritime.js';
import { VESSEL_CONSTANTS } from '../constants/simulation.js';
import { chance, pick, randomInt, uniform, type RandomSource } from '../utils/random.js';
import { assertFinite, clamp, toRadians } from '../utils/math.js';

export interface VesselStepContext {
  /** Tick timestamp; historical during backfill */
  now: Date;
  /** Wall-clock seconds covered by this tick */
  intervalSeconds: number;
  rng: RandomSource;
  /** Destination candidates for vessels leaving port */
  portCodes: readonly string[];
}

const REVENUE_MODIFIERS: Record<VesselStatus, number> = {
  UNDERWAY: 1.0,
  AT_ANCHOR: 1.0,
  WAITING_BERTH: 0.3,
  IN_PORT: 0.8,
};

const STATUS_INDICATORS: Record<VesselStatus, number> = {
  UNDERWAY: 1.0,
  AT_ANCHOR: 0.7,
  WAITING_BERTH: 0.5,
  IN_PORT: 0.8,
};

const MS_PER_HOUR = 3_600_000;

/**
 * Vessel domain logic - status machine, motion and fuel model.
 * Every function returns a new Vessel; inputs are never mutated.
 */
export const VesselDynamics = {
  /**
   * Apply this tick's status transition and the speed that goes with the status.
   * - UNDERWAY: speed drifts, 2% chance to arrive (in port or waiting for a berth)
   * - WAITING_BERTH: creeping speed, 10% chance to get a berth
   * - IN_PORT: stationary, 5% chance to depart with a new ETA
   * - AT_ANCHOR: holding state, no automatic transition
   */
  transition(vessel: Vessel, ctx: VesselStepContext): Vessel {
    const { rng, now } = ctx;

    switch (vessel.status) {
      case 'UNDERWAY': {
        const drift = uniform(rng, -VESSEL_CONSTANTS.UNDERWAY_SPEED_DRIFT, VESSEL_CONSTANTS.UNDERWAY_SPEED_DRIFT);
        const speed = clamp(vessel.speed + drift, 0, vessel.maxSpeed);

        if (!chance(rng, VESSEL_CONSTANTS.ARRIVAL_PROBABILITY)) {
          return { ...vessel, speed };
        }

        const status = pick<VesselStatus>(rng, ['IN_PORT', 'WAITING_BERTH']);
        return {
          ...vessel,
          status,
          actualArrival: now,
          speed: clamp(uniform(rng, 0, VESSEL_CONSTANTS.ARRIVAL_MAX_SPEED), 0, vessel.maxSpeed),
        };
      }

      case 'WAITING_BERTH': {
        const speed = clamp(uniform(rng, 0, VESSEL_CONSTANTS.WAITING_MAX_SPEED), 0, vessel.maxSpeed);
        if (chance(rng, VESSEL_CONSTANTS.BERTH_ASSIGNMENT_PROBABILITY)) {
          return { ...vessel, speed, status: 'IN_PORT' };
        }
        return { ...vessel, speed };
      }

      case 'IN_PORT': {
        if (!chance(rng, VESSEL_CONSTANTS.DEPARTURE_PROBABILITY)) {
          return { ...vessel, speed: 0 };
        }

        const etaOffset = randomInt(rng, VESSEL_CONSTANTS.ETA_MIN_OFFSET_HOURS, VESSEL_CONSTANTS.ETA_MAX_OFFSET_HOURS);
        const minSpeed = Math.min(VESSEL_CONSTANTS.DEPARTURE_MIN_SPEED, vessel.maxSpeed);
        return {
          ...vessel,
          status: 'UNDERWAY',
          eta: addHours(now, etaOffset),
          speed: uniform(rng, minSpeed, vessel.maxSpeed),
          heading: uniform(rng, 0, 360),
          actualArrival: null,
          lastPortDeparture: now,
          destinationPort: ctx.portCodes.length > 0 ? pick(rng, ctx.portCodes) : vessel.destinationPort,
        };
      }

      case 'AT_ANCHOR':
        return vessel;
    }
  },

  /**
   * Fuel drawn this tick: a base rate plus a share proportional to speed / max speed.
   */
  fuelDraw(vessel: Vessel): number {
    const speedRatio = vessel.maxSpeed > 0 ? vessel.speed / vessel.maxSpeed : 0;
    return VESSEL_CONSTANTS.BASE_FUEL_DRAW + speedRatio * VESSEL_CONSTANTS.SPEED_FUEL_DRAW;
  },

  burnFuel(vessel: Vessel): Vessel {
    return { ...vessel, fuelLevel: clamp(vessel.fuelLevel - this.fuelDraw(vessel), 0, 100) };
  },

  /**
   * Move an underway vessel along its heading for the tick's interval.
   * Distance is converted to degrees with a flat ~111 km per degree scale.
   */
  integratePosition(vessel: Vessel, intervalSeconds: number): Vessel {
    if (vessel.status !== 'UNDERWAY' || vessel.speed <= 0) {
      return vessel;
    }

    const speedMs = vessel.speed * VESSEL_CONSTANTS.KNOTS_TO_METERS_PER_SECOND;
    const distanceDeg = (speedMs * intervalSeconds) / VESSEL_CONSTANTS.METERS_PER_DEGREE;
    const heading = toRadians(vessel.heading);

    return {
      ...vessel,
      latitude: clamp(vessel.latitude + distanceDeg * Math.cos(heading), -90, 90),
      longitude: clamp(vessel.longitude + distanceDeg * Math.sin(heading), -180, 180),
    };
  },

  /**
   * Full per-tick vessel update: status transition, fuel draw, then motion.
   */
  step(vessel: Vessel, ctx: VesselStepContext): Vessel {
    const next = this.integratePosition(this.burnFuel(this.transition(vessel, ctx)), ctx.intervalSeconds);
    assertFinite(next.latitude, 'latitude', next.id);
    assertFinite(next.longitude, 'longitude', next.id);
    assertFinite(next.speed, 'speed', next.id);
    assertFinite(next.fuelLevel, 'fuel level', next.id);
    return next;
  },

  /**
   * Today's fuel burn in MT/day: the baseline with +/-10% noise.
   */
  sampleFuelConsumption(vessel: Vessel, rng: RandomSource): number {
    const jitter = VESSEL_CONSTANTS.FUEL_CONSUMPTION_JITTER;
    return vessel.dailyFuelConsumption * (1 + uniform(rng, -jitter, jitter));
  },

  /**
   * Kilometers per metric ton; 0 when nothing is being burned.
   */
  fuelEfficiency(speedKnots: number, consumptionMtPerDay: number): number {
    if (consumptionMtPerDay <= 0) {
      return 0;
    }
    const distancePerDayKm = speedKnots * 24 * VESSEL_CONSTANTS.NAUTICAL_MILE_KM;
    return distancePerDayKm / consumptionMtPerDay;
  },

  revenueModifier(status: VesselStatus): number {
    return REVENUE_MODIFIERS[status];
  },

  dailyRevenue(vessel: Vessel): number {
    return vessel.dailyRevenue * REVENUE_MODIFIERS[vessel.status];
  },

  statusIndicator(status: VesselStatus): number {
    return STATUS_INDICATORS[status];
  },

  /**
   * Hours between ETA and actual arrival for a docked vessel (negative = early);
   * null when the vessel is not in port or has no recorded arrival.
   */
  etaDelayHours(vessel: Vessel): number | null {
    if (vessel.status !== 'IN_PORT' || !vessel.actualArrival) {
      return null;
    }
    return differenceInMilliseconds(vessel.actualArrival, vessel.eta) / MS_PER_HOUR;
  },
};
