import type { BerthedVesselType, Port, PortConditions } from '../types/maritime.js';
import { PORT_CONSTANTS } from '../constants/simulation.js';
import { randomInt, uniform, type RandomSource } from '../utils/random.js';
import { assertFinite, clamp } from '../utils/math.js';

export const BERTHED_VESSEL_TYPES: readonly BerthedVesselType[] = ['CONTAINER', 'BULK', 'TANKER'];

export type PortVesselState = 'docked' | 'waiting' | 'departing';

export const PORT_VESSEL_STATES: readonly PortVesselState[] = ['docked', 'waiting', 'departing'];

/**
 * Port domain logic - occupancy/queue random walk and the figures derived from it.
 * Congestion is computed once per tick by `congestionIndex`; turnaround and
 * throughput take that value as input rather than recomputing it.
 */
export const PortDynamics = {
  /**
   * Random walk for occupancy and queue length, clamped to their ranges.
   */
  walk(port: Port, rng: RandomSource): Port {
    const occupancy = clamp(
      port.currentOccupancy + uniform(rng, -PORT_CONSTANTS.OCCUPANCY_STEP, PORT_CONSTANTS.OCCUPANCY_STEP),
      PORT_CONSTANTS.OCCUPANCY_MIN,
      PORT_CONSTANTS.OCCUPANCY_MAX
    );
    const queueLength = clamp(
      port.queueLength + randomInt(rng, PORT_CONSTANTS.QUEUE_STEP_DOWN, PORT_CONSTANTS.QUEUE_STEP_UP),
      0,
      port.berthCapacity
    );

    return { ...port, currentOccupancy: occupancy, queueLength };
  },

  /**
   * 70 points from occupancy, 30 from queue length relative to berth capacity.
   */
  congestionIndex(occupancyPercent: number, queueLength: number, berthCapacity: number): number {
    const queueRatio = berthCapacity > 0 ? queueLength / berthCapacity : 0;
    const index =
      PORT_CONSTANTS.OCCUPANCY_WEIGHT * (occupancyPercent / 100) + PORT_CONSTANTS.QUEUE_WEIGHT * queueRatio;
    return clamp(index, 0, 100);
  },

  berthsOccupied(occupancyPercent: number, berthCapacity: number): number {
    return Math.min(berthCapacity, Math.floor((occupancyPercent / 100) * berthCapacity));
  },

  /**
   * Congestion inflates turnaround by up to 50%.
   */
  turnaroundHours(baselineHours: number, congestionIndex: number): number {
    return baselineHours * (1 + (congestionIndex / 100) * PORT_CONSTANTS.TURNAROUND_CONGESTION_PENALTY);
  },

  /**
   * Throughput runs at 120% of base when idle, falling to 80% at full congestion.
   */
  throughput(baseTeuPerHour: number, congestionIndex: number): number {
    const efficiency =
      PORT_CONSTANTS.THROUGHPUT_BASE_FACTOR - (congestionIndex / 100) * PORT_CONSTANTS.THROUGHPUT_CONGESTION_PENALTY;
    return Math.max(0, baseTeuPerHour * efficiency);
  },

  conditions(port: Port): PortConditions {
    const congestionIndex = assertFinite(
      this.congestionIndex(port.currentOccupancy, port.queueLength, port.berthCapacity),
      'congestion index',
      port.code
    );

    const turnaroundHours = {
      CONTAINER: this.turnaroundHours(port.turnaroundBaselines.CONTAINER, congestionIndex),
      BULK: this.turnaroundHours(port.turnaroundBaselines.BULK, congestionIndex),
      TANKER: this.turnaroundHours(port.turnaroundBaselines.TANKER, congestionIndex),
    };

    return {
      portCode: port.code,
      congestionIndex,
      berthsOccupied: this.berthsOccupied(port.currentOccupancy, port.berthCapacity),
      turnaroundHours,
      throughputTeuPerHour: assertFinite(
        this.throughput(port.baseThroughputTeuPerHour, congestionIndex),
        'throughput',
        port.code
      ),
    };
  },

  /**
   * Full per-tick port update. Returns the next port state and its derived conditions.
   */
  step(port: Port, rng: RandomSource): { port: Port; conditions: PortConditions } {
    const walked = this.walk(port, rng);
    const conditions = this.conditions(walked);
    return {
      port: { ...walked, throughputTeuPerHour: conditions.throughputTeuPerHour },
      conditions,
    };
  },

  /**
   * Vessel counts by state at the port; `waiting` mirrors the berth queue.
   */
  vesselCounts(port: Port, rng: RandomSource): Record<PortVesselState, number> {
    return {
      docked: randomInt(rng, 0, PORT_CONSTANTS.STATUS_COUNT_MAX),
      waiting: port.queueLength,
      departing: randomInt(rng, 0, PORT_CONSTANTS.STATUS_COUNT_MAX),
    };
  },
};
