import { createStore } from 'zustand/vanilla';
import type { StateCreator } from 'zustand/vanilla';
import type { CargoTallies, Port, Vessel } from '../types/maritime.js';
import { PORT_CONSTANTS, COMPLIANCE_CONSTANTS } from '../constants/simulation.js';
import { SimulationError } from '../errors.js';
import { emptyTallies } from '../domain/trade.js';

export interface TickCommit {
  vessels: Vessel[];
  ports: Port[];
  tallies: CargoTallies;
  timestamp: Date;
}

export interface SimulationState {
  vessels: Vessel[];
  ports: Port[];
  tallies: CargoTallies;
  tickCount: number;
  lastTickAt: Date | null;

  /**
   * Validate and swap in a whole tick's worth of state at once.
   * Throws without touching the store when anything is out of bounds.
   */
  commitTick: (commit: TickCommit) => void;
  getVessel: (id: string) => Vessel | undefined;
  getPort: (code: string) => Port | undefined;
}

export interface EntityStoreSeed {
  vessels: Vessel[];
  ports: Port[];
  tallies?: CargoTallies;
}

const inRange = (value: number, min: number, max: number): boolean =>
  Number.isFinite(value) && value >= min && value <= max;

const fail = (message: string, entityId: string): never => {
  throw new SimulationError(message, 'INVALID_STATE', entityId);
};

export const validateVessel = (vessel: Vessel): void => {
  if (!inRange(vessel.latitude, -90, 90)) fail(`latitude ${vessel.latitude} out of range`, vessel.id);
  if (!inRange(vessel.longitude, -180, 180)) fail(`longitude ${vessel.longitude} out of range`, vessel.id);
  if (!inRange(vessel.speed, 0, vessel.maxSpeed)) fail(`speed ${vessel.speed} out of range`, vessel.id);
  if (!inRange(vessel.heading, 0, 360) || vessel.heading === 360) fail(`heading ${vessel.heading} out of range`, vessel.id);
  if (!inRange(vessel.fuelLevel, 0, 100)) fail(`fuel level ${vessel.fuelLevel} out of range`, vessel.id);
  if (!inRange(vessel.currentCargo, 0, vessel.capacity)) fail(`cargo ${vessel.currentCargo} out of range`, vessel.id);
  if (!inRange(vessel.aisSignalQuality, COMPLIANCE_CONSTANTS.AIS_MIN, COMPLIANCE_CONSTANTS.AIS_MAX)) {
    fail(`AIS signal quality ${vessel.aisSignalQuality} out of range`, vessel.id);
  }
  if (!Number.isInteger(vessel.complianceViolations) || vessel.complianceViolations < 0) {
    fail(`compliance violations ${vessel.complianceViolations} invalid`, vessel.id);
  }
};

export const validatePort = (port: Port): void => {
  if (!Number.isInteger(port.berthCapacity) || port.berthCapacity <= 0) {
    fail(`berth capacity ${port.berthCapacity} invalid`, port.code);
  }
  if (!inRange(port.currentOccupancy, PORT_CONSTANTS.OCCUPANCY_MIN, PORT_CONSTANTS.OCCUPANCY_MAX)) {
    fail(`occupancy ${port.currentOccupancy} out of range`, port.code);
  }
  if (!Number.isInteger(port.queueLength) || !inRange(port.queueLength, 0, port.berthCapacity)) {
    fail(`queue length ${port.queueLength} out of range`, port.code);
  }
  if (!inRange(port.throughputTeuPerHour, 0, Number.MAX_VALUE)) {
    fail(`throughput ${port.throughputTeuPerHour} invalid`, port.code);
  }
};

const assertSameVessel = (previous: Vessel, next: Vessel): void => {
  if (
    previous.type !== next.type ||
    previous.capacity !== next.capacity ||
    previous.operator !== next.operator ||
    previous.flag !== next.flag
  ) {
    fail('immutable vessel fields changed', next.id);
  }
};

const assertTalliesGrow = (previous: CargoTallies, next: CargoTallies): void => {
  const check = (before: Record<string, number>, after: Record<string, number>) => {
    for (const [key, value] of Object.entries(before)) {
      const updated = after[key];
      if (updated === undefined || updated < value) {
        fail('cumulative cargo tally decreased', key);
      }
    }
  };
  check(previous.volumeByType, next.volumeByType);
  check(previous.routeVolume, next.routeVolume);
};

const validateSeed = (seed: EntityStoreSeed): void => {
  const vesselIds = new Set(seed.vessels.map((vessel) => vessel.id));
  if (vesselIds.size !== seed.vessels.length) {
    throw new SimulationError('duplicate vessel ids', 'INVALID_STATE');
  }
  const portCodes = new Set(seed.ports.map((port) => port.code));
  if (portCodes.size !== seed.ports.length) {
    throw new SimulationError('duplicate port codes', 'INVALID_STATE');
  }
  seed.vessels.forEach(validateVessel);
  seed.ports.forEach(validatePort);
};

const storeInitializer =
  (seed: EntityStoreSeed): StateCreator<SimulationState, [], []> =>
  (set, get) => ({
    vessels: seed.vessels,
    ports: seed.ports,
    tallies: seed.tallies ?? emptyTallies(),
    tickCount: 0,
    lastTickAt: null,

    commitTick: ({ vessels, ports, tallies, timestamp }) => {
      const state = get();

      if (vessels.length !== state.vessels.length || ports.length !== state.ports.length) {
        throw new SimulationError('entity population changed during a tick', 'INVALID_STATE');
      }

      const previousVessels = new Map(state.vessels.map((vessel) => [vessel.id, vessel]));
      for (const vessel of vessels) {
        const previous = previousVessels.get(vessel.id);
        if (!previous) {
          fail('unknown vessel in tick commit', vessel.id);
        } else {
          assertSameVessel(previous, vessel);
        }
        validateVessel(vessel);
      }

      const knownPorts = new Set(state.ports.map((port) => port.code));
      for (const port of ports) {
        if (!knownPorts.has(port.code)) {
          fail('unknown port in tick commit', port.code);
        }
        validatePort(port);
      }

      assertTalliesGrow(state.tallies, tallies);

      set((current) => ({
        vessels,
        ports,
        tallies,
        tickCount: current.tickCount + 1,
        lastTickAt: timestamp,
      }));
    },

    getVessel: (id) => get().vessels.find((vessel) => vessel.id === id),
    getPort: (code) => get().ports.find((port) => port.code === code),
  });

export const createEntityStore = (seed: EntityStoreSeed) => {
  validateSeed(seed);
  return createStore<SimulationState>(storeInitializer(seed));
};

export type EntityStore = ReturnType<typeof createEntityStore>;
