import { addHours, subDays, subHours } from 'date-fns';
import type { Port, Vessel, VesselStatus } from '../types/maritime.js';
import {
  FLAG_STATES,
  INITIAL_RANGES,
  OPERATORS,
  ROUTE_COUNT,
  VESSEL_NAME_PREFIXES,
  VESSEL_NAME_SUFFIXES,
  VESSEL_STATUSES,
  VESSEL_TYPE_PROFILES,
} from '../constants/fleet.js';
import type { PortReference } from '../data/ports.js';
import { pick, randomInt, uniform, type RandomSource } from '../utils/random.js';
import { SimulationError } from '../errors.js';

const LOADED_STATUSES: ReadonlySet<VesselStatus> = new Set<VesselStatus>(['UNDERWAY', 'AT_ANCHOR']);

const between = (rng: RandomSource, range: readonly [number, number]): number => uniform(rng, range[0], range[1]);
const intBetween = (rng: RandomSource, range: readonly [number, number]): number => randomInt(rng, range[0], range[1]);

export const formatVesselId = (index: number): string => `V${String(index + 1).padStart(4, '0')}`;

/**
 * Create one vessel with randomized identity, position and voyage data.
 * Vessels that are underway or at anchor start with cargo aboard.
 */
export function createVessel(index: number, rng: RandomSource, now: Date, portCodes: readonly string[]): Vessel {
  if (portCodes.length === 0) {
    throw new SimulationError('Cannot create vessels without ports', 'EMPTY_POPULATION');
  }

  const profile = pick(rng, VESSEL_TYPE_PROFILES);
  const name = `${pick(rng, VESSEL_NAME_PREFIXES)} ${pick(rng, VESSEL_NAME_SUFFIXES)}`;
  const capacity = randomInt(rng, profile.minTeu, profile.maxTeu);
  const maxSpeed = uniform(rng, profile.minSpeed, profile.maxSpeed);
  const status = pick(rng, VESSEL_STATUSES);

  const currentCargo = LOADED_STATUSES.has(status)
    ? randomInt(
        rng,
        Math.floor(capacity * INITIAL_RANGES.CARGO_LOAD_FACTOR[0]),
        Math.floor(capacity * INITIAL_RANGES.CARGO_LOAD_FACTOR[1])
      )
    : 0;

  return {
    id: formatVesselId(index),
    name,
    type: profile.type,
    typeName: profile.typeName,
    flag: pick(rng, FLAG_STATES),
    operator: pick(rng, OPERATORS),
    capacity,
    maxSpeed,
    dailyFuelConsumption: between(rng, INITIAL_RANGES.DAILY_FUEL_CONSUMPTION),
    dailyRevenue: uniform(rng, profile.minRevenue, profile.maxRevenue),
    complianceViolations: intBetween(rng, INITIAL_RANGES.COMPLIANCE_VIOLATIONS),
    lastInspection: subDays(now, intBetween(rng, INITIAL_RANGES.LAST_INSPECTION_DAYS)),

    latitude: between(rng, INITIAL_RANGES.LATITUDE),
    longitude: between(rng, INITIAL_RANGES.LONGITUDE),
    speed: uniform(rng, 0, maxSpeed),
    heading: uniform(rng, 0, 360),
    status,
    currentCargo,
    fuelLevel: between(rng, INITIAL_RANGES.FUEL_LEVEL),

    eta: addHours(now, intBetween(rng, INITIAL_RANGES.ETA_HOURS)),
    actualArrival: null,
    lastPortDeparture: subHours(now, intBetween(rng, INITIAL_RANGES.LAST_DEPARTURE_HOURS)),
    currentRoute: `Route_${randomInt(rng, 1, ROUTE_COUNT)}`,
    destinationPort: pick(rng, portCodes),

    aisSignalQuality: between(rng, INITIAL_RANGES.AIS_SIGNAL_QUALITY),
  };
}

export function createFleet(count: number, rng: RandomSource, now: Date, portCodes: readonly string[]): Vessel[] {
  return Array.from({ length: count }, (_, index) => createVessel(index, rng, now, portCodes));
}

export const terminalNames = (count: number): string[] =>
  Array.from({ length: count }, (_, index) => `Terminal_${String.fromCharCode(65 + index)}`);

/**
 * Create a port from its reference entry with randomized operating baselines.
 */
export function createPort(reference: PortReference, rng: RandomSource): Port {
  const baseThroughput = between(rng, INITIAL_RANGES.THROUGHPUT_TEU_PER_HOUR);
  const baseInspectionRate = between(rng, INITIAL_RANGES.INSPECTION_RATE);

  return {
    code: reference.code,
    name: reference.name,
    country: reference.country,
    countryCode: reference.countryCode,
    latitude: reference.latitude,
    longitude: reference.longitude,
    berthCapacity: reference.berthCapacity,
    terminals: terminalNames(reference.terminalCount),
    currentOccupancy: between(rng, INITIAL_RANGES.PORT_OCCUPANCY),
    queueLength: Math.min(reference.berthCapacity, intBetween(rng, INITIAL_RANGES.PORT_QUEUE)),
    turnaroundBaselines: {
      CONTAINER: between(rng, INITIAL_RANGES.TURNAROUND_CONTAINER),
      BULK: between(rng, INITIAL_RANGES.TURNAROUND_BULK),
      TANKER: between(rng, INITIAL_RANGES.TURNAROUND_TANKER),
    },
    baseThroughputTeuPerHour: baseThroughput,
    baseInspectionRate,
    throughputTeuPerHour: baseThroughput,
    inspectionRate: baseInspectionRate,
  };
}

export function createPorts(references: readonly PortReference[], rng: RandomSource): Port[] {
  return references.map((reference) => createPort(reference, rng));
}
