import type { Port, Vessel } from '../types/maritime.js';

export const TEST_NOW = new Date('2024-03-01T12:00:00Z');

export const buildVessel = (overrides: Partial<Vessel> = {}): Vessel => ({
  id: 'V0001',
  name: 'Test Voyager',
  type: 'CONTAINER',
  typeName: 'Container Ship',
  operator: 'Test Lines',
  flag: 'PA',
  capacity: 4000,
  maxSpeed: 20,
  dailyFuelConsumption: 100,
  dailyRevenue: 100_000,
  complianceViolations: 0,
  lastInspection: new Date('2024-01-01T00:00:00Z'),

  latitude: 10,
  longitude: 20,
  speed: 10,
  heading: 0,
  status: 'UNDERWAY',
  currentCargo: 2000,
  fuelLevel: 50,

  eta: new Date('2024-03-05T00:00:00Z'),
  actualArrival: null,
  lastPortDeparture: new Date('2024-02-28T00:00:00Z'),
  currentRoute: 'Route_1',
  destinationPort: 'AAAAA',

  aisSignalQuality: 90,
  ...overrides,
});

export const buildPort = (overrides: Partial<Port> = {}): Port => ({
  code: 'AAAAA',
  name: 'Alpha',
  country: 'Testland',
  countryCode: 'TL',
  latitude: 1,
  longitude: 2,
  berthCapacity: 10,
  terminals: ['Terminal_A', 'Terminal_B'],
  turnaroundBaselines: { CONTAINER: 10, BULK: 20, TANKER: 30 },
  baseThroughputTeuPerHour: 100,
  baseInspectionRate: 20,

  currentOccupancy: 50,
  queueLength: 2,
  throughputTeuPerHour: 100,
  inspectionRate: 20,
  ...overrides,
});
