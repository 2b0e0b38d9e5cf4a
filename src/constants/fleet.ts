import type { CargoType, VesselStatus, VesselType } from '../types/maritime.js';

export interface VesselTypeProfile {
  type: VesselType;
  typeName: string;
  minTeu: number;
  maxTeu: number;
  minSpeed: number;
  maxSpeed: number;
  minRevenue: number;
  maxRevenue: number;
}

export const VESSEL_TYPE_PROFILES: readonly VesselTypeProfile[] = [
  { type: 'CONTAINER', typeName: 'Container Ship', minTeu: 2000, maxTeu: 8000, minSpeed: 15, maxSpeed: 25, minRevenue: 80_000, maxRevenue: 150_000 },
  { type: 'BULK', typeName: 'Bulk Carrier', minTeu: 1000, maxTeu: 4000, minSpeed: 12, maxSpeed: 18, minRevenue: 40_000, maxRevenue: 80_000 },
  { type: 'TANKER', typeName: 'Tanker', minTeu: 500, maxTeu: 2000, minSpeed: 10, maxSpeed: 16, minRevenue: 60_000, maxRevenue: 120_000 },
  { type: 'GENERAL', typeName: 'General Cargo', minTeu: 200, maxTeu: 1000, minSpeed: 8, maxSpeed: 14, minRevenue: 20_000, maxRevenue: 50_000 },
  { type: 'RORO', typeName: 'RoRo', minTeu: 300, maxTeu: 1500, minSpeed: 12, maxSpeed: 20, minRevenue: 30_000, maxRevenue: 70_000 },
];

export const VESSEL_STATUSES: readonly VesselStatus[] = ['UNDERWAY', 'AT_ANCHOR', 'IN_PORT', 'WAITING_BERTH'];

export const FLAG_STATES = ['MH', 'LR', 'PA', 'SG', 'MT', 'CY', 'GB', 'NO', 'DK', 'NL', 'CN', 'KR', 'JP'] as const;

export const OPERATORS = [
  'Blue Meridian',
  'Northline Shipping',
  'Harbor & Crest',
  'Tidewater Lines',
  'Southern Cross Maritime',
  'Keel Point',
  'Atlas Freight',
  'Coral Route',
  'Ironbridge Carriers',
  'Seaward Partners',
] as const;

export const VESSEL_NAME_PREFIXES = ['Star', 'Ocean', 'Global', 'Pacific', 'Atlantic', 'Northern', 'Eastern', 'Western'] as const;
export const VESSEL_NAME_SUFFIXES = ['Trader', 'Pioneer', 'Voyager', 'Navigator', 'Explorer', 'Leader', 'Champion', 'Victory'] as const;

export const ROUTE_COUNT = 20;

export const CARGO_TYPES: readonly CargoType[] = ['containers', 'bulk_dry', 'bulk_liquid', 'general_cargo', 'vehicles'];

export const TRADE_COUNTRIES = ['CN', 'SG', 'US', 'NL', 'DE', 'KR', 'JP', 'AE', 'GB', 'MY', 'TH', 'VN'] as const;

// Initial value ranges
export const INITIAL_RANGES = {
  FUEL_LEVEL: [30, 95],
  DAILY_FUEL_CONSUMPTION: [50, 300],
  LATITUDE: [-60, 70],
  LONGITUDE: [-180, 180],
  AIS_SIGNAL_QUALITY: [85, 100],
  ETA_HOURS: [1, 168],
  LAST_DEPARTURE_HOURS: [1, 72],
  LAST_INSPECTION_DAYS: [1, 365],
  COMPLIANCE_VIOLATIONS: [0, 3],
  CARGO_LOAD_FACTOR: [0.3, 0.95],

  PORT_OCCUPANCY: [40, 95],
  PORT_QUEUE: [0, 20],
  TURNAROUND_CONTAINER: [8, 48],
  TURNAROUND_BULK: [24, 96],
  TURNAROUND_TANKER: [12, 60],
  THROUGHPUT_TEU_PER_HOUR: [50, 300],
  INSPECTION_RATE: [10, 40],
} as const;
