// Vessel types
export type VesselType = 'CONTAINER' | 'BULK' | 'TANKER' | 'GENERAL' | 'RORO';
export type VesselStatus = 'UNDERWAY' | 'AT_ANCHOR' | 'WAITING_BERTH' | 'IN_PORT';

export interface GeoPosition {
  latitude: number;
  longitude: number;
}

export interface Vessel extends GeoPosition {
  readonly id: string;
  readonly name: string;
  readonly type: VesselType;
  readonly typeName: string;
  readonly operator: string;
  readonly flag: string;
  readonly capacity: number; // TEU
  readonly maxSpeed: number; // knots
  readonly dailyFuelConsumption: number; // MT per day
  readonly dailyRevenue: number; // USD
  readonly complianceViolations: number;
  readonly lastInspection: Date;

  speed: number; // knots
  heading: number; // degrees, [0, 360)
  status: VesselStatus;
  currentCargo: number;
  fuelLevel: number; // percent remaining

  // Voyage tracking
  eta: Date;
  actualArrival: Date | null;
  lastPortDeparture: Date;
  currentRoute: string;
  destinationPort: string;

  aisSignalQuality: number; // percent
}

// Port types
export type BerthedVesselType = Extract<VesselType, 'CONTAINER' | 'BULK' | 'TANKER'>;

export type TurnaroundBaselines = Readonly<Record<BerthedVesselType, number>>;

export interface Port extends GeoPosition {
  readonly code: string;
  readonly name: string;
  readonly country: string;
  readonly countryCode: string;
  readonly berthCapacity: number;
  readonly terminals: readonly string[];
  readonly turnaroundBaselines: TurnaroundBaselines; // hours
  readonly baseThroughputTeuPerHour: number;
  readonly baseInspectionRate: number; // percent

  currentOccupancy: number; // percent
  queueLength: number;
  throughputTeuPerHour: number;
  inspectionRate: number;
}

/**
 * Derived port figures for one tick; recomputed from occupancy and queue every time.
 */
export interface PortConditions {
  portCode: string;
  congestionIndex: number;
  berthsOccupied: number;
  turnaroundHours: Record<BerthedVesselType, number>;
  throughputTeuPerHour: number;
}

// Cargo and trade
export type CargoType = 'containers' | 'bulk_dry' | 'bulk_liquid' | 'general_cargo' | 'vehicles';

export interface CargoMovement {
  portCode: string;
  cargoType: CargoType;
  originCountry: string;
  destinationCountry: string;
  originPort: string;
  destinationPort: string;
  volumeTeu: number;
}

export interface CargoTallies {
  /** Keyed by port|cargoType|origin|destination */
  volumeByType: Record<string, number>;
  /** Keyed by originPort|destinationPort|cargoType */
  routeVolume: Record<string, number>;
}
