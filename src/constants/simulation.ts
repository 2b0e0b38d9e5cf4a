export const SIMULATION_CONSTANTS = {
  // Scheduling
  TICK_INTERVAL_SECONDS: 300,
  RETRY_COOLDOWN_SECONDS: 60,
  DEFAULT_VESSEL_COUNT: 75,
  DEFAULT_LISTEN_PORT: 8000,
  METRICS_PATH: '/metrics',

  // History backfill: 24h in 10 minute steps
  BACKFILL_ITERATIONS: 144,
  BACKFILL_STEP_MINUTES: 10,
} as const;

export const VESSEL_CONSTANTS = {
  ARRIVAL_PROBABILITY: 0.02,
  BERTH_ASSIGNMENT_PROBABILITY: 0.1,
  DEPARTURE_PROBABILITY: 0.05,

  UNDERWAY_SPEED_DRIFT: 1, // knots per tick, either way
  ARRIVAL_MAX_SPEED: 3,
  WAITING_MAX_SPEED: 2,
  DEPARTURE_MIN_SPEED: 8,

  ETA_MIN_OFFSET_HOURS: -72,
  ETA_MAX_OFFSET_HOURS: 168,

  BASE_FUEL_DRAW: 0.001, // percent per tick
  SPEED_FUEL_DRAW: 0.01, // percent per tick at max speed

  KNOTS_TO_METERS_PER_SECOND: 0.514444,
  METERS_PER_DEGREE: 111_000,
  NAUTICAL_MILE_KM: 1.852,

  FUEL_CONSUMPTION_JITTER: 0.1,
} as const;

export const PORT_CONSTANTS = {
  OCCUPANCY_MIN: 20,
  OCCUPANCY_MAX: 100,
  OCCUPANCY_STEP: 3,
  QUEUE_STEP_DOWN: -2,
  QUEUE_STEP_UP: 3,

  OCCUPANCY_WEIGHT: 70,
  QUEUE_WEIGHT: 30,

  TURNAROUND_CONGESTION_PENALTY: 0.5,
  THROUGHPUT_BASE_FACTOR: 1.2,
  THROUGHPUT_CONGESTION_PENALTY: 0.4,

  STATUS_COUNT_MAX: 15,
  TERMINAL_LABEL: 'All_Terminals',
} as const;

export const COMPLIANCE_CONSTANTS = {
  ZONES: ['port_approach', 'coastal', 'open_sea'],
  ZONE_SPEED_LIMITS: [12, 15, 20, 25],

  AIS_MIN: 60,
  AIS_MAX: 100,
  AIS_STEP_DOWN: -2,
  AIS_STEP_UP: 1,

  SCORE_CLEAN: 100,
  SCORE_SPEEDING: 70,
  RECORD_BASELINE: 90,
  RECORD_PENALTY_PER_VIOLATION: 10,
  RECORD_FLOOR: 60,

  INSPECTED_FLAGS_PER_PORT: 5,
  INSPECTION_JITTER_MIN: 0.8,
  INSPECTION_JITTER_MAX: 1.2,
} as const;

export const TRADE_CONSTANTS = {
  MOVEMENT_PROBABILITY: 0.3,
  MOVEMENT_MIN_TEU: 50,
  MOVEMENT_MAX_TEU: 500,

  DISTRIBUTION_TOTAL_MIN: 1000,
  DISTRIBUTION_TOTAL_MAX: 5000,
  DISTRIBUTION_AMOUNT_MIN: 100,
  DISTRIBUTION_AMOUNT_MAX: 1500,

  BALANCE_MIN_TEU: -10_000,
  BALANCE_MAX_TEU: 10_000,
} as const;
