/**
 * Metric table
 *
 * Every exported metric is declared here with its kind and ordered label names.
 * Samples are typed against this table, so a sample with a missing or unknown
 * label does not compile.
 */

export type MetricKind = 'gauge' | 'counter';

export interface MetricDefinition {
  kind: MetricKind;
  help: string;
  labelNames: readonly string[];
  /**
   * The label tuple includes a value re-sampled every tick; the family is
   * cleared before each tick's samples are written.
   */
  volatileLabels?: boolean;
}

const defineMetrics = <T extends Record<string, MetricDefinition>>(definitions: T): T => definitions;

const VESSEL_LABELS = ['vessel_id', 'vessel_name', 'vessel_type', 'operator'] as const;
const VESSEL_POSITION_LABELS = ['vessel_id', 'vessel_name', 'vessel_type', 'flag'] as const;
const PORT_LABELS = ['port_code', 'port_name', 'country'] as const;
const PORT_CALL_LABELS = ['vessel_id', 'port_code', 'vessel_type'] as const;

export const METRIC_DEFINITIONS = defineMetrics({
  // Shipping companies / fleet operators
  vessel_eta_delay_hours: {
    kind: 'gauge',
    help: 'Hours difference between ETA and actual arrival (negative = early)',
    labelNames: ['vessel_id', 'vessel_name', 'vessel_type', 'operator', 'route'] as const,
  },
  vessel_fuel_consumption_mt_per_day: {
    kind: 'gauge',
    help: 'Fuel consumption in metric tons per day',
    labelNames: VESSEL_LABELS,
  },
  vessel_fuel_efficiency_km_per_mt: {
    kind: 'gauge',
    help: 'Kilometers per metric ton of fuel',
    labelNames: VESSEL_LABELS,
  },
  fleet_utilization_percent: {
    kind: 'gauge',
    help: 'Fleet utilization percentage by operator and vessel type',
    labelNames: ['operator', 'vessel_type'] as const,
  },
  vessel_status_indicator: {
    kind: 'gauge',
    help: 'Vessel status (1=underway, 0.8=in port, 0.7=at anchor, 0.5=waiting)',
    labelNames: ['vessel_id', 'vessel_name', 'operator', 'status'] as const,
    volatileLabels: true,
  },
  vessel_revenue_per_day_usd: {
    kind: 'gauge',
    help: 'Estimated daily revenue in USD',
    labelNames: VESSEL_LABELS,
  },

  // Port authorities / terminal operators
  port_berth_occupancy_percent: {
    kind: 'gauge',
    help: 'Port berth occupancy percentage',
    labelNames: ['port_code', 'port_name', 'country', 'terminal'] as const,
  },
  port_berth_capacity_total: {
    kind: 'gauge',
    help: 'Total berth capacity',
    labelNames: PORT_LABELS,
  },
  port_berths_occupied: {
    kind: 'gauge',
    help: 'Number of occupied berths',
    labelNames: PORT_LABELS,
  },
  port_avg_turnaround_hours: {
    kind: 'gauge',
    help: 'Average vessel turnaround time in hours',
    labelNames: ['port_code', 'port_name', 'country', 'vessel_type'] as const,
  },
  vessel_port_arrival_time: {
    kind: 'gauge',
    help: 'Unix timestamp of vessel port arrival',
    labelNames: PORT_CALL_LABELS,
    volatileLabels: true,
  },
  vessel_port_departure_time: {
    kind: 'gauge',
    help: 'Unix timestamp of vessel port departure',
    labelNames: PORT_CALL_LABELS,
    volatileLabels: true,
  },
  port_queue_length: {
    kind: 'gauge',
    help: 'Number of vessels waiting for berth',
    labelNames: PORT_LABELS,
  },
  port_congestion_index: {
    kind: 'gauge',
    help: 'Port congestion index (0-100, higher = more congested)',
    labelNames: PORT_LABELS,
  },
  port_vessel_count_by_status: {
    kind: 'gauge',
    help: 'Count of vessels by status at port',
    labelNames: ['port_code', 'port_name', 'status'] as const,
  },
  port_throughput_teu_per_hour: {
    kind: 'gauge',
    help: 'Port throughput in TEU per hour',
    labelNames: PORT_LABELS,
  },

  // Customs / government agencies
  cargo_volume_by_type_teu_total: {
    kind: 'counter',
    help: 'Total cargo volume by type in TEU',
    labelNames: ['port_code', 'cargo_type', 'origin_country', 'destination_country'] as const,
  },
  cargo_type_distribution_percent: {
    kind: 'gauge',
    help: 'Percentage distribution of cargo types',
    labelNames: ['port_code', 'cargo_type'] as const,
  },
  trade_route_volume_teu_total: {
    kind: 'counter',
    help: 'Total cargo volume by trade route',
    labelNames: ['origin_port', 'destination_port', 'cargo_type'] as const,
  },
  country_trade_balance_teu: {
    kind: 'gauge',
    help: 'Trade balance in TEU (exports - imports)',
    labelNames: ['country', 'cargo_type'] as const,
  },
  vessel_speed_violation: {
    kind: 'gauge',
    help: '1 if vessel exceeds speed limit, 0 otherwise',
    labelNames: ['vessel_id', 'vessel_name', 'zone', 'speed_limit'] as const,
    volatileLabels: true,
  },
  vessel_ais_signal_quality_percent: {
    kind: 'gauge',
    help: 'AIS signal quality percentage',
    labelNames: ['vessel_id', 'vessel_name', 'flag'] as const,
  },
  vessel_compliance_score: {
    kind: 'gauge',
    help: 'Overall compliance score (0-100)',
    labelNames: ['vessel_id', 'vessel_name', 'flag', 'operator'] as const,
  },
  customs_inspection_rate_percent: {
    kind: 'gauge',
    help: 'Percentage of vessels inspected',
    labelNames: ['port_code', 'flag_country'] as const,
    volatileLabels: true,
  },

  // Position and movement
  vessel_latitude: {
    kind: 'gauge',
    help: 'Vessel latitude position',
    labelNames: VESSEL_POSITION_LABELS,
  },
  vessel_longitude: {
    kind: 'gauge',
    help: 'Vessel longitude position',
    labelNames: VESSEL_POSITION_LABELS,
  },
  vessel_speed_knots: {
    kind: 'gauge',
    help: 'Vessel speed in knots',
    labelNames: VESSEL_POSITION_LABELS,
  },

  // Simulation clock
  maritime_simulation_timestamp_seconds: {
    kind: 'gauge',
    help: 'Unix timestamp of the most recent simulation tick (historical during backfill)',
    labelNames: [] as const,
  },
} as const);

type Definitions = typeof METRIC_DEFINITIONS;

export type MetricName = keyof Definitions;

export type GaugeName = {
  [M in MetricName]: Definitions[M]['kind'] extends 'gauge' ? M : never;
}[MetricName];

export type CounterName = {
  [M in MetricName]: Definitions[M]['kind'] extends 'counter' ? M : never;
}[MetricName];

export type MetricLabels<M extends MetricName> = Record<Definitions[M]['labelNames'][number], string>;

export type GaugeSample = {
  [M in GaugeName]: { metric: M; labels: MetricLabels<M>; value: number };
}[GaugeName];

export type CounterIncrement = {
  [M in CounterName]: { metric: M; labels: MetricLabels<M>; amount: number };
}[CounterName];

export const gauge = <M extends GaugeName>(metric: M, labels: MetricLabels<M>, value: number) =>
  ({ metric, labels, value });

export const increment = <M extends CounterName>(metric: M, labels: MetricLabels<M>, amount: number) =>
  ({ metric, labels, amount });
