import type { CargoMovement, CargoTallies, Port, PortConditions, Vessel } from '../types/maritime.js';
import { CARGO_TYPES, TRADE_COUNTRIES } from '../constants/fleet.js';
import { PORT_CONSTANTS } from '../constants/simulation.js';
import {
  BERTHED_VESSEL_TYPES,
  Compliance,
  FleetQueries,
  PORT_VESSEL_STATES,
  PortDynamics,
  Trade,
  VesselDynamics,
  type TradeUniverse,
} from '../domain/index.js';
import { gauge, increment, type CounterIncrement, type GaugeSample } from '../metrics/definitions.js';
import type { MetricValueSet } from '../metrics/publisher.js';
import type { EntityStore } from '../store/entityStore.js';
import { mean } from '../utils/math.js';
import type { RandomSource } from '../utils/random.js';

export interface TickSnapshot extends MetricValueSet {
  portConditions: PortConditions[];
  movement: CargoMovement | null;
}

const toUnixSeconds = (date: Date): number => date.getTime() / 1000;

/**
 * Runs one combined simulation step over an entity store.
 *
 * The next vessel and port states are computed from the current ones into a
 * staging copy; the store is only updated by a single `commitTick` once the
 * whole step has succeeded. A step that throws leaves the store as it was.
 */
export class SimulationEngine {
  private readonly universe: TradeUniverse;

  constructor(
    private readonly store: EntityStore,
    private readonly rng: RandomSource,
    countries: readonly string[] = TRADE_COUNTRIES
  ) {
    this.universe = {
      portCodes: store.getState().ports.map((port) => port.code),
      cargoTypes: CARGO_TYPES,
      countries,
    };
  }

  step(now: Date, intervalSeconds: number): TickSnapshot {
    const state = this.store.getState();
    const gauges: GaugeSample[] = [];
    const increments: CounterIncrement[] = [];

    const movedVessels = this.stepVessels(state.vessels, now, intervalSeconds, gauges);
    const { ports: walkedPorts, conditions } = this.stepPorts(state.ports, gauges);
    const { vessels, ports, tallies, movement } = this.deriveComplianceAndTrade(
      movedVessels,
      walkedPorts,
      state.tallies,
      gauges,
      increments
    );
    this.collectPositions(vessels, gauges);
    gauges.push(gauge('maritime_simulation_timestamp_seconds', {}, toUnixSeconds(now)));

    this.store.getState().commitTick({ vessels, ports, tallies, timestamp: now });

    return { timestamp: now, gauges, increments, portConditions: conditions, movement };
  }

  private stepVessels(vessels: Vessel[], now: Date, intervalSeconds: number, gauges: GaugeSample[]): Vessel[] {
    const ctx = { now, intervalSeconds, rng: this.rng, portCodes: this.universe.portCodes };

    const next = vessels.map((current) => {
      const vessel = VesselDynamics.step(current, ctx);
      const identity = {
        vessel_id: vessel.id,
        vessel_name: vessel.name,
        vessel_type: vessel.type,
        operator: vessel.operator,
      };

      const etaDelay = VesselDynamics.etaDelayHours(vessel);
      if (etaDelay !== null) {
        gauges.push(gauge('vessel_eta_delay_hours', { ...identity, route: vessel.currentRoute }, etaDelay));
      }

      const consumption = VesselDynamics.sampleFuelConsumption(vessel, this.rng);
      gauges.push(
        gauge('vessel_fuel_consumption_mt_per_day', identity, consumption),
        gauge('vessel_fuel_efficiency_km_per_mt', identity, VesselDynamics.fuelEfficiency(vessel.speed, consumption)),
        gauge('vessel_revenue_per_day_usd', identity, VesselDynamics.dailyRevenue(vessel)),
        gauge(
          'vessel_status_indicator',
          {
            vessel_id: vessel.id,
            vessel_name: vessel.name,
            operator: vessel.operator,
            status: vessel.status.toLowerCase(),
          },
          VesselDynamics.statusIndicator(vessel.status)
        )
      );

      return vessel;
    });

    for (const row of FleetQueries.utilization(next)) {
      gauges.push(gauge('fleet_utilization_percent', { operator: row.operator, vessel_type: row.vesselType }, row.percent));
    }

    return next;
  }

  private stepPorts(ports: Port[], gauges: GaugeSample[]): { ports: Port[]; conditions: PortConditions[] } {
    const conditions: PortConditions[] = [];

    const next = ports.map((current) => {
      const { port, conditions: derived } = PortDynamics.step(current, this.rng);
      conditions.push(derived);

      const labels = { port_code: port.code, port_name: port.name, country: port.country };
      gauges.push(
        gauge(
          'port_berth_occupancy_percent',
          { ...labels, terminal: PORT_CONSTANTS.TERMINAL_LABEL },
          port.currentOccupancy
        ),
        gauge('port_berth_capacity_total', labels, port.berthCapacity),
        gauge('port_berths_occupied', labels, derived.berthsOccupied),
        gauge('port_queue_length', labels, port.queueLength),
        gauge('port_congestion_index', labels, derived.congestionIndex)
      );

      for (const vesselType of BERTHED_VESSEL_TYPES) {
        gauges.push(
          gauge('port_avg_turnaround_hours', { ...labels, vessel_type: vesselType }, derived.turnaroundHours[vesselType])
        );
      }

      const counts = PortDynamics.vesselCounts(port, this.rng);
      for (const status of PORT_VESSEL_STATES) {
        gauges.push(
          gauge('port_vessel_count_by_status', { port_code: port.code, port_name: port.name, status }, counts[status])
        );
      }

      gauges.push(gauge('port_throughput_teu_per_hour', labels, derived.throughputTeuPerHour));
      return port;
    });

    return { ports: next, conditions };
  }

  private deriveComplianceAndTrade(
    vessels: Vessel[],
    ports: Port[],
    tallies: CargoTallies,
    gauges: GaugeSample[],
    increments: CounterIncrement[]
  ) {
    const movement = Trade.maybeMoveCargo(this.universe, this.rng);
    let nextTallies = tallies;
    if (movement) {
      nextTallies = Trade.record(tallies, movement);
      increments.push(
        increment(
          'cargo_volume_by_type_teu_total',
          {
            port_code: movement.portCode,
            cargo_type: movement.cargoType,
            origin_country: movement.originCountry,
            destination_country: movement.destinationCountry,
          },
          movement.volumeTeu
        ),
        increment(
          'trade_route_volume_teu_total',
          {
            origin_port: movement.originPort,
            destination_port: movement.destinationPort,
            cargo_type: movement.cargoType,
          },
          movement.volumeTeu
        )
      );
    }

    for (const share of Trade.distribution(this.universe, this.rng)) {
      gauges.push(
        gauge('cargo_type_distribution_percent', { port_code: share.portCode, cargo_type: share.cargoType }, share.percent)
      );
    }

    for (const balance of Trade.balances(this.universe, this.rng)) {
      gauges.push(
        gauge('country_trade_balance_teu', { country: balance.country, cargo_type: balance.cargoType }, balance.balanceTeu)
      );
    }

    const nextVessels = vessels.map((current) => {
      const speedCheck = Compliance.checkSpeed(current, this.rng);
      const vessel = Compliance.walkSignalQuality(current, this.rng);

      gauges.push(
        gauge(
          'vessel_speed_violation',
          {
            vessel_id: vessel.id,
            vessel_name: vessel.name,
            zone: speedCheck.zone,
            speed_limit: String(speedCheck.speedLimit),
          },
          speedCheck.violation ? 1 : 0
        ),
        gauge(
          'vessel_ais_signal_quality_percent',
          { vessel_id: vessel.id, vessel_name: vessel.name, flag: vessel.flag },
          vessel.aisSignalQuality
        ),
        gauge(
          'vessel_compliance_score',
          { vessel_id: vessel.id, vessel_name: vessel.name, flag: vessel.flag, operator: vessel.operator },
          Compliance.score(speedCheck.violation, vessel.aisSignalQuality, vessel.complianceViolations)
        )
      );

      return vessel;
    });

    const nextPorts = ports.map((port) => {
      const rates = Compliance.inspectionRates(port, this.universe.countries, this.rng);
      for (const rate of rates) {
        gauges.push(
          gauge('customs_inspection_rate_percent', { port_code: port.code, flag_country: rate.flagCountry }, rate.ratePercent)
        );
      }
      return { ...port, inspectionRate: mean(rates.map((rate) => rate.ratePercent)) };
    });

    return { vessels: nextVessels, ports: nextPorts, tallies: nextTallies, movement };
  }

  private collectPositions(vessels: Vessel[], gauges: GaugeSample[]): void {
    for (const vessel of vessels) {
      const labels = { vessel_id: vessel.id, vessel_name: vessel.name, vessel_type: vessel.type, flag: vessel.flag };
      gauges.push(
        gauge('vessel_latitude', labels, vessel.latitude),
        gauge('vessel_longitude', labels, vessel.longitude),
        gauge('vessel_speed_knots', labels, vessel.speed)
      );

      const portCall = { vessel_id: vessel.id, port_code: vessel.destinationPort, vessel_type: vessel.type };
      if (vessel.actualArrival) {
        gauges.push(gauge('vessel_port_arrival_time', portCall, toUnixSeconds(vessel.actualArrival)));
      }
      gauges.push(gauge('vessel_port_departure_time', portCall, toUnixSeconds(vessel.lastPortDeparture)));
    }
  }
}
