import { describe, it, expect } from 'vitest';
import { addMinutes } from 'date-fns';
import { createSimulation } from '../createSimulation.js';
import { SimulationEngine } from '../engine.js';
import { createSeededRandom, type RandomSource } from '../../utils/random.js';
import { TEST_NOW } from '../../__tests__/builders.js';

const failingAfter = (draws: number, inner: RandomSource): RandomSource => {
  let remaining = draws;
  return {
    next() {
      remaining -= 1;
      if (remaining < 0) {
        throw new Error('random source exhausted');
      }
      return inner.next();
    },
  };
};

describe('SimulationEngine', () => {
  it('keeps every entity in bounds and tallies monotone over many ticks', () => {
    const { store, engine } = createSimulation({ vesselCount: 20, seed: 7, now: TEST_NOW });
    let previous = store.getState().tallies;

    for (let i = 0; i < 300; i += 1) {
      engine.step(addMinutes(TEST_NOW, 5 * (i + 1)), 300);
      const state = store.getState();

      state.vessels.forEach((vessel) => {
        expect(vessel.latitude).toBeGreaterThanOrEqual(-90);
        expect(vessel.latitude).toBeLessThanOrEqual(90);
        expect(vessel.longitude).toBeGreaterThanOrEqual(-180);
        expect(vessel.longitude).toBeLessThanOrEqual(180);
        expect(vessel.speed).toBeGreaterThanOrEqual(0);
        expect(vessel.speed).toBeLessThanOrEqual(vessel.maxSpeed);
        expect(vessel.fuelLevel).toBeGreaterThanOrEqual(0);
        expect(vessel.fuelLevel).toBeLessThanOrEqual(100);
      });
      state.ports.forEach((port) => {
        expect(port.currentOccupancy).toBeGreaterThanOrEqual(20);
        expect(port.currentOccupancy).toBeLessThanOrEqual(100);
        expect(port.queueLength).toBeGreaterThanOrEqual(0);
        expect(port.queueLength).toBeLessThanOrEqual(port.berthCapacity);
      });
      for (const [key, value] of Object.entries(previous.routeVolume)) {
        expect(state.tallies.routeVolume[key]).toBeGreaterThanOrEqual(value);
      }
      previous = state.tallies;
    }

    expect(store.getState().tickCount).toBe(300);
  });

  it('returns the metric values for the tick', () => {
    const { store, engine } = createSimulation({ vesselCount: 5, seed: 3, now: TEST_NOW });
    const tickAt = addMinutes(TEST_NOW, 5);

    const snapshot = engine.step(tickAt, 300);
    const state = store.getState();

    expect(snapshot.timestamp).toBe(tickAt);
    expect(snapshot.portConditions).toHaveLength(state.ports.length);
    expect(snapshot.gauges).toContainEqual({
      metric: 'maritime_simulation_timestamp_seconds',
      labels: {},
      value: tickAt.getTime() / 1000,
    });

    const latitudes = snapshot.gauges.filter((sample) => sample.metric === 'vessel_latitude');
    expect(latitudes.map((sample) => sample.value)).toEqual(state.vessels.map((vessel) => vessel.latitude));

    const congestion = snapshot.gauges.filter((sample) => sample.metric === 'port_congestion_index');
    expect(congestion.map((sample) => sample.value)).toEqual(
      snapshot.portConditions.map((conditions) => conditions.congestionIndex)
    );

    const inspections = snapshot.gauges.filter((sample) => sample.metric === 'customs_inspection_rate_percent');
    expect(inspections).toHaveLength(state.ports.length * 5);
  });

  it('emits counter increments that match the tick movement', () => {
    const { engine } = createSimulation({ vesselCount: 5, seed: 21, now: TEST_NOW });

    for (let i = 0; i < 50; i += 1) {
      const snapshot = engine.step(addMinutes(TEST_NOW, i + 1), 60);
      if (snapshot.movement) {
        expect(snapshot.increments).toHaveLength(2);
        snapshot.increments.forEach((entry) => expect(entry.amount).toBe(snapshot.movement?.volumeTeu));
      } else {
        expect(snapshot.increments).toEqual([]);
      }
    }
  });

  it('leaves the store untouched when a step fails part way', () => {
    const { store } = createSimulation({ vesselCount: 10, seed: 5, now: TEST_NOW });
    const before = store.getState();
    const engine = new SimulationEngine(store, failingAfter(40, createSeededRandom(99)));

    expect(() => engine.step(addMinutes(TEST_NOW, 5), 300)).toThrow('random source exhausted');

    const after = store.getState();
    expect(after.vessels).toBe(before.vessels);
    expect(after.ports).toBe(before.ports);
    expect(after.tickCount).toBe(0);
  });
});
