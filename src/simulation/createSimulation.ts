import { loadPortReferences, type PortReference } from '../data/ports.js';
import { createEntityStore, type EntityStore } from '../store/entityStore.js';
import { createSeededRandom, mathRandomSource, type RandomSource } from '../utils/random.js';
import { createFleet, createPorts } from './fleetFactory.js';
import { SimulationEngine } from './engine.js';

export interface SimulationOptions {
  vesselCount: number;
  seed?: number;
  /** Defaults to the bundled port list */
  ports?: readonly PortReference[];
  now?: Date;
}

export interface Simulation {
  store: EntityStore;
  engine: SimulationEngine;
  rng: RandomSource;
}

/**
 * Build a fresh, fully randomized simulation: ports, fleet, store and engine
 * sharing one random source.
 */
export function createSimulation(options: SimulationOptions): Simulation {
  const rng = options.seed === undefined ? mathRandomSource : createSeededRandom(options.seed);
  const references = options.ports ?? loadPortReferences();
  const now = options.now ?? new Date();

  const ports = createPorts(references, rng);
  const vessels = createFleet(
    options.vesselCount,
    rng,
    now,
    ports.map((port) => port.code)
  );

  const store = createEntityStore({ vessels, ports });
  return { store, engine: new SimulationEngine(store, rng), rng };
}
