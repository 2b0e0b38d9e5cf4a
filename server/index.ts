#!/usr/bin/env node

import type { Server } from 'node:http';
import { CommanderError } from 'commander';
import { loadConfig } from '../src/config.js';
import { createSimulation } from '../src/simulation/createSimulation.js';
import { MaritimeMetricsRegistry } from '../src/metrics/registry.js';
import { MetricsPublisher } from '../src/metrics/publisher.js';
import { HistoryBootstrapper } from '../src/services/historyBootstrapper.js';
import { TickScheduler } from '../src/services/tickScheduler.js';
import { SIMULATION_CONSTANTS } from '../src/constants/simulation.js';
import { createApp } from './app.js';

async function main() {
  const config = loadConfig();

  const simulation = createSimulation({ vesselCount: config.vesselCount, seed: config.seed });
  const state = simulation.store.getState();
  console.log(`✓ Simulation ready: ${state.vessels.length} vessels, ${state.ports.length} ports`);

  const metrics = new MaritimeMetricsRegistry();
  const publisher = new MetricsPublisher(metrics);

  if (config.backfill) {
    new HistoryBootstrapper(simulation.engine, publisher).run();
  } else {
    console.warn('⚠ History backfill disabled');
  }

  const app = createApp(metrics);
  const server = await new Promise<Server>((resolve, reject) => {
    const listener = app.listen(config.port, () => resolve(listener));
    listener.once('error', reject);
  });
  console.log(`Metrics server listening on port ${config.port} (${SIMULATION_CONSTANTS.METRICS_PATH})`);

  const scheduler = new TickScheduler(simulation.engine, publisher, simulation.store, {
    tickIntervalMs: config.tickIntervalSeconds * 1000,
    retryCooldownMs: config.retryCooldownSeconds * 1000,
  });
  scheduler.start();

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`Received ${signal}, shutting down`);
    scheduler.stop();
    server.close((error) => {
      if (error) {
        console.error('Error while closing server:', error);
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  console.error('Fatal error:', error);
  process.exit(1);
});
