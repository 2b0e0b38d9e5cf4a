import express from 'express';
import type { MaritimeMetricsRegistry } from '../src/metrics/registry.js';
import { SIMULATION_CONSTANTS } from '../src/constants/simulation.js';
import { createMetricsRouter } from './routes/metrics.js';

export function createApp(metrics: MaritimeMetricsRegistry): express.Express {
  const app = express();
  app.disable('x-powered-by');

  // Routes
  app.use(SIMULATION_CONSTANTS.METRICS_PATH, createMetricsRouter(metrics));

  // Everything else
  app.use((req, res) => {
    res.status(404).type('text/plain').send('Not Found');
  });

  return app;
}
