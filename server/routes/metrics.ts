import { Router } from 'express';
import type { MaritimeMetricsRegistry } from '../../src/metrics/registry.js';
import { describeError } from '../../src/errors.js';

export function createMetricsRouter(metrics: MaritimeMetricsRegistry): Router {
  const router = Router();

  // Prometheus text exposition; query parameters are ignored
  router.get('/', async (req, res) => {
    try {
      const body = await metrics.render();
      res.set('Content-Type', metrics.contentType);
      res.send(body);
    } catch (error) {
      console.error(`[MetricsRoute] Failed to render metrics: ${describeError(error)}`);
      res.status(500).type('text/plain').send('Failed to render metrics');
    }
  });

  return router;
}
