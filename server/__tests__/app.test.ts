import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import type { Server } from 'node:http';
import { createApp } from '../app.js';
import { MaritimeMetricsRegistry } from '../../src/metrics/registry.js';

describe('metrics server', () => {
  const metrics = new MaritimeMetricsRegistry();
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    metrics.gauge('port_queue_length').set({ port_code: 'AAAAA', port_name: 'Alpha', country: 'Testland' }, 4);

    server = await new Promise<Server>((resolve) => {
      const listener = createApp(metrics).listen(0, '127.0.0.1', () => resolve(listener));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('serves the registry in the Prometheus text format', async () => {
    const response = await fetch(`${baseUrl}/metrics`);
    const body = await response.text();

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('text/plain');
    expect(body).toContain('port_queue_length{port_code="AAAAA",port_name="Alpha",country="Testland"} 4');
  });

  it('ignores query parameters', async () => {
    const response = await fetch(`${baseUrl}/metrics?name[]=port_queue_length`);
    expect(response.status).toBe(200);
  });

  it('returns 404 for other paths and methods', async () => {
    expect((await fetch(`${baseUrl}/`)).status).toBe(404);
    expect((await fetch(`${baseUrl}/health`)).status).toBe(404);
    expect((await fetch(`${baseUrl}/metrics`, { method: 'POST' })).status).toBe(404);
  });

  it('returns 500 when the registry cannot be rendered', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(metrics, 'render').mockRejectedValueOnce(new Error('collector failed'));

    const response = await fetch(`${baseUrl}/metrics`);

    expect(response.status).toBe(500);
    expect(error).toHaveBeenCalledWith('[MetricsRoute] Failed to render metrics: collector failed');
  });
});
