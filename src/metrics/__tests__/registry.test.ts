import { describe, it, expect } from 'vitest';
import { MaritimeMetricsRegistry } from '../registry.js';
import { METRIC_DEFINITIONS } from '../definitions.js';

describe('MaritimeMetricsRegistry', () => {
  it('registers one collector per metric definition', () => {
    const metrics = new MaritimeMetricsRegistry();
    const names = metrics.registry.getMetricsAsArray().map((metric) => metric.name);

    expect(names).toHaveLength(Object.keys(METRIC_DEFINITIONS).length);
    expect(names).toContain('port_congestion_index');
    expect(names).toContain('maritime_simulation_timestamp_seconds');
  });

  it('keeps registries isolated from each other', async () => {
    const first = new MaritimeMetricsRegistry();
    const second = new MaritimeMetricsRegistry();

    first.gauge('port_queue_length').set({ port_code: 'AAAAA', port_name: 'Alpha', country: 'Testland' }, 3);

    expect(await first.render()).toContain('port_queue_length{port_code="AAAAA",port_name="Alpha",country="Testland"} 3');
    expect(await second.render()).not.toContain('port_queue_length{');
  });

  it('lists the families with volatile labels', async () => {
    const families = await Promise.all(new MaritimeMetricsRegistry().volatileGauges().map((gauge) => gauge.get()));
    const names = families.map((family) => family.name);
    expect(names.sort()).toEqual([
      'customs_inspection_rate_percent',
      'vessel_port_arrival_time',
      'vessel_port_departure_time',
      'vessel_speed_violation',
      'vessel_status_indicator',
    ]);
  });

  it('renders the Prometheus text format', async () => {
    const metrics = new MaritimeMetricsRegistry();
    metrics.gauge('maritime_simulation_timestamp_seconds').set({}, 1700000000);

    const text = await metrics.render();

    expect(metrics.contentType).toContain('text/plain');
    expect(text).toContain('# HELP port_queue_length Number of vessels waiting for berth');
    expect(text).toContain('# TYPE cargo_volume_by_type_teu_total counter');
    expect(text).toContain('maritime_simulation_timestamp_seconds 1700000000');
  });
});
