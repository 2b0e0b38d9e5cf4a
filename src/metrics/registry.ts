import { Counter, Gauge, Registry } from 'prom-client';
import { METRIC_DEFINITIONS, type CounterName, type GaugeName } from './definitions.js';
import { MetricPublishError } from '../errors.js';

/**
 * prom-client registry holding one collector per entry of the metric table.
 * A fresh registry per simulation keeps test runs isolated from each other.
 */
export class MaritimeMetricsRegistry {
  readonly registry: Registry;
  private readonly gauges = new Map<string, Gauge<string>>();
  private readonly counters = new Map<string, Counter<string>>();
  private readonly volatileFamilies: string[] = [];

  constructor(registry: Registry = new Registry()) {
    this.registry = registry;

    for (const [name, definition] of Object.entries(METRIC_DEFINITIONS)) {
      const config = {
        name,
        help: definition.help,
        labelNames: [...definition.labelNames],
        registers: [this.registry],
      };

      if (definition.kind === 'counter') {
        this.counters.set(name, new Counter(config));
      } else {
        this.gauges.set(name, new Gauge(config));
      }

      if ('volatileLabels' in definition && definition.volatileLabels) {
        this.volatileFamilies.push(name);
      }
    }
  }

  gauge(name: GaugeName): Gauge<string> {
    const collector = this.gauges.get(name);
    if (!collector) {
      throw new MetricPublishError(`Unknown gauge ${name}`, name);
    }
    return collector;
  }

  counter(name: CounterName): Counter<string> {
    const collector = this.counters.get(name);
    if (!collector) {
      throw new MetricPublishError(`Unknown counter ${name}`, name);
    }
    return collector;
  }

  /**
   * Gauge families whose label sets change from tick to tick.
   */
  volatileGauges(): Gauge<string>[] {
    return this.volatileFamilies.flatMap((name) => {
      const collector = this.gauges.get(name);
      return collector ? [collector] : [];
    });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /**
   * Prometheus text exposition of every registered metric.
   */
  async render(): Promise<string> {
    return this.registry.metrics();
  }
}
