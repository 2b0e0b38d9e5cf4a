import type { CounterIncrement, GaugeSample } from './definitions.js';
import type { MaritimeMetricsRegistry } from './registry.js';
import { MetricPublishError, describeError } from '../errors.js';

export interface MetricValueSet {
  timestamp: Date;
  gauges: GaugeSample[];
  increments: CounterIncrement[];
}

export interface PublishResult {
  gaugesSet: number;
  countersIncremented: number;
  failures: MetricPublishError[];
}

/**
 * Pushes one tick's metric values into the registry.
 *
 * Each sample is written on its own; a sample the registry rejects is logged
 * and skipped and the remaining samples are still written. Publishing is
 * synchronous, so a scrape never sees half of a single labelled value.
 */
export class MetricsPublisher {
  constructor(private readonly metrics: MaritimeMetricsRegistry) {}

  publish(values: MetricValueSet): PublishResult {
    const result: PublishResult = { gaugesSet: 0, countersIncremented: 0, failures: [] };

    for (const family of this.metrics.volatileGauges()) {
      family.reset();
    }

    for (const sample of values.gauges) {
      try {
        if (!Number.isFinite(sample.value)) {
          throw new Error(`value ${sample.value} is not finite`);
        }
        this.metrics.gauge(sample.metric).set(sample.labels, sample.value);
        result.gaugesSet += 1;
      } catch (error) {
        result.failures.push(this.toFailure(sample.metric, error));
      }
    }

    for (const increment of values.increments) {
      try {
        this.metrics.counter(increment.metric).inc(increment.labels, increment.amount);
        result.countersIncremented += 1;
      } catch (error) {
        result.failures.push(this.toFailure(increment.metric, error));
      }
    }

    if (result.failures.length > 0) {
      console.error(
        `[MetricsPublisher] ${result.failures.length} sample(s) rejected for tick ${values.timestamp.toISOString()}`
      );
    }

    return result;
  }

  private toFailure(metric: string, error: unknown): MetricPublishError {
    const failure =
      error instanceof MetricPublishError
        ? error
        : new MetricPublishError(`Failed to publish ${metric}: ${describeError(error)}`, metric, error);
    console.error(`[MetricsPublisher] ${failure.message}`);
    return failure;
  }
}
