import { MetricFamily, MetricType } from '../types.js';
import { RegistrationError } from '../errors/index.js';
import { isValidLabelName, isValidMetricName } from '../labels/validation.js';
import { CounterVec } from '../metrics/counter.js';
import { GaugeVec } from '../metrics/gauge.js';
import { HistogramVec } from '../metrics/histogram.js';
import type { CounterOptions, GaugeOptions, HistogramOptions } from '../types.js';
import { createSerializer, type OutputFormat } from '../serialization/index.js';

export type RegisteredMetric = CounterVec | GaugeVec | HistogramVec;

/**
 * Central registry for exported metric families, keyed by full name.
 *
 * The registry is owned by the output and handed to both the write path
 * (catalog) and the read path (scrape handler); it is never a global.
 */
export class MetricsRegistry {
  private readonly metricsByName: Map<string, RegisteredMetric> = new Map();

  /**
   * Create or get a counter vector.
   * @throws RegistrationError if the name is taken by another type or label set
   */
  counterVec(options: CounterOptions): CounterVec {
    return this.getOrCreate(options, MetricType.Counter, CounterVec, () => {
      return new CounterVec(options.name, options.help, options.labelNames ?? []);
    });
  }

  /**
   * Create or get a gauge vector.
   */
  gaugeVec(options: GaugeOptions): GaugeVec {
    return this.getOrCreate(options, MetricType.Gauge, GaugeVec, () => {
      return new GaugeVec(options.name, options.help, options.labelNames ?? []);
    });
  }

  /**
   * Create or get a histogram vector. Buckets of an existing histogram are
   * kept as first registered.
   */
  histogramVec(options: HistogramOptions): HistogramVec {
    return this.getOrCreate(options, MetricType.Histogram, HistogramVec, () => {
      return new HistogramVec(options.name, options.help, options.labelNames ?? [], options.buckets);
    });
  }

  get(name: string): RegisteredMetric | undefined {
    return this.metricsByName.get(name);
  }

  has(name: string): boolean {
    return this.metricsByName.has(name);
  }

  get size(): number {
    return this.metricsByName.size;
  }

  /**
   * Gather all metrics for serialization, sorted by name.
   * Values are copied, so later updates never show through a gathered snapshot.
   */
  gather(): MetricFamily[] {
    const families: MetricFamily[] = [];

    for (const metric of this.metricsByName.values()) {
      families.push({
        name: metric.name,
        help: metric.help,
        type: metric.type,
        metrics: metric.collect(),
      });
    }

    families.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    return families;
  }

  /**
   * Get metrics in the given exposition format.
   */
  metrics(format: OutputFormat = 'prometheus'): string {
    return createSerializer(format).serialize(this.gather());
  }

  private getOrCreate<T extends RegisteredMetric>(
    options: CounterOptions,
    type: MetricType,
    ctor: abstract new (...args: never[]) => T,
    create: () => T
  ): T {
    const existing = this.metricsByName.get(options.name);
    const labelNames = options.labelNames ?? [];

    if (existing) {
      if (!(existing instanceof ctor)) {
        throw new RegistrationError(
          `Metric ${options.name} already registered as ${existing.type}, not ${type}`,
          { metricName: options.name }
        );
      }
      if (!sameLabelNames(existing.labelNames, labelNames)) {
        throw new RegistrationError(
          `Metric ${options.name} already registered with labels [${existing.labelNames.join(', ')}]`,
          { metricName: options.name }
        );
      }
      return existing;
    }

    if (!isValidMetricName(options.name)) {
      throw new RegistrationError(`Invalid metric name "${options.name}"`, { metricName: options.name });
    }
    const invalidLabel = labelNames.find((label) => !isValidLabelName(label));
    if (invalidLabel !== undefined) {
      throw new RegistrationError(`Invalid label name "${invalidLabel}" for metric ${options.name}`, {
        metricName: options.name,
      });
    }

    const metric = create();
    this.metricsByName.set(options.name, metric);
    return metric;
  }
}

function sameLabelNames(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}
