/**
 * Core type definitions for the Prometheus sample output.
 *
 * Defines the inbound sample shape produced by the load engine, the
 * exported metric value structures, and the default bucket layouts.
 */

/**
 * Label types - key-value pairs for metric dimensions
 */
export type Labels = Record<string, string>;

/**
 * Prometheus metric types
 */
export enum MetricType {
  Counter = 'counter',
  Gauge = 'gauge',
  Histogram = 'histogram',
}

/**
 * Kind of an exported catalog entry.
 */
export type MetricKind = 'counter' | 'gauge' | 'distribution';

/**
 * Kind hint a producer may attach to a sample.
 *
 * `trend` is the load engine's duration distribution and maps to
 * `distribution`; `rate` is its boolean-ratio metric and maps to a
 * distribution with a single `le="0"` bucket.
 */
export type SampleKindHint = MetricKind | 'trend' | 'rate';

/**
 * One observed measurement emitted by the load engine.
 */
export interface Sample {
  /** Logical metric name, before namespace/subsystem prefixing */
  name: string;
  /** Observed value */
  value: number;
  /** When the measurement was taken */
  timestamp: Date | number;
  /** Label key-value pairs; keys are unique, order is irrelevant */
  tags: Labels;
  /** Optional kind hint; inferred from the name when absent */
  kind?: SampleKindHint;
}

/**
 * Metric value types for internal representation
 */
export interface MetricValue {
  /** Label key-value pairs identifying this metric instance */
  labels: Labels;
  /** Current value of the metric */
  value: number;
  /** Optional timestamp in milliseconds */
  timestamp?: number;
}

/**
 * Histogram-specific value structure with bucket data
 */
export interface HistogramValue extends MetricValue {
  /** Map of upper bound to cumulative count of observations */
  buckets: Map<number, number>;
  /** Sum of all observed values */
  sum: number;
  /** Total count of observations */
  count: number;
}

/**
 * Metric family - collection of metrics with the same name
 *
 * A metric family groups all time series that share the same metric name
 * but differ by their label values.
 */
export interface MetricFamily {
  /** Metric name (must match [a-zA-Z_:][a-zA-Z0-9_:]*) */
  name: string;
  /** Human-readable help text describing the metric */
  help: string;
  /** Type of metric in this family */
  type: MetricType;
  /** Array of metric values with different label combinations */
  metrics: (MetricValue | HistogramValue)[];
}

/**
 * Options shared by every metric vector.
 */
export interface MetricOptions {
  /** Full metric name (must match [a-zA-Z_:][a-zA-Z0-9_:]*) */
  name: string;
  /** Help text describing what this metric measures */
  help: string;
  /** Label names, in the order label values are supplied */
  labelNames?: string[];
}

export type CounterOptions = MetricOptions;

export type GaugeOptions = MetricOptions;

export interface HistogramOptions extends MetricOptions {
  /** Bucket upper bounds (default: DEFAULT_DISTRIBUTION_BUCKETS) */
  buckets?: number[];
}

/**
 * Default buckets for distribution samples.
 *
 * The load engine reports durations in milliseconds.
 * Covers: 5ms, 10ms, 25ms, 50ms, 100ms, 250ms, 500ms, 1s, 2.5s, 5s, 10s
 */
export const DEFAULT_DISTRIBUTION_BUCKETS = [
  5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000,
];

/**
 * Buckets for `rate` samples: le="0" counts the false observations.
 */
export const RATE_BUCKETS = [0];

/**
 * Type guard for histogram values.
 */
export function isHistogramValue(value: MetricValue | HistogramValue): value is HistogramValue {
  return 'buckets' in value;
}
