/**
 * Histogram - samples observations and counts them in configurable buckets.
 *
 * Buckets are cumulative: each bucket counts all observations less than or
 * equal to its upper bound. A +Inf bucket is always present.
 */

import { Labels, MetricType, HistogramValue, DEFAULT_DISTRIBUTION_BUCKETS } from '../types.js';
import { Metric, MetricVec } from './traits.js';

/**
 * Sorts, de-duplicates and terminates a bucket list with +Inf.
 * @throws Error if a bound is NaN
 */
export function normalizeBuckets(buckets: readonly number[]): number[] {
  if (buckets.some((bound) => Number.isNaN(bound))) {
    throw new Error('Histogram bucket bounds must be numbers');
  }

  const sorted = Array.from(new Set(buckets)).sort((a, b) => a - b);
  if (sorted[sorted.length - 1] !== Infinity) {
    sorted.push(Infinity);
  }
  return sorted;
}

export class Histogram {
  private readonly bucketCounts: number[];
  private sum = 0;
  private count = 0;
  /** Sorted upper bounds, ending with +Inf */
  readonly buckets: readonly number[];
  readonly labels: Labels;

  constructor(buckets: readonly number[], labels: Labels = {}) {
    this.buckets = normalizeBuckets(buckets);
    this.bucketCounts = new Array<number>(this.buckets.length).fill(0);
    this.labels = labels;
  }

  /**
   * Record a measurement: updates buckets, sum, and count.
   */
  observe(value: number): void {
    this.buckets.forEach((bound, i) => {
      if (value <= bound) {
        this.bucketCounts[i] = (this.bucketCounts[i] ?? 0) + 1;
      }
    });

    this.sum += value;
    this.count++;
  }

  getSum(): number {
    return this.sum;
  }

  getCount(): number {
    return this.count;
  }

  getBucketCounts(): number[] {
    return [...this.bucketCounts];
  }

  collect(): HistogramValue {
    const buckets = new Map<number, number>();
    this.buckets.forEach((bound, i) => {
      buckets.set(bound, this.bucketCounts[i] ?? 0);
    });

    return {
      labels: { ...this.labels },
      value: 0,
      buckets,
      sum: this.sum,
      count: this.count,
    };
  }
}

export class HistogramVec extends MetricVec<Histogram> implements Metric {
  readonly type = MetricType.Histogram;
  readonly buckets: readonly number[];

  constructor(
    name: string,
    help: string,
    labelNames: readonly string[] = [],
    buckets: readonly number[] = DEFAULT_DISTRIBUTION_BUCKETS
  ) {
    super(name, help, labelNames);
    this.buckets = normalizeBuckets(buckets);
  }

  collect(): HistogramValue[] {
    return Array.from(this.values(), (histogram) => histogram.collect());
  }

  protected createCell(labels: Labels): Histogram {
    return new Histogram(this.buckets, labels);
  }
}
