/**
 * Counter - a monotonically increasing metric.
 *
 * Node runs all of this on one thread: an increment completes before any
 * scrape can read the cell, so a served value is never half-written.
 */

import { Labels, MetricType, MetricValue } from '../types.js';
import { Metric, MetricVec } from './traits.js';

/**
 * A single counter cell.
 */
export class Counter {
  private value = 0;
  readonly labels: Labels;

  constructor(labels: Labels = {}) {
    this.labels = labels;
  }

  /**
   * Increment counter by `value` (default 1).
   * @throws Error if value is negative or not finite
   */
  inc(value = 1): void {
    if (!Number.isFinite(value) || value < 0) {
      throw new Error('Counter cannot be decreased');
    }
    this.value += value;
  }

  get(): number {
    return this.value;
  }

  collect(): MetricValue {
    return { labels: { ...this.labels }, value: this.value };
  }
}

/**
 * CounterVec - counter cells addressed by label values.
 */
export class CounterVec extends MetricVec<Counter> implements Metric {
  readonly type = MetricType.Counter;

  constructor(name: string, help: string, labelNames: readonly string[] = []) {
    super(name, help, labelNames);
  }

  collect(): MetricValue[] {
    return Array.from(this.values(), (counter) => counter.collect());
  }

  protected createCell(labels: Labels): Counter {
    return new Counter(labels);
  }
}
