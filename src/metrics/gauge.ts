/**
 * Gauge - a value that can go up and down; holds the last value set.
 */

import { Labels, MetricType, MetricValue } from '../types.js';
import { Metric, MetricVec } from './traits.js';

export class Gauge {
  private value = 0;
  readonly labels: Labels;

  constructor(labels: Labels = {}) {
    this.labels = labels;
  }

  set(value: number): void {
    this.value = value;
  }

  get(): number {
    return this.value;
  }

  collect(): MetricValue {
    return { labels: { ...this.labels }, value: this.value };
  }
}

export class GaugeVec extends MetricVec<Gauge> implements Metric {
  readonly type = MetricType.Gauge;

  constructor(name: string, help: string, labelNames: readonly string[] = []) {
    super(name, help, labelNames);
  }

  collect(): MetricValue[] {
    return Array.from(this.values(), (gauge) => gauge.collect());
  }

  protected createCell(labels: Labels): Gauge {
    return new Gauge(labels);
  }
}
