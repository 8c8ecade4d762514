/**
 * Common interfaces and the label-vector base shared by all metric types.
 */

import { MetricType, MetricValue, HistogramValue, Labels } from '../types.js';

/**
 * Common interface for all metric vectors.
 */
export interface Metric {
  readonly name: string;
  readonly help: string;
  readonly type: MetricType;
  readonly labelNames: readonly string[];

  /**
   * Collect a copy of the current values for serialization.
   */
  collect(): MetricValue[] | HistogramValue[];
}

/**
 * Storage key for a tuple of label values in fixed label-name order.
 */
export function createLabelKey(labelValues: readonly string[]): string {
  return labelValues.join('\0');
}

/**
 * Throws if the number of values does not match the label names.
 */
export function validateLabelCount(
  metricName: string,
  expectedNames: readonly string[],
  providedValues: readonly string[]
): void {
  if (expectedNames.length !== providedValues.length) {
    throw new Error(
      `Label count mismatch for metric "${metricName}": ` +
        `expected ${expectedNames.length} (${expectedNames.join(', ')}), ` +
        `got ${providedValues.length}`
    );
  }
}

export function buildLabelsObject(labelNames: readonly string[], labelValues: readonly string[]): Labels {
  const labels: Labels = {};
  labelNames.forEach((name, i) => {
    labels[name] = labelValues[i] ?? '';
  });
  return labels;
}

/**
 * Base for label vectors: one cell per distinct label-value tuple.
 * Cells are created on first use and live as long as the vector.
 */
export abstract class MetricVec<TCell> {
  private readonly cells: Map<string, TCell> = new Map();
  readonly name: string;
  readonly help: string;
  readonly labelNames: readonly string[];

  protected constructor(name: string, help: string, labelNames: readonly string[]) {
    this.name = name;
    this.help = help;
    this.labelNames = [...labelNames];
  }

  /**
   * Get the cell for the given label values, creating it if needed.
   * @throws Error if the number of values does not match the label names
   */
  withLabelValues(...labelValues: string[]): TCell {
    validateLabelCount(this.name, this.labelNames, labelValues);

    const key = createLabelKey(labelValues);
    const existing = this.cells.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const cell = this.createCell(buildLabelsObject(this.labelNames, labelValues));
    this.cells.set(key, cell);
    return cell;
  }

  /**
   * Number of distinct label-value tuples seen so far.
   */
  getCardinality(): number {
    return this.cells.size;
  }

  protected values(): IterableIterator<TCell> {
    return this.cells.values();
  }

  protected abstract createCell(labels: Labels): TCell;
}
