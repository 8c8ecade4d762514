/**
 * Serialization module for Prometheus and OpenMetrics formats.
 */

import { SerializationError } from '../errors/index.js';
import type { MetricFamily } from '../types.js';
import { OpenMetricsSerializer } from './openmetrics.js';
import { PrometheusTextSerializer } from './prometheus-text.js';

export { PrometheusTextSerializer, OpenMetricsSerializer };
export {
  escapeHelpText,
  escapeLabelValue,
  formatLabels,
  formatLabelsWithLe,
  formatValue,
} from './prometheus-text.js';

export type OutputFormat = 'prometheus' | 'openmetrics';

export interface Serializer {
  readonly contentType: string;
  serialize(families: MetricFamily[]): string;
}

/**
 * Factory function to create a serializer for the specified format.
 */
export function createSerializer(format: OutputFormat): Serializer {
  switch (format) {
    case 'prometheus':
      return new PrometheusTextSerializer();
    case 'openmetrics':
      return new OpenMetricsSerializer();
    default:
      throw new SerializationError(`Unknown output format: ${String(format)}`);
  }
}
