/**
 * Metric implementations - barrel exports.
 */

export {
  type Metric,
  MetricVec,
  createLabelKey,
  validateLabelCount,
  buildLabelsObject,
} from './traits.js';

export { Counter, CounterVec } from './counter.js';
export { Gauge, GaugeVec } from './gauge.js';
export { Histogram, HistogramVec, normalizeBuckets } from './histogram.js';
