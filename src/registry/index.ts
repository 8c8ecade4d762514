/**
 * Registry module: the owned store of exported metric families.
 */

export { MetricsRegistry, type RegisteredMetric } from './registry.js';
