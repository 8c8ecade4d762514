/**
 * Label and metric name validation utilities.
 * Implements validation rules per the Prometheus data model.
 */

/**
 * Validates a Prometheus label name.
 * Label names must match [a-zA-Z_][a-zA-Z0-9_]*
 * Labels starting with __ are reserved for internal use.
 *
 * @example
 * ```typescript
 * isValidLabelName('status')     // true
 * isValidLabelName('__internal') // false (reserved)
 * isValidLabelName('123_abc')    // false (starts with digit)
 * ```
 */
export function isValidLabelName(name: string): boolean {
  if (name.startsWith('__')) {
    return false;
  }
  return /^[a-zA-Z_][a-zA-Z0-9_]*$/.test(name);
}

/**
 * Validates a Prometheus metric name.
 * Metric names must match [a-zA-Z_:][a-zA-Z0-9_:]*
 *
 * @example
 * ```typescript
 * isValidMetricName('http_requests_total') // true
 * isValidMetricName('node_cpu:seconds')    // true (colon allowed)
 * isValidMetricName('requests-total')      // false (hyphen not allowed)
 * ```
 */
export function isValidMetricName(name: string): boolean {
  return /^[a-zA-Z_:][a-zA-Z0-9_:]*$/.test(name);
}

/**
 * Label names a distribution may not use because the exposition format
 * reserves them for bucket series.
 */
export const RESERVED_HISTOGRAM_LABELS: ReadonlySet<string> = new Set(['le']);
