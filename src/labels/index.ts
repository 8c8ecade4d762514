/**
 * Label utilities: name validation, sanitization, and identity prefixing.
 *
 * @module labels
 */

export {
  isValidLabelName,
  isValidMetricName,
  RESERVED_HISTOGRAM_LABELS,
} from './validation.js';

export { sanitizeName, buildIdentity, sanitizeLabelNames } from './sanitization.js';
