/**
 * Name sanitization and identity prefixing.
 *
 * Exported identities and label names are restricted to [a-zA-Z0-9_] with a
 * non-digit first character, which is valid for both metric and label names.
 */

import { ClassificationError } from '../errors/index.js';
import { isValidLabelName } from './validation.js';

/**
 * Replaces every character outside [a-zA-Z0-9_] with an underscore and
 * prefixes a leading digit with an underscore.
 *
 * @example
 * ```typescript
 * sanitizeName('http-req.duration') // 'http_req_duration'
 * sanitizeName('2xx_responses')     // '_2xx_responses'
 * ```
 */
export function sanitizeName(name: string): string {
  const sanitized = name.replace(/[^a-zA-Z0-9_]/g, '_');
  return /^\d/.test(sanitized) ? `_${sanitized}` : sanitized;
}

/**
 * Builds the exported identity `{namespace}_{subsystem}_{name}`.
 * Empty segments are elided; the joined result is sanitized.
 *
 * @throws ClassificationError if `name` is empty
 *
 * @example
 * ```typescript
 * buildIdentity('http_req_duration', 'k6', 'run') // 'k6_run_http_req_duration'
 * buildIdentity('vus', '', '')                    // 'vus'
 * buildIdentity('vus', '', 'run')                 // 'run_vus'
 * ```
 */
export function buildIdentity(name: string, namespace = '', subsystem = ''): string {
  if (name.length === 0) {
    throw new ClassificationError('Metric name cannot be empty', { field: 'name' });
  }

  const parts = [namespace, subsystem, name].filter((part) => part.length > 0);
  return sanitizeName(parts.join('_'));
}

/**
 * Maps raw tag keys to exported label names.
 *
 * Returns pairs of `[tagKey, labelName]` in the order the keys were given.
 *
 * @throws ClassificationError when a key is empty, maps to a reserved name,
 * or two keys collapse onto the same label name
 */
export function sanitizeLabelNames(
  tagKeys: readonly string[],
  reserved: ReadonlySet<string> = new Set()
): Array<[string, string]> {
  const seen = new Map<string, string>();
  const pairs: Array<[string, string]> = [];

  for (const key of tagKeys) {
    if (key.length === 0) {
      throw new ClassificationError('Tag key cannot be empty', { field: 'tags' });
    }

    const labelName = sanitizeName(key);
    if (!isValidLabelName(labelName) || reserved.has(labelName)) {
      throw new ClassificationError(`Tag "${key}" maps to reserved label name "${labelName}"`, {
        field: `tags.${key}`,
      });
    }

    const previous = seen.get(labelName);
    if (previous !== undefined) {
      throw new ClassificationError(
        `Tags "${previous}" and "${key}" both map to label name "${labelName}"`,
        { field: `tags.${key}` }
      );
    }

    seen.set(labelName, key);
    pairs.push([key, labelName]);
  }

  return pairs;
}
