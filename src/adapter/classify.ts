/**
 * Sample classification: which catalog kind a sample feeds.
 */

import { ClassificationError } from '../errors/index.js';
import { MetricKind, RATE_BUCKETS, Sample, SampleKindHint } from '../types.js';

export interface Classification {
  kind: MetricKind;
  /** Bucket bounds the entry must be created with, when the kind dictates them */
  buckets?: readonly number[];
}

const COUNTER_SUFFIXES = ['_total', '_count'];
const DISTRIBUTION_SUFFIXES = ['_duration', '_seconds', '_time', '_bytes'];

/**
 * Maps an explicit kind hint onto a catalog kind.
 */
export function classifyHint(hint: SampleKindHint): Classification {
  switch (hint) {
    case 'counter':
    case 'gauge':
    case 'distribution':
      return { kind: hint };
    case 'trend':
      return { kind: 'distribution' };
    case 'rate':
      return { kind: 'distribution', buckets: RATE_BUCKETS };
    default:
      throw new ClassificationError(`Unknown metric kind "${String(hint)}"`, { field: 'kind' });
  }
}

/**
 * Infers a kind from the metric name's suffix, or returns undefined.
 */
export function inferKindFromName(name: string): MetricKind | undefined {
  if (COUNTER_SUFFIXES.some((suffix) => name.endsWith(suffix))) {
    return 'counter';
  }
  if (DISTRIBUTION_SUFFIXES.some((suffix) => name.endsWith(suffix))) {
    return 'distribution';
  }
  return undefined;
}

/**
 * Classifies a sample by its kind hint, falling back to naming convention.
 * @throws ClassificationError when neither yields a kind
 */
export function classifySample(sample: Pick<Sample, 'name' | 'kind'>): Classification {
  if (sample.kind !== undefined) {
    return classifyHint(sample.kind);
  }

  const inferred = inferKindFromName(sample.name);
  if (inferred === undefined) {
    throw new ClassificationError(`Cannot infer a metric kind for "${sample.name}"`, { field: 'kind' });
  }
  return { kind: inferred };
}
