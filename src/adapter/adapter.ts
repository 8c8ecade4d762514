/**
 * Adapter from load-engine samples to catalog observations.
 *
 * Owns the naming policy: every logical name is prefixed with the fixed
 * namespace and subsystem and sanitized into an exported identity.
 */

import type { CatalogEntry, MetricCatalog } from '../catalog/catalog.js';
import { ClassificationError, toError } from '../errors/index.js';
import { buildIdentity, sanitizeLabelNames } from '../labels/sanitization.js';
import { RESERVED_HISTOGRAM_LABELS } from '../labels/validation.js';
import type { Logger } from '../observability/logging.js';
import type { Sample } from '../types.js';
import { classifySample, type Classification } from './classify.js';

export interface AdapterOptions {
  catalog: MetricCatalog;
  logger: Logger;
  /** First identity segment (default: none) */
  namespace?: string;
  /** Second identity segment (default: none) */
  subsystem?: string;
}

export interface ApplyResult {
  /** Samples that updated a cell */
  applied: number;
  /** Samples that were logged and skipped */
  dropped: number;
}

const NO_RESERVED_LABELS: ReadonlySet<string> = new Set();

/** Series a histogram family writes besides its own name */
const HISTOGRAM_SERIES_SUFFIXES = ['_bucket', '_sum', '_count'] as const;

export class PrometheusAdapter {
  readonly namespace: string;
  readonly subsystem: string;
  private readonly catalog: MetricCatalog;
  private readonly logger: Logger;
  private readonly identities: Map<string, string> = new Map();
  /** Identity to the first logical name that produced it */
  private readonly origins: Map<string, string> = new Map();

  constructor(options: AdapterOptions) {
    this.catalog = options.catalog;
    this.logger = options.logger;
    this.namespace = options.namespace ?? '';
    this.subsystem = options.subsystem ?? '';
  }

  /**
   * Exported identity of a logical metric name.
   * @throws ClassificationError if the name is empty
   */
  identity(name: string): string {
    const cached = this.identities.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const identity = buildIdentity(name, this.namespace, this.subsystem);
    this.identities.set(name, identity);

    const origin = this.origins.get(identity);
    if (origin === undefined) {
      this.origins.set(identity, name);
    } else {
      this.logger.warn('Metric names collide after sanitization', {
        identity,
        metric: name,
        collidesWith: origin,
      });
    }
    return identity;
  }

  /**
   * Catalog kind a sample feeds.
   * @throws ClassificationError if no kind can be determined
   */
  classify(sample: Pick<Sample, 'name' | 'kind'>): Classification {
    return classifySample(sample);
  }

  /**
   * Applies a batch in order. A sample that cannot be applied is logged and
   * skipped; the rest of the batch still applies.
   */
  apply(samples: readonly Sample[]): ApplyResult {
    const result: ApplyResult = { applied: 0, dropped: 0 };

    for (const sample of samples) {
      try {
        this.applySample(sample);
        result.applied++;
      } catch (error) {
        result.dropped++;
        this.reportDropped(sample, error);
      }
    }

    return result;
  }

  /**
   * Applies one sample.
   * @throws ClassificationError if the sample is malformed or conflicts with its entry
   */
  applySample(sample: Sample): void {
    if (typeof sample.name !== 'string') {
      throw new ClassificationError('Sample has no metric name', { field: 'name' });
    }
    const identity = this.identity(sample.name);

    if (typeof sample.value !== 'number') {
      throw new ClassificationError(`Sample value for ${identity} is not a number`, { identity, field: 'value' });
    }

    try {
      const { kind, buckets } = this.classify(sample);
      const tags = sample.tags ?? {};
      const labels = sanitizeLabelNames(
        Object.keys(tags),
        kind === 'distribution' ? RESERVED_HISTOGRAM_LABELS : NO_RESERVED_LABELS
      );

      const created = this.catalog.get(identity) === undefined;
      const entry = this.catalog.resolve(
        identity,
        kind,
        labels.map(([, labelName]) => labelName),
        { help: `${sample.name} (${kind})`, ...(buckets ? { buckets } : {}) }
      );
      if (created) {
        this.checkSeriesCollision(entry);
      }

      const valuesByLabel = new Map<string, string>(
        labels.map(([tagKey, labelName]): [string, string] => [labelName, tags[tagKey] ?? ''])
      );
      const labelValues = entry.labelNames.map((labelName) => valuesByLabel.get(labelName) ?? '');

      this.catalog.observe(entry, labelValues, sample.value);
    } catch (error) {
      if (error instanceof ClassificationError && error.identity === undefined) {
        throw new ClassificationError(error.message, { identity, field: error.field, cause: error });
      }
      throw error;
    }
  }

  /**
   * Warns when a new entry's series share names with a histogram's
   * `_bucket`, `_sum` or `_count` series.
   */
  private checkSeriesCollision(entry: CatalogEntry): void {
    const collisions: string[] = [];

    if (entry.kind === 'distribution') {
      for (const suffix of HISTOGRAM_SERIES_SUFFIXES) {
        if (this.catalog.get(entry.identity + suffix)) {
          collisions.push(entry.identity + suffix);
        }
      }
    } else {
      for (const suffix of HISTOGRAM_SERIES_SUFFIXES) {
        if (!entry.identity.endsWith(suffix)) {
          continue;
        }
        const base = entry.identity.slice(0, -suffix.length);
        if (this.catalog.get(base)?.kind === 'distribution') {
          collisions.push(base);
        }
      }
    }

    if (collisions.length > 0) {
      this.logger.warn('Metric series names collide', {
        identity: entry.identity,
        collidesWith: collisions.join(', '),
      });
    }
  }

  private reportDropped(sample: Sample, error: unknown): void {
    if (error instanceof ClassificationError) {
      this.logger.warn('Dropping sample', {
        identity: error.identity,
        metric: sample.name,
        field: error.field,
        reason: error.message,
      });
      return;
    }

    this.logger.error('Failed to apply sample', toError(error), { metric: sample.name });
  }
}
