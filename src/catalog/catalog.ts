/**
 * Metric catalog: the per-identity, lazily created exported metric families.
 *
 * An entry's kind and label-name set are fixed by the first sample that
 * creates it. Entries and their cells live for the lifetime of the catalog.
 */

import { ClassificationError, RegistrationError } from '../errors/index.js';
import { CounterVec } from '../metrics/counter.js';
import { GaugeVec } from '../metrics/gauge.js';
import { HistogramVec, normalizeBuckets } from '../metrics/histogram.js';
import { MetricsRegistry } from '../registry/registry.js';
import { DEFAULT_DISTRIBUTION_BUCKETS, MetricKind } from '../types.js';

interface EntryBase {
  readonly identity: string;
  /** Label names in the order label values are addressed */
  readonly labelNames: readonly string[];
}

export interface CounterEntry extends EntryBase {
  readonly kind: 'counter';
  readonly vec: CounterVec;
}

export interface GaugeEntry extends EntryBase {
  readonly kind: 'gauge';
  readonly vec: GaugeVec;
}

export interface DistributionEntry extends EntryBase {
  readonly kind: 'distribution';
  readonly vec: HistogramVec;
}

export type CatalogEntry = CounterEntry | GaugeEntry | DistributionEntry;

export interface ResolveOptions {
  /** Help text for a newly created family */
  help?: string;
  /** Bucket bounds for a newly created distribution */
  buckets?: readonly number[];
}

export class MetricCatalog {
  private readonly entries: Map<string, CatalogEntry> = new Map();
  private readonly registry: MetricsRegistry;
  private readonly defaultBuckets: readonly number[];

  constructor(registry: MetricsRegistry, defaultBuckets: readonly number[] = DEFAULT_DISTRIBUTION_BUCKETS) {
    this.registry = registry;
    this.defaultBuckets = [...defaultBuckets];
  }

  /**
   * Returns the entry for `identity`, creating it on first sight.
   *
   * `labelNames` is compared as a set against an existing entry; the
   * returned entry's `labelNames` gives the order to address cells in.
   *
   * @throws ClassificationError if the identity exists with another kind,
   * label set or bucket layout
   */
  resolve(
    identity: string,
    kind: MetricKind,
    labelNames: readonly string[],
    options: ResolveOptions = {}
  ): CatalogEntry {
    const existing = this.entries.get(identity);
    if (existing) {
      if (existing.kind !== kind) {
        throw new ClassificationError(
          `Metric ${identity} is a ${existing.kind}, sample classified as ${kind}`,
          { identity, field: 'kind' }
        );
      }
      if (!sameLabelSet(existing.labelNames, labelNames)) {
        throw new ClassificationError(
          `Metric ${identity} has labels [${existing.labelNames.join(', ')}], ` +
            `sample has [${labelNames.join(', ')}]`,
          { identity, field: 'tags' }
        );
      }
      if (existing.kind === 'distribution') {
        const wanted = normalizeBuckets(options.buckets ?? this.defaultBuckets);
        if (!sameBounds(existing.vec.buckets, wanted)) {
          throw new ClassificationError(
            `Metric ${identity} has buckets [${formatBounds(existing.vec.buckets)}], ` +
              `sample needs [${formatBounds(wanted)}]`,
            { identity, field: 'kind' }
          );
        }
      }
      return existing;
    }

    const entry = this.create(identity, kind, labelNames, options);
    this.entries.set(identity, entry);
    return entry;
  }

  /**
   * Applies one observation to the cell addressed by `labelValues`.
   *
   * @throws ClassificationError for a negative or non-finite counter
   * increment, or a non-finite distribution value
   */
  observe(entry: CatalogEntry, labelValues: readonly string[], value: number): void {
    switch (entry.kind) {
      case 'counter':
        if (!Number.isFinite(value) || value < 0) {
          throw new ClassificationError(`Counter ${entry.identity} cannot be incremented by ${value}`, {
            identity: entry.identity,
            field: 'value',
          });
        }
        entry.vec.withLabelValues(...labelValues).inc(value);
        return;
      case 'gauge':
        entry.vec.withLabelValues(...labelValues).set(value);
        return;
      case 'distribution':
        if (!Number.isFinite(value)) {
          throw new ClassificationError(`Distribution ${entry.identity} cannot observe ${value}`, {
            identity: entry.identity,
            field: 'value',
          });
        }
        entry.vec.withLabelValues(...labelValues).observe(value);
        return;
    }
  }

  get(identity: string): CatalogEntry | undefined {
    return this.entries.get(identity);
  }

  list(): CatalogEntry[] {
    return Array.from(this.entries.values());
  }

  get size(): number {
    return this.entries.size;
  }

  private create(
    identity: string,
    kind: MetricKind,
    labelNames: readonly string[],
    options: ResolveOptions
  ): CatalogEntry {
    const base = {
      name: identity,
      help: options.help ?? `${kind} ${identity}`,
      labelNames: [...labelNames],
    };

    try {
      switch (kind) {
        case 'counter':
          return { identity, kind, labelNames: base.labelNames, vec: this.registry.counterVec(base) };
        case 'gauge':
          return { identity, kind, labelNames: base.labelNames, vec: this.registry.gaugeVec(base) };
        case 'distribution':
          return {
            identity,
            kind,
            labelNames: base.labelNames,
            vec: this.registry.histogramVec({ ...base, buckets: [...(options.buckets ?? this.defaultBuckets)] }),
          };
      }
    } catch (error) {
      if (error instanceof RegistrationError) {
        throw new ClassificationError(error.message, { identity, field: 'name', cause: error });
      }
      throw error;
    }
  }
}

function sameBounds(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((bound, i) => bound === b[i]);
}

function formatBounds(bounds: readonly number[]): string {
  return bounds.map((bound) => (bound === Infinity ? '+Inf' : String(bound))).join(', ');
}

function sameLabelSet(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  const names = new Set(a);
  return b.every((name) => names.has(name));
}
