export {
  MetricCatalog,
  type CatalogEntry,
  type CounterEntry,
  type GaugeEntry,
  type DistributionEntry,
  type ResolveOptions,
} from './catalog.js';
