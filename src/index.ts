/**
 * Prometheus sample output
 *
 * Buffers load-test samples, applies them to lazily created metric families
 * on a fixed interval, and serves the result on a pull endpoint.
 */

// Re-export types
export * from './types.js';

// Output lifecycle
export { PrometheusOutput, SampleBuffer, PeriodicFlusher } from './output/index.js';
export type {
  OutputParams,
  FlushCallback,
  FlusherOptions,
  FlusherState,
  FlusherStats,
} from './output/index.js';

// Adapter and catalog
export {
  PrometheusAdapter,
  classifySample,
  classifyHint,
  inferKindFromName,
  type AdapterOptions,
  type ApplyResult,
  type Classification,
} from './adapter/index.js';
export {
  MetricCatalog,
  type CatalogEntry,
  type CounterEntry,
  type GaugeEntry,
  type DistributionEntry,
  type ResolveOptions,
} from './catalog/index.js';

// Registry and metric implementations
export { MetricsRegistry, type RegisteredMetric } from './registry/index.js';
export {
  Counter,
  CounterVec,
  Gauge,
  GaugeVec,
  Histogram,
  HistogramVec,
  MetricVec,
  normalizeBuckets,
  createLabelKey,
  validateLabelCount,
  buildLabelsObject,
  type Metric,
} from './metrics/index.js';

// Serialization
export {
  PrometheusTextSerializer,
  OpenMetricsSerializer,
  createSerializer,
  escapeHelpText,
  escapeLabelValue,
  formatLabels,
  formatValue,
} from './serialization/index.js';
export type { OutputFormat, Serializer } from './serialization/index.js';

// HTTP
export {
  MetricsHandler,
  createMetricsServer,
  listen,
  closeServer,
  handleHealth,
  handleVars,
  compressIfNeeded,
  acceptsGzip,
} from './http/index.js';
export type {
  MetricsRequest,
  MetricsResponse,
  HandlerConfig,
  MetricsSource,
  MetricsServerOptions,
  DebugResponse,
} from './http/index.js';

// Configuration
export {
  parseConfigArgument,
  formatAddress,
  DEFAULT_PORT,
  DEFAULT_FLUSH_INTERVAL_MS,
  DEFAULT_OUTPUT_OPTIONS,
  type OutputOptions,
} from './config/index.js';

// Errors
export {
  MetricsError,
  ConfigurationError,
  ClassificationError,
  RegistrationError,
  SerializationError,
  TransportError,
  isRetryableError,
  isMetricsError,
  getErrorCategory,
  formatError,
  toError,
  type ErrorCategory,
} from './errors/index.js';

// Logging
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  createLogger,
  createNoopLogger,
  parseLogLevel,
  type Logger,
  type LogContext,
  type LogConfig,
  type LogEntry,
} from './observability/logging.js';

// Label utilities
export {
  isValidLabelName,
  isValidMetricName,
  sanitizeName,
  buildIdentity,
  sanitizeLabelNames,
} from './labels/index.js';

// Testing utilities
export {
  RecordingLogger,
  parseExposition,
  findSample,
  sampleValue,
  type RecordedLogEntry,
  type Exposition,
  type ExpositionSample,
} from './testing/index.js';
