import { formatError } from '../errors/index.js';
import { createSerializer, type OutputFormat, type Serializer } from '../serialization/index.js';
import type { MetricFamily } from '../types.js';
import { acceptsGzip, compressIfNeeded, DEFAULT_COMPRESSION_THRESHOLD } from './compression.js';

/**
 * Metrics request interface.
 */
export interface MetricsRequest {
  accept?: string | undefined;
  acceptEncoding?: string | undefined;
}

/**
 * Metrics response interface.
 */
export interface MetricsResponse {
  status: number;
  headers: Record<string, string>;
  body: string | Buffer;
}

/**
 * Handler configuration.
 */
export interface HandlerConfig {
  /** Minimum body size in bytes before gzip is applied (default 1024) */
  compressionThreshold?: number;
}

/**
 * Read side of the registry as the handler sees it.
 */
export interface MetricsSource {
  gather(): MetricFamily[];
}

/**
 * Serves the current registry state on every scrape.
 *
 * Framework-agnostic: `handle()` returns `{ status, headers, body }` and the
 * HTTP server writes it out.
 */
export class MetricsHandler {
  private readonly source: MetricsSource;
  private readonly serializers: Record<OutputFormat, Serializer>;
  private readonly compressionThreshold: number;

  constructor(source: MetricsSource, config?: HandlerConfig) {
    this.source = source;
    this.serializers = {
      prometheus: createSerializer('prometheus'),
      openmetrics: createSerializer('openmetrics'),
    };
    this.compressionThreshold = config?.compressionThreshold ?? DEFAULT_COMPRESSION_THRESHOLD;
  }

  /**
   * Handle a metrics scrape request.
   */
  async handle(request: MetricsRequest = {}): Promise<MetricsResponse> {
    try {
      const format = determineFormat(request.accept);
      const serializer = this.serializers[format];

      const content = serializer.serialize(this.source.gather());

      const compressed = acceptsGzip(request.acceptEncoding)
        ? compressIfNeeded(content, this.compressionThreshold)
        : { data: content, isCompressed: false };

      const headers: Record<string, string> = {
        'Content-Type': serializer.contentType,
      };
      if (compressed.isCompressed) {
        headers['Content-Encoding'] = 'gzip';
      }

      return { status: 200, headers, body: compressed.data };
    } catch (error) {
      return {
        status: 500,
        headers: { 'Content-Type': 'text/plain; charset=utf-8' },
        body: `Error gathering metrics: ${formatError(error)}`,
      };
    }
  }
}

/**
 * Determine output format from Accept header.
 */
export function determineFormat(accept?: string): OutputFormat {
  if (accept?.includes('application/openmetrics-text')) {
    return 'openmetrics';
  }
  return 'prometheus';
}
