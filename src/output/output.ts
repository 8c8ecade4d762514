import type http from 'node:http';
import type { AddressInfo } from 'node:net';
import { PrometheusAdapter } from '../adapter/adapter.js';
import { MetricCatalog } from '../catalog/catalog.js';
import {
  DEFAULT_FLUSH_INTERVAL_MS,
  DEFAULT_OUTPUT_OPTIONS,
  formatAddress,
  parseConfigArgument,
  type OutputOptions,
} from '../config/index.js';
import { ConfigurationError, toError } from '../errors/index.js';
import { MetricsHandler, type HandlerConfig } from '../http/handler.js';
import { closeServer, createMetricsServer, listen } from '../http/server.js';
import { createNoopLogger, type Logger } from '../observability/logging.js';
import { MetricsRegistry } from '../registry/registry.js';
import { DEFAULT_DISTRIBUTION_BUCKETS, type Sample } from '../types.js';
import { SampleBuffer } from './buffer.js';
import { PeriodicFlusher } from './flusher.js';

export interface OutputParams {
  /** Query-string shaped option argument, e.g. `port=9000&namespace=k6` */
  configArgument?: string;
  logger?: Logger;
  /** Registry to export into (default: a fresh one owned by the output) */
  registry?: MetricsRegistry;
  flushIntervalMs?: number;
  /** Default distribution bucket bounds, fixed for the life of the output */
  buckets?: readonly number[];
  handler?: HandlerConfig;
}

/**
 * Load-test output that exposes samples on a Prometheus pull endpoint.
 *
 * Samples are buffered by `addMetricSamples()`, applied to the catalog by
 * the periodic flusher, and read by scrapers through the HTTP listener.
 */
export class PrometheusOutput {
  readonly registry: MetricsRegistry;
  readonly catalog: MetricCatalog;
  private readonly logger: Logger;
  private readonly configArgument: string;
  private readonly flushIntervalMs: number;
  private readonly buffer = new SampleBuffer();
  private readonly handler: MetricsHandler;

  private options: OutputOptions = { ...DEFAULT_OUTPUT_OPTIONS };
  private adapter: PrometheusAdapter | undefined;
  private server: http.Server | undefined;
  private flusher: PeriodicFlusher | undefined;
  private bound: AddressInfo | undefined;
  private starting: Promise<void> | undefined;
  private stopping: Promise<void> | undefined;
  private generation = 0;

  /**
   * @throws ConfigurationError if the flush interval is not positive
   */
  constructor(params: OutputParams = {}) {
    const flushIntervalMs = params.flushIntervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
    if (!Number.isFinite(flushIntervalMs) || flushIntervalMs <= 0) {
      throw new ConfigurationError(`Flush interval must be positive, got ${flushIntervalMs}`, {
        option: 'flushIntervalMs',
      });
    }

    this.flushIntervalMs = flushIntervalMs;
    this.configArgument = params.configArgument ?? '';
    this.logger = params.logger ?? createNoopLogger();
    this.registry = params.registry ?? new MetricsRegistry();
    this.catalog = new MetricCatalog(this.registry, params.buckets ?? DEFAULT_DISTRIBUTION_BUCKETS);
    this.handler = new MetricsHandler(this.registry, params.handler);
  }

  /**
   * `prometheus (<host>:<port>)`; the port is the bound one once started.
   */
  description(): string {
    const port = this.bound?.port ?? this.options.port;
    return `prometheus (${formatAddress({ host: this.options.host, port })})`;
  }

  /**
   * Bound listener address, or undefined when not listening.
   */
  address(): AddressInfo | undefined {
    return this.bound;
  }

  /**
   * Producer entry point. Buffers the batch and returns immediately.
   */
  addMetricSamples(samples: readonly Sample[]): void {
    this.buffer.addSamples([samples]);
  }

  /**
   * Parses the options, binds the listener and starts the flusher.
   * Concurrent calls share one startup; a `stop()` issued meanwhile wins.
   * @throws ConfigurationError for a malformed option argument, before anything is created
   * @throws TransportError if the listener cannot bind
   */
  start(): Promise<void> {
    if (!this.starting) {
      const starting = this.startup(this.generation).catch((error: unknown) => {
        if (this.starting === starting) {
          this.starting = undefined;
        }
        throw error;
      });
      this.starting = starting;
    }
    return this.starting;
  }

  private async startup(generation: number): Promise<void> {
    const options = parseConfigArgument(this.configArgument);
    this.options = options;
    this.adapter = new PrometheusAdapter({
      catalog: this.catalog,
      logger: this.logger,
      namespace: options.namespace,
      subsystem: options.subsystem,
    });

    const server = createMetricsServer({
      handler: this.handler,
      logger: this.logger,
      flusherStats: () => this.flusher?.stats(),
    });
    const bound = await listen(server, options.port, options.host);
    if (generation !== this.generation) {
      await closeServer(server);
      this.logger.debug('Start cancelled by stop', {
        address: formatAddress({ host: options.host, port: bound.port }),
      });
      return;
    }

    this.bound = bound;
    this.server = server;
    server.on('error', (error: Error) => {
      this.logger.error('Metrics listener failed', error, { address: this.describeAddress() });
    });

    const flusher = new PeriodicFlusher(this.flushIntervalMs, () => this.flush(), {
      logger: this.logger,
    });
    flusher.start();
    this.flusher = flusher;

    this.logger.info('Serving metrics', { address: this.describeAddress() });
  }

  /**
   * Drains the buffer into the catalog.
   * @returns the number of samples drained
   */
  flush(): number {
    const adapter = this.adapter;
    if (!adapter) {
      return 0;
    }

    const samples = this.buffer.drain();
    if (samples.length === 0) {
      return 0;
    }

    const { dropped } = adapter.apply(samples);
    if (dropped > 0) {
      this.logger.debug('Flushed samples with drops', { sampleCount: samples.length, dropped });
    }
    return samples.length;
  }

  /**
   * Stops the flusher after a final flush, then closes the listener.
   * Waits for a pending `start()`, which then leaves nothing listening.
   * Safe to call more than once and without `start()`.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown().finally(() => {
        this.stopping = undefined;
      });
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.generation += 1;
    const starting = this.starting;
    this.starting = undefined;
    if (starting) {
      // a failed start is reported to its own caller
      await Promise.allSettled([starting]);
    }

    const flusher = this.flusher;
    this.flusher = undefined;
    if (flusher) {
      await flusher.stop();
    }

    const server = this.server;
    this.server = undefined;
    if (server) {
      const address = this.describeAddress();
      this.bound = undefined;
      try {
        await closeServer(server);
      } catch (error) {
        this.logger.error('Failed to close metrics listener', toError(error), { address });
        throw error;
      }
      this.logger.info('Stopped serving metrics', { address });
    }
  }

  private describeAddress(): string {
    const port = this.bound?.port ?? this.options.port;
    return formatAddress({ host: this.options.host, port });
  }
}
