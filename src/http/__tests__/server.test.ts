import type http from 'node:http';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { closeServer, createMetricsServer, listen } from '../server.js';
import { MetricsHandler } from '../handler.js';
import { MetricsRegistry } from '../../registry/registry.js';
import { TransportError } from '../../errors/index.js';
import { RecordingLogger } from '../../testing/recording-logger.js';
import type { FlusherStats } from '../../output/flusher.js';

const STATS: FlusherStats = {
  state: 'idle',
  flushes: 4,
  skippedTicks: 1,
  lastFlushDurationMs: 2,
  lastSampleCount: 10,
};

describe('createMetricsServer', () => {
  let server: http.Server;
  let baseUrl: string;

  beforeEach(async () => {
    const registry = new MetricsRegistry();
    registry.gaugeVec({ name: 'vus', help: 'Virtual users' }).withLabelValues().set(3);

    server = createMetricsServer({
      handler: new MetricsHandler(registry),
      logger: new RecordingLogger(),
      flusherStats: () => STATS,
    });
    const { port } = await listen(server, 0, '127.0.0.1');
    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await closeServer(server);
  });

  it('should serve metrics at the root', async () => {
    const res = await fetch(`${baseUrl}/`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/plain; version=0.0.4; charset=utf-8');
    expect(await res.text()).toBe('# HELP vus Virtual users\n# TYPE vus gauge\nvus 3\n');
  });

  it('should serve metrics on any non-debug path', async () => {
    const res = await fetch(`${baseUrl}/metrics?x=1`);
    expect(await res.text()).toBe('# HELP vus Virtual users\n# TYPE vus gauge\nvus 3\n');
  });

  it('should answer HEAD without a body', async () => {
    const res = await fetch(`${baseUrl}/`, { method: 'HEAD' });

    expect(res.status).toBe(200);
    expect(res.headers.get('content-length')).toBe('48');
    expect(await res.text()).toBe('');
  });

  it('should reject other methods', async () => {
    const res = await fetch(`${baseUrl}/`, { method: 'POST', body: 'x' });

    expect(res.status).toBe(405);
    expect(res.headers.get('allow')).toBe('GET, HEAD');
  });

  it('should answer the health check', async () => {
    const res = await fetch(`${baseUrl}/debug/health`);

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('OK');
  });

  it('should expose runtime vars with the flusher stats', async () => {
    const res = await fetch(`${baseUrl}/debug/vars`);
    const vars: unknown = await res.json();

    expect(res.headers.get('content-type')).toBe('application/json; charset=utf-8');
    expect(vars).toMatchObject({ flusher: STATS });
    expect(vars).toHaveProperty('uptimeSeconds');
    expect(vars).toHaveProperty('memoryUsage.heapUsed');
  });

  it('should answer 404 for unknown debug paths', async () => {
    const res = await fetch(`${baseUrl}/debug/pprof/`);
    expect(res.status).toBe(404);
  });
});

describe('listen', () => {
  it('should fail with a TransportError when the port is taken', async () => {
    const handler = new MetricsHandler(new MetricsRegistry());
    const logger = new RecordingLogger();
    const first = createMetricsServer({ handler, logger });
    const second = createMetricsServer({ handler, logger });

    const { port } = await listen(first, 0, '127.0.0.1');
    try {
      const error: unknown = await listen(second, port, '127.0.0.1').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ address: `127.0.0.1:${port}`, category: 'transport' });
    } finally {
      await closeServer(first);
    }
  });
});
