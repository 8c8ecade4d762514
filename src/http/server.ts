import http from 'node:http';
import type { AddressInfo } from 'node:net';
import { TransportError, toError } from '../errors/index.js';
import type { Logger } from '../observability/logging.js';
import type { FlusherStats } from '../output/flusher.js';
import type { MetricsHandler } from './handler.js';
import { handleHealth, handleNotFound, handleVars, type DebugResponse } from './health.js';

export interface MetricsServerOptions {
  handler: MetricsHandler;
  logger: Logger;
  /** Supplies the flusher's stats to `/debug/vars` */
  flusherStats?: () => FlusherStats | undefined;
}

const DEBUG_PREFIX = '/debug/';

/**
 * Creates the scrape server. Nothing is bound until `listen()`.
 *
 * Routes:
 * - `/debug/health`, `/debug/vars`: runtime introspection
 * - any other path: the metrics exposition (GET and HEAD only)
 */
export function createMetricsServer(options: MetricsServerOptions): http.Server {
  const { logger } = options;

  return http.createServer((req, res) => {
    handleRequest(req, res, options).catch((error: unknown) => {
      logger.error('Scrape request failed', toError(error), { url: req.url });
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'text/plain; charset=utf-8' });
      }
      res.end();
    });
  });
}

async function handleRequest(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  options: MetricsServerOptions
): Promise<void> {
  const method = req.method ?? 'GET';
  const { pathname } = new URL(req.url ?? '/', 'http://localhost');
  const headOnly = method === 'HEAD';

  if (method !== 'GET' && method !== 'HEAD') {
    send(res, {
      status: 405,
      headers: { 'Content-Type': 'text/plain; charset=utf-8', Allow: 'GET, HEAD' },
      body: 'Method Not Allowed',
    });
    return;
  }

  if (pathname.startsWith(DEBUG_PREFIX)) {
    send(res, routeDebug(pathname, options), headOnly);
    return;
  }

  const response = await options.handler.handle({
    accept: req.headers.accept,
    acceptEncoding: req.headers['accept-encoding'],
  });
  send(res, response, headOnly);
}

function routeDebug(pathname: string, options: MetricsServerOptions): DebugResponse {
  switch (pathname) {
    case '/debug/health':
      return handleHealth();
    case '/debug/vars':
      return handleVars(options.flusherStats);
    default:
      return handleNotFound();
  }
}

function send(
  res: http.ServerResponse,
  response: { status: number; headers: Record<string, string>; body: string | Buffer },
  headOnly = false
): void {
  res.writeHead(response.status, {
    ...response.headers,
    'Content-Length': String(Buffer.byteLength(response.body)),
  });
  res.end(headOnly ? undefined : response.body);
}

/**
 * Binds the server. An empty host listens on every interface.
 * @throws TransportError if the address cannot be bound
 */
export function listen(server: http.Server, port: number, host: string): Promise<AddressInfo> {
  const address = `${host}:${port}`;

  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      server.off('listening', onListening);
      reject(new TransportError(`Failed to listen on ${address}: ${error.message}`, {
        address,
        cause: error,
      }));
    };
    const onListening = (): void => {
      server.off('error', onError);
      const bound = server.address();
      if (bound === null || typeof bound === 'string') {
        reject(new TransportError(`Listener on ${address} has no network address`, { address }));
        return;
      }
      resolve(bound);
    };

    server.once('error', onError);
    server.once('listening', onListening);
    if (host === '') {
      server.listen(port);
    } else {
      server.listen(port, host);
    }
  });
}

/**
 * Stops accepting connections and resolves once open ones have finished.
 */
export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(new TransportError(`Failed to close listener: ${error.message}`, { cause: error }));
        return;
      }
      resolve();
    });
    server.closeIdleConnections();
  });
}
