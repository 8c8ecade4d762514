export { MetricsHandler, determineFormat } from './handler.js';
export type { MetricsRequest, MetricsResponse, HandlerConfig, MetricsSource } from './handler.js';
export { compressIfNeeded, acceptsGzip, DEFAULT_COMPRESSION_THRESHOLD } from './compression.js';
export { handleHealth, handleVars, handleNotFound } from './health.js';
export type { DebugResponse, ProcessVars } from './health.js';
export { createMetricsServer, listen, closeServer } from './server.js';
export type { MetricsServerOptions } from './server.js';
