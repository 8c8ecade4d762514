import type { FlusherStats } from '../output/flusher.js';

/**
 * Response shape shared by the debug endpoints.
 */
export interface DebugResponse {
  status: number;
  body: string;
  headers: Record<string, string>;
}

/**
 * Liveness check - always returns OK.
 */
export function handleHealth(): DebugResponse {
  return {
    status: 200,
    body: 'OK',
    headers: { 'Content-Type': 'text/plain; charset=utf-8' },
  };
}

export interface ProcessVars {
  uptimeSeconds: number;
  memoryUsage: NodeJS.MemoryUsage;
  flusher: FlusherStats | null;
}

/**
 * Runtime introspection for `/debug/vars`.
 */
export function handleVars(flusherStats?: () => FlusherStats | undefined): DebugResponse {
  const vars: ProcessVars = {
    uptimeSeconds: process.uptime(),
    memoryUsage: process.memoryUsage(),
    flusher: flusherStats?.() ?? null,
  };

  return {
    status: 200,
    body: JSON.stringify(vars),
    headers: { 'Content-Type': 'application/json; charset=utf-8' },
  };
}

export function handleNotFound(): DebugResponse {
  return {
    status: 404,
    body: 'Not Found',
    headers: { 'Content-Type': 'text/plain; charset=utf-8' },
  };
}
