export { SampleBuffer } from './buffer.js';
export { PeriodicFlusher } from './flusher.js';
export type { FlushCallback, FlusherOptions, FlusherState, FlusherStats } from './flusher.js';
export { PrometheusOutput } from './output.js';
export type { OutputParams } from './output.js';
