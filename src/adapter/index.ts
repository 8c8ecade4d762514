export { PrometheusAdapter, type AdapterOptions, type ApplyResult } from './adapter.js';
export { classifySample, classifyHint, inferKindFromName, type Classification } from './classify.js';
