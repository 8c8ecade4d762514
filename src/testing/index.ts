/**
 * Test helpers: an in-memory logger and an exposition reader.
 */

export { RecordingLogger, type RecordedLogEntry } from './recording-logger.js';
export {
  parseExposition,
  findSample,
  sampleValue,
  type Exposition,
  type ExpositionSample,
} from './exposition.js';
