import type { Sample } from '../types.js';

/**
 * Accumulates samples between flushes.
 *
 * Producers append without waiting on the catalog or registry; the flusher
 * takes everything at once with `drain()`, which swaps in an empty buffer.
 */
export class SampleBuffer {
  private samples: Sample[] = [];

  /**
   * Appends samples, preserving their order.
   */
  add(...samples: Sample[]): void {
    this.append(samples);
  }

  /**
   * Appends several batches in order.
   */
  addSamples(batches: Iterable<readonly Sample[]>): void {
    for (const batch of batches) {
      this.append(batch);
    }
  }

  /**
   * Returns everything buffered since the previous drain, in insertion order.
   */
  drain(): Sample[] {
    const drained = this.samples;
    this.samples = [];
    return drained;
  }

  get size(): number {
    return this.samples.length;
  }

  private append(samples: readonly Sample[]): void {
    for (const sample of samples) {
      this.samples.push(sample);
    }
  }
}
