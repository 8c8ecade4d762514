import { describe, it, expect } from 'vitest';
import { SampleBuffer } from '../buffer.js';
import type { Sample } from '../../types.js';

function sample(name: string): Sample {
  return { name, value: 1, timestamp: 0, tags: {} };
}

describe('SampleBuffer', () => {
  it('should drain everything in insertion order', () => {
    const buffer = new SampleBuffer();
    buffer.add(sample('a'), sample('b'));
    buffer.addSamples([[sample('c')], [], [sample('d'), sample('e')]]);

    expect(buffer.size).toBe(5);
    expect(buffer.drain().map((s) => s.name)).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('should be empty after a drain', () => {
    const buffer = new SampleBuffer();
    buffer.add(sample('a'));
    buffer.drain();

    expect(buffer.size).toBe(0);
    expect(buffer.drain()).toEqual([]);
  });

  it('should not let later additions reach a drained batch', () => {
    const buffer = new SampleBuffer();
    buffer.add(sample('a'));
    const drained = buffer.drain();
    buffer.add(sample('b'));

    expect(drained.map((s) => s.name)).toEqual(['a']);
    expect(buffer.drain().map((s) => s.name)).toEqual(['b']);
  });
});
