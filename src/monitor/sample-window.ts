import type { LatencySample } from './types.js';

/**
 * Fixed-capacity ring of latency samples. Once full, each push displaces
 * the oldest sample. Reads return oldest → newest.
 */
export class SampleWindow {
  private buffer: Array<LatencySample | undefined>;
  private head = 0;
  private count = 0;

  constructor(private readonly capacity: number) {
    if (capacity < 1) throw new Error('SampleWindow capacity must be >= 1');
    this.buffer = new Array<LatencySample | undefined>(capacity);
  }

  push(sample: LatencySample): void {
    this.buffer[this.head] = sample;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  /**
   * Samples oldest → newest, skipping any taken before `notBefore`.
   */
  toArray(notBefore?: number): LatencySample[] {
    const result: LatencySample[] = [];
    const start = this.count < this.capacity ? 0 : this.head;
    for (let i = 0; i < this.count; i++) {
      const sample = this.buffer[(start + i) % this.capacity];
      if (sample && (notBefore === undefined || sample.timestamp >= notBefore)) {
        result.push(sample);
      }
    }
    return result;
  }
}
