import type { Clock } from '../core/types.js';

export const systemClock: Clock = () => performance.now();

/**
 * Measures a single operation against an injectable clock.
 */
export class Timer {
  private readonly startTime: number;
  private endTime?: number;

  constructor(private readonly clock: Clock = systemClock) {
    this.startTime = clock();
  }

  stop(): number {
    this.endTime ??= this.clock();
    return this.elapsed;
  }

  get elapsed(): number {
    const end = this.endTime ?? this.clock();
    return end - this.startTime;
  }

  get formatted(): string {
    return formatDuration(this.elapsed);
  }
}

/**
 * Format a duration in milliseconds to a human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

export type Settled<T> =
  | { ok: true; value: T; durationMs: number }
  | { ok: false; error: unknown; durationMs: number };

/**
 * Run an async function and report its duration whether it resolves or rejects.
 */
export async function measureSettled<T>(fn: () => Promise<T>, clock: Clock = systemClock): Promise<Settled<T>> {
  const timer = new Timer(clock);
  try {
    const value = await fn();
    return { ok: true, value, durationMs: timer.stop() };
  } catch (error) {
    return { ok: false, error, durationMs: timer.stop() };
  }
}
