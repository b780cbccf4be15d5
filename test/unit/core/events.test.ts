import { describe, it, expect, vi } from 'vitest';

const { warn } = vi.hoisted(() => ({ warn: vi.fn() }));

vi.mock('../../../src/core/logger.js', () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn,
    error: vi.fn(),
  }),
}));

import { EventBus } from '../../../src/core/events.js';

describe('EventBus', () => {
  it('should deliver payloads to subscribers until they unsubscribe', () => {
    const bus = new EventBus();
    const listener = vi.fn();
    bus.on('monitor:recovered', listener);

    bus.emit('monitor:recovered', { operation: 'search', recentMean: 12 });
    bus.off('monitor:recovered', listener);
    bus.emit('monitor:recovered', { operation: 'search', recentMean: 15 });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ operation: 'search', recentMean: 12 });
  });

  it('should deliver once-listeners a single time', () => {
    const bus = new EventBus();
    const listener = vi.fn();
    bus.once('cache:evicted', listener);

    bus.emit('cache:evicted', { fingerprint: 'f1', capability: 'search' });
    bus.emit('cache:evicted', { fingerprint: 'f2', capability: 'search' });

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('should log a throwing listener instead of raising it', () => {
    const bus = new EventBus();
    bus.on('monitor:regression', () => {
      throw new Error('listener boom');
    });

    expect(() => bus.emit('monitor:regression', { operation: 'op', baselineMean: 1, recentMean: 2 })).not.toThrow();
    expect(warn).toHaveBeenCalledWith(
      { event: 'monitor:regression', error: 'listener boom' },
      'Event listener threw',
    );
  });
});
