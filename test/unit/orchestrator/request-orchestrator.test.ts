import { describe, it, expect, vi, beforeEach } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';

vi.mock('../../../src/core/logger.js', () => ({
  getLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { RequestOrchestrator } from '../../../src/orchestrator/request-orchestrator.js';
import { ServerRegistry } from '../../../src/registry/server-registry.js';
import { ContextAwareCache } from '../../../src/cache/context-cache.js';
import { CapabilityAwareLoadBalancer } from '../../../src/balancer/load-balancer.js';
import { PerformanceMonitor } from '../../../src/monitor/performance-monitor.js';
import { LocalCapabilityServer, type CapabilityHandler } from '../../../src/servers/local-server.js';
import { EventBus } from '../../../src/core/events.js';
import {
  CapabilityInvocationError,
  DependencyFailedError,
  InvalidDependencyGraphError,
  NoServerAvailableError,
  RunCancelledError,
} from '../../../src/core/errors.js';
import type { OrchestratorConfig } from '../../../src/core/types.js';
import type { TaskSpec } from '../../../src/orchestrator/types.js';

const WORKFLOW: TaskSpec[] = [
  { name: 'fetch_docs', capability: 'fetch', args: { source: 'docs' } },
  { name: 'fetch_schema', capability: 'fetch', args: { source: 'schema' } },
  { name: 'analyze', capability: 'analyze', args: { depth: 1 }, dependsOn: ['fetch_docs'] },
  { name: 'summarize', capability: 'summarize', args: { words: 50 }, dependsOn: ['fetch_schema'] },
];

function setup(handlers: Record<string, CapabilityHandler>, config: Partial<OrchestratorConfig> = {}) {
  const registry = new ServerRegistry([new LocalCapabilityServer({ name: 'local', handlers })]);
  const cache = new ContextAwareCache();
  const balancer = new CapabilityAwareLoadBalancer(registry);
  const monitor = new PerformanceMonitor({ windowSize: 10 });
  const events = new EventBus();
  const orchestrator = new RequestOrchestrator({ registry, cache, balancer, monitor, events, config });
  return { registry, cache, balancer, monitor, events, orchestrator };
}

describe('RequestOrchestrator', () => {
  let calls: string[];
  let handlers: Record<string, CapabilityHandler>;

  beforeEach(() => {
    calls = [];
    handlers = {
      fetch: args => {
        calls.push(`fetch:${String(args.source)}`);
        return `${String(args.source)}-content`;
      },
      analyze: () => {
        calls.push('analyze');
        return 'analysis';
      },
      summarize: () => {
        calls.push('summarize');
        return 'summary';
      },
    };
  });

  it('runs two dependency levels as two batches', async () => {
    const { orchestrator } = setup(handlers);
    const result = await orchestrator.run(WORKFLOW);

    expect(result.batches).toEqual([['fetch_docs', 'fetch_schema'], ['analyze', 'summarize']]);
    expect(Object.keys(result.outcomes)).toEqual(['fetch_docs', 'fetch_schema', 'analyze', 'summarize']);
    expect(result.outcomes.analyze).toMatchObject({ status: 'succeeded', value: 'analysis', cached: false, server: 'local' });
    expect(result.stats).toEqual({
      tasks: 4,
      succeeded: 4,
      cacheHits: 0,
      dispatched: 4,
      failed: 0,
      skipped: 0,
      cancelled: 0,
    });
    expect(result.runId).toMatch(/^run_/);
  });

  it('contains a failure to the failing branch', async () => {
    handlers.fetch = args => {
      if (args.source === 'docs') throw new Error('docs unavailable');
      return 'schema-content';
    };
    const { orchestrator } = setup(handlers);
    const result = await orchestrator.run(WORKFLOW);

    const fetchDocs = result.outcomes.fetch_docs;
    expect(fetchDocs.status).toBe('failed');
    expect(fetchDocs.status === 'failed' && fetchDocs.error).toBeInstanceOf(CapabilityInvocationError);
    if (fetchDocs.status === 'failed') {
      expect(fetchDocs.error.message).toBe(
        'Task "fetch_docs" failed invoking "fetch" on local: docs unavailable',
      );
    }

    const analyze = result.outcomes.analyze;
    expect(analyze.status).toBe('skipped');
    if (analyze.status === 'skipped') {
      expect(analyze.error).toBeInstanceOf(DependencyFailedError);
      expect(analyze.error.dependency).toBe('fetch_docs');
    }

    expect(result.outcomes.fetch_schema).toMatchObject({ status: 'succeeded', value: 'schema-content' });
    expect(result.outcomes.summarize).toMatchObject({ status: 'succeeded', value: 'summary' });
    expect(result.batches).toEqual([['fetch_docs', 'fetch_schema'], ['summarize']]);
    expect(calls).not.toContain('analyze');
  });

  it('skips transitive dependents of a failed task', async () => {
    const { orchestrator } = setup({
      fail: () => { throw new Error('boom'); },
      ok: () => 'ok',
    });
    const result = await orchestrator.run([
      { name: 'a', capability: 'fail' },
      { name: 'b', capability: 'ok', dependsOn: ['a'] },
      { name: 'c', capability: 'ok', args: { n: 1 }, dependsOn: ['b'] },
      { name: 'side', capability: 'ok', args: { n: 2 } },
    ]);

    expect(result.outcomes.b.status).toBe('skipped');
    expect(result.outcomes.c.status).toBe('skipped');
    expect(result.outcomes.side.status).toBe('succeeded');
    expect(result.stats).toMatchObject({ failed: 1, skipped: 2, succeeded: 1 });
  });

  it('wraps non-Error throwables', async () => {
    const { orchestrator } = setup({
      odd: () => { throw 'plain string'; },
    });
    const result = await orchestrator.run([{ name: 'x', capability: 'odd' }]);
    const outcome = result.outcomes.x;
    expect(outcome.status === 'failed' && outcome.error.cause?.message).toBe('plain string');
  });

  it('rejects a cyclic graph before any call', async () => {
    const { orchestrator } = setup(handlers);
    await expect(orchestrator.run([
      { name: 'a', capability: 'fetch', dependsOn: ['b'] },
      { name: 'b', capability: 'fetch', dependsOn: ['a'] },
      { name: 'c', capability: 'analyze' },
    ])).rejects.toBeInstanceOf(InvalidDependencyGraphError);
    expect(calls).toEqual([]);
  });

  it('rejects a run needing an unserved capability before any call', async () => {
    const { orchestrator } = setup(handlers);
    await expect(orchestrator.run([
      { name: 'a', capability: 'fetch' },
      { name: 'b', capability: 'translate' },
    ])).rejects.toBeInstanceOf(NoServerAvailableError);
    expect(calls).toEqual([]);
  });

  it('serves repeated tasks from the cache', async () => {
    const { orchestrator, cache } = setup(handlers);
    await orchestrator.run(WORKFLOW);
    const second = await orchestrator.run(WORKFLOW);

    expect(calls).toHaveLength(4);
    expect(second.stats).toMatchObject({ cacheHits: 4, dispatched: 0 });
    expect(second.outcomes.summarize).toMatchObject({ status: 'succeeded', value: 'summary', cached: true });
    expect(cache.stats()).toMatchObject({ hits: 4, misses: 4 });
    expect(orchestrator.stats()).toEqual({
      totalRuns: 2,
      totalRequests: 8,
      totalBatches: 4,
      cacheHits: 4,
      dispatched: 4,
      failures: 0,
    });
  });

  it('keys the cache on relevant context only', async () => {
    const { orchestrator } = setup(handlers);
    const tasks: TaskSpec[] = [{ name: 'docs', capability: 'fetch', args: { source: 'docs' } }];

    await orchestrator.run(tasks, { context: { userId: 'alice', requestedAt: 1 } });
    const same = await orchestrator.run(tasks, { context: { userId: 'alice', requestedAt: 2 } });
    const other = await orchestrator.run(tasks, { context: { userId: 'bob' } });

    expect(same.outcomes.docs).toMatchObject({ cached: true });
    expect(other.outcomes.docs).toMatchObject({ cached: false });
  });

  it('does not cache failures', async () => {
    let attempts = 0;
    const { orchestrator } = setup({
      flaky: () => {
        attempts++;
        if (attempts === 1) throw new Error('first try fails');
        return 'ok';
      },
    });
    const first = await orchestrator.run([{ name: 't', capability: 'flaky' }]);
    const second = await orchestrator.run([{ name: 't', capability: 'flaky' }]);
    expect(first.outcomes.t.status).toBe('failed');
    expect(second.outcomes.t).toMatchObject({ status: 'succeeded', cached: false });
  });

  it('holds server load only while a call is in flight, including failures', async () => {
    const seen: number[] = [];
    const { orchestrator, registry } = setup({
      ok: () => {
        seen.push(registry.load('local'));
        return 1;
      },
      fail: () => {
        seen.push(registry.load('local'));
        throw new Error('nope');
      },
    });

    await orchestrator.run([{ name: 'a', capability: 'ok' }]);
    await orchestrator.run([{ name: 'b', capability: 'fail' }]);

    expect(seen).toEqual([1, 1]);
    expect(registry.load('local')).toBe(0);
    expect(registry.loadDistribution()).toEqual({ local: 2 });
  });

  it('runs the tasks of a batch concurrently', async () => {
    let inFlight = 0;
    let peak = 0;
    const slow: CapabilityHandler = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(20);
      inFlight--;
      return 'done';
    };
    const { orchestrator } = setup({ slow });
    await orchestrator.run([
      { name: 'a', capability: 'slow', args: { i: 1 } },
      { name: 'b', capability: 'slow', args: { i: 2 } },
      { name: 'c', capability: 'slow', args: { i: 3 } },
    ]);
    expect(peak).toBe(3);
  });

  it('caps in-flight calls with maxConcurrency without changing batches', async () => {
    let inFlight = 0;
    let peak = 0;
    const slow: CapabilityHandler = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await sleep(5);
      inFlight--;
      return 'done';
    };
    const { orchestrator } = setup({ slow }, { maxConcurrency: 1 });
    const result = await orchestrator.run([
      { name: 'a', capability: 'slow', args: { i: 1 } },
      { name: 'b', capability: 'slow', args: { i: 2 } },
    ]);
    expect(peak).toBe(1);
    expect(result.batches).toEqual([['a', 'b']]);
  });

  it('passes dependency results to argument builders', async () => {
    const { orchestrator } = setup({
      fetch: args => `${String(args.source)}-content`,
      join: args => args,
    });
    const result = await orchestrator.run([
      { name: 'left', capability: 'fetch', args: { source: 'l' } },
      { name: 'right', capability: 'fetch', args: { source: 'r' } },
      {
        name: 'merge',
        capability: 'join',
        dependsOn: ['left', 'right'],
        args: deps => ({ parts: [deps.left, deps.right] }),
      },
    ]);
    expect(result.outcomes.merge).toMatchObject({ status: 'succeeded', value: { parts: ['l-content', 'r-content'] } });
  });

  it('fails a task whose argument builder throws', async () => {
    const { orchestrator } = setup(handlers);
    const result = await orchestrator.run([
      { name: 'bad', capability: 'analyze', args: () => { throw new Error('no args'); } },
    ]);
    const outcome = result.outcomes.bad;
    expect(outcome.status).toBe('failed');
    expect(outcome.status === 'failed' && outcome.error.message).toBe(
      'Task "bad" failed invoking "analyze": no args',
    );
    expect(calls).toEqual([]);
  });

  it('stops starting batches once the run is aborted', async () => {
    const controller = new AbortController();
    handlers.fetch = args => {
      controller.abort();
      return `${String(args.source)}-content`;
    };
    const { orchestrator } = setup(handlers);
    const result = await orchestrator.run(WORKFLOW, { signal: controller.signal });

    expect(result.batches).toEqual([['fetch_docs', 'fetch_schema']]);
    expect(result.outcomes.fetch_docs.status).toBe('succeeded');
    expect(result.outcomes.fetch_schema.status).toBe('succeeded');
    const analyze = result.outcomes.analyze;
    expect(analyze.status).toBe('cancelled');
    expect(analyze.status === 'cancelled' && analyze.error).toBeInstanceOf(RunCancelledError);
    expect(result.stats).toMatchObject({ succeeded: 2, cancelled: 2 });
  });

  it('records a latency sample per dispatched call, failures included', async () => {
    handlers.fetch = args => {
      if (args.source === 'docs') throw new Error('down');
      return 'ok';
    };
    const { orchestrator, monitor } = setup(handlers);
    await orchestrator.run(WORKFLOW);

    expect(monitor.operations()).toEqual(['fetch_docs', 'fetch_schema', 'summarize']);
    expect(monitor.samples('fetch_docs')[0].failed).toBe(true);
  });

  it('emits lifecycle events in order', async () => {
    const { orchestrator, events } = setup(handlers);
    const seen: string[] = [];
    events.on('run:start', e => seen.push(`run:start:${e.batches}`));
    events.on('batch:start', e => seen.push(`batch:start:${e.index}`));
    events.on('batch:complete', e => seen.push(`batch:complete:${e.index}`));
    events.on('run:complete', () => seen.push('run:complete'));

    await orchestrator.run(WORKFLOW);
    expect(seen).toEqual([
      'run:start:2',
      'batch:start:0',
      'batch:complete:0',
      'batch:start:1',
      'batch:complete:1',
      'run:complete',
    ]);
  });

  describe('tasks that fail outside the capability call', () => {
    it('fails a task whose arguments cannot be fingerprinted and keeps its siblings', async () => {
      const looped: Record<string, unknown> = { label: 'loop' };
      looped.self = looped;
      const { orchestrator } = setup(handlers);

      const result = await orchestrator.run([
        { name: 'ok', capability: 'analyze' },
        { name: 'bad', capability: 'summarize', args: looped },
      ]);

      expect(result.outcomes.ok).toMatchObject({ status: 'succeeded', value: 'analysis' });
      const bad = result.outcomes.bad;
      expect(bad.status).toBe('failed');
      expect(bad.status === 'failed' && bad.error.message).toBe(
        'Task "bad" failed invoking "summarize": Cannot fingerprint a circular structure',
      );
      expect(calls).toEqual(['analyze']);
    });

    it('fails the task when recording its latency throws', async () => {
      const { orchestrator, monitor, registry } = setup(handlers);
      vi.spyOn(monitor, 'record').mockImplementation(() => {
        throw new Error('monitor down');
      });

      const result = await orchestrator.run([{ name: 'a', capability: 'analyze' }]);

      const outcome = result.outcomes.a;
      expect(outcome).toMatchObject({ status: 'failed', server: 'local' });
      expect(outcome.status === 'failed' && outcome.error.message).toBe(
        'Task "a" failed invoking "analyze" on local: monitor down',
      );
      expect(registry.load('local')).toBe(0);
    });

    it('fails the task when storing its result throws', async () => {
      const { orchestrator, cache } = setup(handlers);
      vi.spyOn(cache, 'put').mockImplementation(() => {
        throw new Error('cache full');
      });

      const result = await orchestrator.run([
        { name: 'a', capability: 'analyze' },
        { name: 'b', capability: 'summarize', dependsOn: ['a'] },
      ]);

      expect(result.outcomes.a.status).toBe('failed');
      expect(result.outcomes.b.status).toBe('skipped');
      expect(result.stats).toMatchObject({ failed: 1, skipped: 1, dispatched: 1 });
    });

    it('is unaffected by throwing event listeners', async () => {
      const { orchestrator, events } = setup(handlers);
      events.on('task:dispatch', () => {
        throw new Error('listener boom');
      });
      events.on('run:start', () => {
        throw new Error('listener boom');
      });

      const result = await orchestrator.run(WORKFLOW);
      expect(result.stats).toMatchObject({ succeeded: 4, failed: 0 });
    });
  });

  it('does not serve a cached result to a different non-finite argument', async () => {
    const { orchestrator } = setup({ echo: args => ({ got: String(args.x) }) });
    const values: unknown[] = [];
    for (const x of [Number.NaN, null, Number.POSITIVE_INFINITY]) {
      const result = await orchestrator.run([{ name: 'echo', capability: 'echo', args: { x } }]);
      values.push(result.outcomes.echo);
    }
    expect(values).toMatchObject([
      { value: { got: 'NaN' }, cached: false },
      { value: { got: 'null' }, cached: false },
      { value: { got: 'Infinity' }, cached: false },
    ]);
  });

  it('returns an empty result for no tasks', async () => {
    const { orchestrator } = setup(handlers);
    const result = await orchestrator.run([]);
    expect(result.outcomes).toEqual({});
    expect(result.batches).toEqual([]);
  });
});
