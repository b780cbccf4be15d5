import { createHash } from 'node:crypto';
import type { CapabilityArgs, InvocationContext } from '../registry/types.js';

/**
 * Rewrite a value so that JSON.stringify is independent of key insertion order
 * and distinct inputs never share a rendering. Objects get sorted keys, arrays
 * keep their order, undefined members are dropped. Values JSON has no form for
 * (non-finite numbers, bigint, Date, Map, Set) become single-key objects tagged
 * with a `$` key; plain object keys starting with `$` are escaped with a
 * second `$`.
 */
export function canonicalize(value: unknown): unknown {
  return canonicalizeWithin(value, new Set());
}

function canonicalizeWithin(value: unknown, ancestors: Set<object>): unknown {
  if (value === null) return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : { $num: String(value) };
  }
  if (typeof value === 'bigint') return { $bigint: value.toString() };
  if (typeof value !== 'object') return value;
  if (value instanceof Date) return { $date: value.toISOString() };

  if (ancestors.has(value)) {
    throw new TypeError('Cannot fingerprint a circular structure');
  }
  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map(item => (item === undefined ? null : canonicalizeWithin(item, ancestors)));
    }
    if (value instanceof Map) {
      const entries = [...value].map(([k, v]) => [canonicalizeWithin(k, ancestors), canonicalizeWithin(v, ancestors)]);
      return { $map: sortByRendering(entries, entry => entry[0]) };
    }
    if (value instanceof Set) {
      const items = [...value].map(item => canonicalizeWithin(item, ancestors));
      return { $set: sortByRendering(items, item => item) };
    }

    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const member: unknown = Reflect.get(value, key);
      if (member !== undefined && typeof member !== 'function') {
        sorted[key.startsWith('$') ? `$${key}` : key] = canonicalizeWithin(member, ancestors);
      }
    }
    return sorted;
  } finally {
    ancestors.delete(value);
  }
}

function sortByRendering<T>(items: T[], keyOf: (item: T) => unknown): T[] {
  const rendered = items.map(item => ({ item, key: JSON.stringify(keyOf(item)) ?? '' }));
  rendered.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  return rendered.map(r => r.item);
}

export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value)) ?? 'null';
}

/**
 * Reduce a context to the keys declared cache-relevant.
 */
export function relevantContext(context: InvocationContext, relevantKeys: readonly string[]): InvocationContext {
  const picked: InvocationContext = {};
  for (const key of relevantKeys) {
    if (context[key] !== undefined) {
      picked[key] = context[key];
    }
  }
  return picked;
}

export function fingerprint(
  capability: string,
  args: CapabilityArgs,
  context: InvocationContext,
  relevantKeys: readonly string[],
): string {
  const material = [
    capability,
    canonicalJson(args),
    canonicalJson(relevantContext(context, relevantKeys)),
  ].join('::');
  return createHash('sha256').update(material).digest('hex');
}
