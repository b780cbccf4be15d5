/**
 * LruStore: recency-ordered map with a hard entry limit.
 *
 * O(1) get/set/delete via Map + doubly-linked list. Head is the most
 * recently used entry, tail the least; set() beyond capacity evicts the tail.
 */

interface Node<V> {
  key: string;
  value: V;
  prev: Node<V> | null;
  next: Node<V> | null;
}

export type EvictionListener<V> = (key: string, value: V) => void;

export class LruStore<V> {
  private map = new Map<string, Node<V>>();
  private head: Node<V> | null = null;
  private tail: Node<V> | null = null;

  constructor(
    private readonly capacity: number,
    private readonly onEvict?: EvictionListener<V>,
  ) {
    if (capacity < 1) throw new Error('LruStore capacity must be >= 1');
  }

  /** Read and promote to most recently used */
  get(key: string): V | undefined {
    const node = this.map.get(key);
    if (!node) return undefined;
    this.moveToHead(node);
    return node.value;
  }

  /** Insert or replace; replacing also promotes */
  set(key: string, value: V): void {
    const existing = this.map.get(key);
    if (existing) {
      existing.value = value;
      this.moveToHead(existing);
      return;
    }

    if (this.map.size >= this.capacity) {
      this.evictTail();
    }

    const node: Node<V> = { key, value, prev: null, next: this.head };
    if (this.head) this.head.prev = node;
    this.head = node;
    if (!this.tail) this.tail = node;
    this.map.set(key, node);
  }

  delete(key: string): boolean {
    const node = this.map.get(key);
    if (!node) return false;
    this.unlink(node);
    this.map.delete(key);
    return true;
  }

  has(key: string): boolean {
    return this.map.has(key);
  }

  get size(): number {
    return this.map.size;
  }

  clear(): void {
    this.map.clear();
    this.head = null;
    this.tail = null;
  }

  /** Keys from most to least recently used */
  *keys(): IterableIterator<string> {
    for (let node = this.head; node; node = node.next) {
      yield node.key;
    }
  }

  *entries(): IterableIterator<[string, V]> {
    for (let node = this.head; node; node = node.next) {
      yield [node.key, node.value];
    }
  }

  private moveToHead(node: Node<V>): void {
    if (node === this.head) return;
    this.unlink(node);
    node.next = this.head;
    if (this.head) this.head.prev = node;
    this.head = node;
    if (!this.tail) this.tail = node;
  }

  private unlink(node: Node<V>): void {
    if (node.prev) node.prev.next = node.next;
    else this.head = node.next;
    if (node.next) node.next.prev = node.prev;
    else this.tail = node.prev;
    node.prev = null;
    node.next = null;
  }

  private evictTail(): void {
    const evicted = this.tail;
    if (!evicted) return;
    this.unlink(evicted);
    this.map.delete(evicted.key);
    this.onEvict?.(evicted.key, evicted.value);
  }
}
