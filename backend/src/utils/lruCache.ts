interface LruNode<K, V> {
  key: K;
  value: V;
  prev: LruNode<K, V> | null;
  next: LruNode<K, V> | null;
}

/**
 * Bounded map with least-recently-used eviction. Recency is kept in an
 * explicit doubly-linked list; the Map is only an index into it.
 */
export class LruCache<K, V> {
  private readonly index = new Map<K, LruNode<K, V>>();
  private head: LruNode<K, V> | null = null; // most recent
  private tail: LruNode<K, V> | null = null; // least recent

  constructor(private readonly capacity: number) {
    if (capacity < 1) {
      throw new RangeError('LruCache capacity must be at least 1');
    }
  }

  /** Returns the value and marks it most recently used. */
  get(key: K): V | undefined {
    const node = this.index.get(key);
    if (!node) return undefined;
    this.moveToFront(node);
    return node.value;
  }

  /** Inserts or replaces, evicting the least recently used key at capacity. */
  set(key: K, value: V): K | undefined {
    const existing = this.index.get(key);
    if (existing) {
      existing.value = value;
      this.moveToFront(existing);
      return undefined;
    }

    let evicted: K | undefined;
    if (this.index.size >= this.capacity && this.tail) {
      evicted = this.tail.key;
      this.unlink(this.tail);
      this.index.delete(evicted);
    }

    const node: LruNode<K, V> = { key, value, prev: null, next: null };
    this.pushFront(node);
    this.index.set(key, node);
    return evicted;
  }

  clear(): void {
    this.index.clear();
    this.head = null;
    this.tail = null;
  }

  private moveToFront(node: LruNode<K, V>): void {
    if (this.head === node) return;
    this.unlink(node);
    this.pushFront(node);
  }

  private pushFront(node: LruNode<K, V>): void {
    node.prev = null;
    node.next = this.head;
    if (this.head) this.head.prev = node;
    this.head = node;
    if (!this.tail) this.tail = node;
  }

  private unlink(node: LruNode<K, V>): void {
    if (node.prev) node.prev.next = node.next;
    else this.head = node.next;
    if (node.next) node.next.prev = node.prev;
    else this.tail = node.prev;
    node.prev = null;
    node.next = null;
  }
}
