interface MemoryManagerOptions {
  maxSize?: number;
  maxAge?: number;
  now?: () => number;
}

interface Entry<V> {
  value: V;
  timestamp: number;
}

/**
 * Bounded map whose entries expire `maxAge` ms after they were last set.
 * Expired entries are dropped when read; the size bound evicts the oldest.
 */
class MemoryManager<K, V> {
  private map = new Map<K, Entry<V>>();
  private maxSize: number;
  private maxAge: number;
  private now: () => number;

  constructor(options: MemoryManagerOptions = {}) {
    this.maxSize = options.maxSize || 1000;
    this.maxAge = options.maxAge || 24 * 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  set(key: K, value: V): void {
    this.map.delete(key);
    if (this.map.size >= this.maxSize) {
      const oldestKey = this.map.keys().next().value;
      if (oldestKey !== undefined) {
        this.map.delete(oldestKey);
      }
    }

    this.map.set(key, { value, timestamp: this.now() });
  }

  get(key: K): V | undefined {
    const entry = this.map.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.timestamp > this.maxAge) {
      this.map.delete(key);
      return undefined;
    }

    return entry.value;
  }

  delete(key: K): boolean {
    return this.map.delete(key);
  }
}

export function createMemoryManager<K, V>(options?: MemoryManagerOptions): MemoryManager<K, V> {
  return new MemoryManager<K, V>(options);
}

export { MemoryManager };
