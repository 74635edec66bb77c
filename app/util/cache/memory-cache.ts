import { LRUCache } from 'lru-cache';
import { Cache } from './cache';
import env from '../env';

// Simple implementation of a cache backed by an in-memory
// least-recently-used (LRU) cache

export type FetchMethod<V, C> = (key: string, context: C) => Promise<V>;

interface MemoryCacheOptions {
  ttl?: number; // Optional TTL in milliseconds
  maxEntries?: number; // Optional max entries override
  disabled?: boolean; // Fetch every value, storing nothing
}

// eslint-disable-next-line @typescript-eslint/ban-types
export class MemoryCache<V extends {}, C = undefined> extends Cache<V, C> {
  private data: LRUCache<string, V>;

  private fetchMethod: FetchMethod<V, C>;

  private pending: Map<string, Promise<V>> = new Map();

  private disabled: boolean;

  constructor(fetchMethod: FetchMethod<V, C>, options?: MemoryCacheOptions) {
    super();
    this.fetchMethod = fetchMethod;
    this.disabled = options?.disabled ?? false;

    this.data = new LRUCache<string, V>({
      max: options?.maxEntries ?? env.cubedashCacheMaxEntries,
      ttl: options?.ttl, // No expiration if undefined
    });
  }

  async fetch(key: string, context: C): Promise<V> {
    if (this.disabled) return this.fetchMethod(key, context);

    const cached = this.data.get(key);
    if (cached !== undefined) return cached;

    // Check for in-progress fetch
    const existingPromise = this.pending.get(key);
    if (existingPromise) return existingPromise;

    // Initiate fetch and store the promise
    const fetchPromise = this.fetchMethod(key, context)
      .then((result) => {
        this.data.set(key, result);
        this.pending.delete(key);
        return result;
      })
      .catch((err) => {
        this.pending.delete(key);
        throw err;
      });

    this.pending.set(key, fetchPromise);
    return fetchPromise;
  }

  clear(): void {
    this.data.clear();
  }
}
