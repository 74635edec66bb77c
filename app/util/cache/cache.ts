// Abstract base class for a simple cache of values keyed by strings
export abstract class Cache<V, C = undefined> {
  /**
   * get a value from the cache. if the key is not in the cache, fetch the value from somewhere else
   * and insert it into the cache before returning it
   * @param key - the key string to use to get the value
   * @param context - passed through to the method that fetches missing values
   * @returns A `Promise` containing the value
   */
  abstract fetch(key: string, context: C): Promise<V>;

  /**
   * remove every value from the cache
   */
  abstract clear(): void;
}
