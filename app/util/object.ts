/**
 * True if the value is a non-null, non-array object
 * @param value - the value to check
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the value when it is an object, otherwise an empty object
 * @param value - the value to check
 */
export function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

/**
 * Returns the value when it is a string, otherwise undefined
 * @param value - the value to check
 */
export function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Returns the value when it is a finite number, otherwise undefined
 * @param value - the value to check
 */
export function asNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Converts a Map to a plain object, sorted by key, for JSON output
 * @param map - the map to convert
 * @param nullKey - the key to use for a null map key
 */
export function mapToObject<V>(map: Map<string | null, V>, nullKey = ''): Record<string, V> {
  const result: Record<string, V> = {};
  for (const key of [...map.keys()].sort((a, b) => (a ?? nullKey).localeCompare(b ?? nullKey))) {
    const value = map.get(key);
    if (value !== undefined) result[key ?? nullKey] = value;
  }
  return result;
}
