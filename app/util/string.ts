/**
 * Returns true if a string is an integer.
 * @param value - the value to check
 * @returns true if it is an integer and false otherwise
 */
export function isInteger(value: string): boolean {
  return /^-?\d+$/.test(value);
}

/**
 * Returns true if a string is a float.
 * @param value - the value to check
 * @returns true if it is a float and false otherwise
 */
export function isFloat(value: string): boolean {
  return /^-?\d+\.\d+$/.test(value) || /^-?\d+\.?\d*e[-+]?\d+$/i.test(value);
}

/**
 * Returns true if a string is 'true' or 'false' (any case)
 * @param value - the value to check
 */
export function isBoolean(value: string): boolean {
  return /^(true|false)$/i.test(value);
}

/**
 * Parses a 'true' / 'false' string. Anything other than 'true' (any case) is false.
 * @param value - the string to parse
 */
export function parseBoolean(value: string): boolean {
  return value?.toLowerCase() === 'true';
}
