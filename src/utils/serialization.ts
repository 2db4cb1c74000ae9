/** JSON replacer that writes bigints as decimal strings */
export function bigIntReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  return value;
}

/**
 * Parse an unsigned integer carried as a decimal string or number in a request body.
 * Returns undefined when the input is not a non-negative integer.
 */
export function parseUint(value: unknown): bigint | undefined {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? BigInt(value) : undefined;
  }
  if (typeof value === 'string' && /^[0-9]+$/.test(value)) {
    return BigInt(value);
  }
  return undefined;
}
