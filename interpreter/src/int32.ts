/**
 * Signed 32-bit integer arithmetic with two's-complement wrap-around.
 */

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

export function wrapAdd(a: number, b: number): number {
  return (a + b) | 0;
}

export function wrapMul(a: number, b: number): number {
  return Math.imul(a, b);
}

/**
 * Parse an Integer token's text. Returns null when the literal does not fit
 * in 32 bits.
 */
export function parseInt32(text: string): number | null {
  const value = Number(text);
  if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    return null;
  }
  // normalizes -0
  return value | 0;
}
