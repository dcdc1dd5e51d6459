/**
 * Bit and formatting helpers
 */

export function popcount(x: number): number {
  x = x - ((x >>> 1) & 0x55555555);
  x = (x & 0x33333333) + ((x >>> 2) & 0x33333333);
  x = (x + (x >>> 4)) & 0x0f0f0f0f;
  return Math.imul(x, 0x01010101) >>> 24;
}

// Splitmix32 finalizer
export function mix32(z: number): number {
  z = (z + 0x9e3779b9) | 0;
  z ^= z >>> 16;
  z = Math.imul(z, 0x85ebca6b);
  z ^= z >>> 13;
  z = Math.imul(z, 0xc2b2ae35);
  z ^= z >>> 16;
  return z >>> 0;
}

/**
 * Joins the rendered items with `sep`. When the result would exceed
 * `maxLength`, trailing items are dropped and `...` is appended.
 */
export function formatSeq<T>(
  items: Iterable<T>,
  render: (item: T) => string,
  maxLength?: number,
  sep = ', '
): string {
  if (maxLength === undefined) {
    return Array.from(items, render).join(sep);
  }
  if (!Number.isInteger(maxLength) || maxLength < 3) {
    throw new RangeError(`maxLength must be an integer >= 3, got ${maxLength}`);
  }
  const ellipsis = 3 + sep.length;
  const parts: string[] = [];
  let total = 0;
  for (const item of items) {
    const s = render(item);
    parts.push(s);
    total = parts.length === 1 ? s.length : total + sep.length + s.length;
    if (total > maxLength) {
      while (parts.length > 0 && total + ellipsis > maxLength) {
        const dropped = parts.pop();
        total -= (dropped?.length ?? 0) + sep.length;
      }
      parts.push('...');
      break;
    }
  }
  return parts.join(sep);
}

export function show(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'bigint') return `${value}n`;
  return String(value);
}
