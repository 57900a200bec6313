/**
 * Kubernetes resource quantities (`500m`, `8Gi`, `1.5`, `2e3`) as plain
 * numbers in base units: cores for CPU, bytes for memory, counts for pods.
 */

const SUFFIXES: Record<string, number> = {
  n: 1e-9,
  u: 1e-6,
  m: 1e-3,
  '': 1,
  k: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
  E: 1e18,
  Ki: 2 ** 10,
  Mi: 2 ** 20,
  Gi: 2 ** 30,
  Ti: 2 ** 40,
  Pi: 2 ** 50,
  Ei: 2 ** 60,
};

const QUANTITY = /^([+-]?(?:\d+\.?\d*|\.\d+))(?:[eE]([+-]?\d+)|(Ki|Mi|Gi|Ti|Pi|Ei|[numkMGTPE]))?$/;

/** Parse a quantity; malformed or missing values count as 0. */
export function parseQuantity(raw: string | number | undefined | null): number {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : 0;
  if (!raw) return 0;
  const match = QUANTITY.exec(raw.trim());
  if (!match) return 0;
  const [, digits = '0', exponent, suffix = ''] = match;
  const value = Number.parseFloat(digits);
  if (exponent !== undefined) return value * 10 ** Number.parseInt(exponent, 10);
  return value * (SUFFIXES[suffix] ?? 1);
}

/** Share of `used` in `capacity` as a percentage; 0 when capacity is 0. */
export function fraction(used: number, capacity: number): number {
  return capacity > 0 ? (used / capacity) * 100 : 0;
}
