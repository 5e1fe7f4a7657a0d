/**
 * Capability a value type needs to take part in the rubber band transform:
 * a native ordering and a round-trip through a double.
 *
 * Values outside the range of a finite double cannot be converted, and an
 * out-of-range value must stay distinguishable from its nearest bound once
 * both are doubles (for integers, above 2^53 only when they are far enough
 * apart). Adapters throw from toDouble in the first case; the facade throws
 * in the second. Past 2^53 the displacement itself is rounded to the
 * spacing of doubles at that magnitude, so an integer result may land on
 * the bound.
 */
export interface NumericAdapter<T> {
  readonly name: string;

  /** Negative, zero or positive like Array.prototype.sort; NaN when unordered */
  compare(a: T, b: T): number;

  toDouble(value: T): number;

  /** Convert a computed double back using the type's own conversion */
  fromDouble(value: number): T;
}

/**
 * Convert through `toNumber`, rejecting magnitudes a double cannot hold
 */
export function toFiniteDouble(
  value: { toString(): string },
  toNumber: () => number,
  name: string
): number {
  const double = toNumber();
  if (!Number.isFinite(double)) {
    throw new Error(`Value ${value.toString()} cannot be converted to a finite double for ${name}`);
  }
  return double;
}

export function compareNumbers(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return a === b ? 0 : NaN;
}

export function compareBigInts(a: bigint, b: bigint): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

export const float64: NumericAdapter<number> = {
  name: "float64",
  compare: compareNumbers,
  toDouble: (value) => value,
  fromDouble: (value) => value,
};

export const float32: NumericAdapter<number> = {
  name: "float32",
  compare: compareNumbers,
  toDouble: (value) => value,
  fromDouble: (value) => Math.fround(value),
};
