/**
 * Typed rubber band facade
 * Runs any ordered numeric type through the shared double computation
 */

import BN from "bn.js";
import BigNumber from "bignumber.js";
import Decimal from "decimal.js";
import { DEFAULT_SPRING_CONFIG, SpringConfig } from "./config/springPresets";
import { rubberBand } from "./engine/RubberBand";
import { NumericAdapter, RubberBandable, resolveAdapter } from "./numeric";
import { Interval } from "./types";
import { contains, normalizeInterval } from "./utils/interval";

export type RubberFunction<T> = (
  value: T,
  interval: Interval<T>,
  config?: SpringConfig
) => T;

/**
 * Apply the rubber band effect with an explicit adapter
 * @param adapter - Ordering and double conversions for T
 * @param value - Raw value
 * @param interval - Closed or half-open interval; both use the upper bound as maximum
 * @param config - Spring settings, critically damped by default
 * @returns `value` itself when in range, otherwise the displaced value converted back to T
 */
export function rubberWith<T>(
  adapter: NumericAdapter<T>,
  value: T,
  interval: Interval<T>,
  config: SpringConfig = DEFAULT_SPRING_CONFIG
): T {
  const compare = (a: T, b: T) => adapter.compare(a, b);
  const bounds = normalizeInterval(interval, compare);

  if (contains(bounds, value, compare)) {
    return value;
  }

  const doubleValue = adapter.toDouble(value);
  const lower = adapter.toDouble(bounds.lowerBound);
  const upper = adapter.toDouble(bounds.upperBound);

  if (compare(value, bounds.upperBound) > 0 && !(doubleValue > upper)) {
    throw indistinguishable(adapter, value, bounds.upperBound);
  }
  if (compare(value, bounds.lowerBound) < 0 && !(doubleValue < lower)) {
    throw indistinguishable(adapter, value, bounds.lowerBound);
  }

  return adapter.fromDouble(rubberBand(doubleValue, lower, upper, config));
}

function indistinguishable<T>(adapter: NumericAdapter<T>, value: T, bound: T): Error {
  return new Error(
    `Value ${String(value)} is too close to bound ${String(bound)} to rubber band as a double (${adapter.name})`
  );
}

/**
 * Bind the facade to one adapter, e.g. `createRubber(int16)`
 */
export function createRubber<T>(adapter: NumericAdapter<T>): RubberFunction<T> {
  return (value, interval, config = DEFAULT_SPRING_CONFIG) =>
    rubberWith(adapter, value, interval, config);
}

export function rubber(value: number, interval: Interval<number>, config?: SpringConfig): number;
export function rubber(value: bigint, interval: Interval<bigint>, config?: SpringConfig): bigint;
export function rubber(value: BN, interval: Interval<BN>, config?: SpringConfig): BN;
export function rubber(
  value: BigNumber,
  interval: Interval<BigNumber>,
  config?: SpringConfig
): BigNumber;
export function rubber(value: Decimal, interval: Interval<Decimal>, config?: SpringConfig): Decimal;
/**
 * Apply the rubber band effect, picking the adapter from the value's type.
 * Plain numbers are treated as doubles; use createRubber for fixed-width integers.
 */
export function rubber(
  value: RubberBandable,
  interval: Interval<RubberBandable>,
  config: SpringConfig = DEFAULT_SPRING_CONFIG
): RubberBandable {
  return rubberWith(resolveAdapter(value), value, interval, config);
}
