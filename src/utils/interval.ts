import invariant from "tiny-invariant";
import { Bounds, ClosedInterval, HalfOpenInterval, Interval } from "../types";

export function closedRange<T>(lowerBound: T, upperBound: T): ClosedInterval<T> {
  return { kind: "closed", lowerBound, upperBound };
}

export function halfOpenRange<T>(lowerBound: T, upperBound: T): HalfOpenInterval<T> {
  return { kind: "halfOpen", lowerBound, upperBound };
}

/**
 * Collapse either interval variant to one (lowerBound, upperBound) pair
 * @param interval - Closed or half-open interval
 * @param compare - Native ordering of T
 * @returns Bounds with the upper bound as the effective maximum
 */
export function normalizeInterval<T>(
  interval: Interval<T>,
  compare: (a: T, b: T) => number
): Bounds<T> {
  const { lowerBound, upperBound } = interval;
  invariant(
    compare(lowerBound, upperBound) <= 0,
    "lowerBound must not exceed upperBound"
  );
  return { lowerBound, upperBound };
}

export function contains<T>(
  bounds: Bounds<T>,
  value: T,
  compare: (a: T, b: T) => number
): boolean {
  return compare(bounds.lowerBound, value) <= 0 && compare(value, bounds.upperBound) <= 0;
}
