/**
 * Interval with both ends included (min...max)
 */
export interface ClosedInterval<T> {
  kind: "closed";
  lowerBound: T;
  upperBound: T;
}

/**
 * Interval with the upper end excluded (min..<max).
 * The upper bound still acts as the effective maximum.
 */
export interface HalfOpenInterval<T> {
  kind: "halfOpen";
  lowerBound: T;
  upperBound: T;
}

export type Interval<T> = ClosedInterval<T> | HalfOpenInterval<T>;

export interface Bounds<T> {
  lowerBound: T;
  upperBound: T;
}

export interface RubberBandEnvConfig {
  preset: string;
  response?: number;
  dampingFraction?: number;
}
