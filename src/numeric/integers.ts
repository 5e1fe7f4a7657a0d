/**
 * Integer adapters
 * Fixed-width integers convert back by truncation and reject results outside their width
 */

import {
  Rounding,
  INT16_BOUNDS,
  INT32_BOUNDS,
  INT64_BOUNDS,
  INT8_BOUNDS,
  UINT8_BOUNDS,
  UINT16_BOUNDS,
  UINT32_BOUNDS,
  UINT64_BOUNDS,
} from "../constants";
import { getLogger } from "../utils/Logger";
import { compareBigInts, compareNumbers, NumericAdapter, toFiniteDouble } from "./NumericAdapter";

const logger = getLogger(module);

/**
 * Round a double to an integral double
 * @param value - Finite double
 * @param rounding - ROUND_DOWN truncates toward zero, ROUND_UP away from zero
 */
export function toIntegral(value: number, rounding: Rounding = Rounding.ROUND_DOWN): number {
  switch (rounding) {
    case Rounding.ROUND_DOWN:
      return Math.trunc(value);
    case Rounding.ROUND_HALF_UP:
      return Math.sign(value) * Math.round(Math.abs(value));
    case Rounding.ROUND_UP:
      return Math.sign(value) * Math.ceil(Math.abs(value));
  }
}

function outOfBounds(value: number, name: string, min: number | bigint, max: number | bigint): Error {
  const message = `Value ${value} is out of bounds for ${name} [${min}, ${max}]`;
  logger.error(`IntegerAdapter: ${message}`);
  return new Error(message);
}

export function requireFinite(value: number, name: string): void {
  if (!Number.isFinite(value)) {
    throw new Error(`Value ${value} cannot be converted to ${name}`);
  }
}

/**
 * Adapter for an integer width held in a JS number
 */
export function createIntegerAdapter(
  name: string,
  bounds: readonly [number, number],
  rounding: Rounding = Rounding.ROUND_DOWN
): NumericAdapter<number> {
  const [min, max] = bounds;
  return {
    name,
    compare: compareNumbers,
    toDouble: (value) => value,
    fromDouble: (value) => {
      requireFinite(value, name);
      // `+ 0` folds -0 from truncating small negatives into 0
      const integral = toIntegral(value, rounding) + 0;
      if (integral < min || integral > max) {
        throw outOfBounds(value, name, min, max);
      }
      return integral;
    },
  };
}

/**
 * Adapter for an integer width held in a bigint
 */
export function createBigIntAdapter(
  name: string,
  bounds?: readonly [bigint, bigint],
  rounding: Rounding = Rounding.ROUND_DOWN
): NumericAdapter<bigint> {
  return {
    name,
    compare: compareBigInts,
    toDouble: (value) => toFiniteDouble(value, () => Number(value), name),
    fromDouble: (value) => {
      requireFinite(value, name);
      const integral = BigInt(toIntegral(value, rounding));
      if (bounds && (integral < bounds[0] || integral > bounds[1])) {
        throw outOfBounds(value, name, bounds[0], bounds[1]);
      }
      return integral;
    },
  };
}

export const int8 = createIntegerAdapter("int8", INT8_BOUNDS);
export const int16 = createIntegerAdapter("int16", INT16_BOUNDS);
export const int32 = createIntegerAdapter("int32", INT32_BOUNDS);
export const uint8 = createIntegerAdapter("uint8", UINT8_BOUNDS);
export const uint16 = createIntegerAdapter("uint16", UINT16_BOUNDS);
export const uint32 = createIntegerAdapter("uint32", UINT32_BOUNDS);
export const int64 = createBigIntAdapter("int64", INT64_BOUNDS);
export const uint64 = createBigIntAdapter("uint64", UINT64_BOUNDS);
export const bigInteger = createBigIntAdapter("bigint");
