/**
 * Numeric Adapters
 * Table of value types that can be rubber banded
 */

import BN from "bn.js";
import BigNumber from "bignumber.js";
import Decimal from "decimal.js";
import { bignumber, bn, decimal } from "./bigNumbers";
import {
  bigInteger,
  int16,
  int32,
  int64,
  int8,
  uint16,
  uint32,
  uint64,
  uint8,
} from "./integers";
import { float32, float64, NumericAdapter } from "./NumericAdapter";

export * from "./NumericAdapter";
export * from "./integers";
export * from "./bigNumbers";

/**
 * Value types picked up from the runtime type of a value
 */
export type RubberBandable = number | bigint | BN | BigNumber | Decimal;

export const NUMERIC_ADAPTERS = {
  float64,
  float32,
  int8,
  int16,
  int32,
  int64,
  uint8,
  uint16,
  uint32,
  uint64,
  bigint: bigInteger,
  bn,
  bignumber,
  decimal,
} as const;

export type NumericAdapterName = keyof typeof NUMERIC_ADAPTERS;

export function getNumericAdapter<K extends NumericAdapterName>(
  name: K
): (typeof NUMERIC_ADAPTERS)[K] {
  return NUMERIC_ADAPTERS[name];
}

export function resolveAdapter(value: number): NumericAdapter<number>;
export function resolveAdapter(value: bigint): NumericAdapter<bigint>;
export function resolveAdapter(value: BN): NumericAdapter<BN>;
export function resolveAdapter(value: BigNumber): NumericAdapter<BigNumber>;
export function resolveAdapter(value: Decimal): NumericAdapter<Decimal>;
export function resolveAdapter(value: unknown): NumericAdapter<RubberBandable>;
/**
 * Pick the adapter for a value from its runtime type
 */
export function resolveAdapter(value: unknown): NumericAdapter<RubberBandable> {
  if (typeof value === "number") return float64;
  if (typeof value === "bigint") return bigInteger;
  if (BN.isBN(value)) return bn;
  if (BigNumber.isBigNumber(value)) return bignumber;
  if (Decimal.isDecimal(value)) return decimal;
  throw new Error(`Unsupported rubber band value type: ${describeType(value)}`);
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}
