/**
 * Arbitrary-precision adapters for the big number libraries
 */

import BN from "bn.js";
import BigNumber from "bignumber.js";
import Decimal from "decimal.js";
import { NumericAdapter, toFiniteDouble } from "./NumericAdapter";
import { requireFinite, toIntegral } from "./integers";

export const bn: NumericAdapter<BN> = {
  name: "bn",
  compare: (a, b) => a.cmp(b),
  toDouble: (value) => toFiniteDouble(value, () => Number(value.toString()), "bn"),
  fromDouble: (value) => {
    requireFinite(value, "bn");
    return new BN(BigInt(toIntegral(value)).toString());
  },
};

export const bignumber: NumericAdapter<BigNumber> = {
  name: "bignumber",
  compare: (a, b) => a.comparedTo(b) ?? NaN,
  toDouble: (value) => toFiniteDouble(value, () => value.toNumber(), "bignumber"),
  fromDouble: (value) => new BigNumber(value),
};

export const decimal: NumericAdapter<Decimal> = {
  name: "decimal",
  compare: (a, b) => a.comparedTo(b),
  toDouble: (value) => toFiniteDouble(value, () => value.toNumber(), "decimal"),
  fromDouble: (value) => new Decimal(value),
};
