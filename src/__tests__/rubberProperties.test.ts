/**
 * Property checks for the rubber band transform across presets and value types
 */

import BN from "bn.js";
import Decimal from "decimal.js";
import { SpringConfig } from "../config/springPresets";
import { rubberBand } from "../engine/RubberBand";
import { float32, int32, NUMERIC_ADAPTERS, getNumericAdapter, resolveAdapter } from "../numeric";
import { createRubber, rubber } from "../Rubber";
import { closedRange, halfOpenRange } from "../utils/interval";

const PRESETS: Array<[string, SpringConfig]> = [
  ["bouncy", SpringConfig.bouncy],
  ["smooth", SpringConfig.smooth],
  ["snappy", SpringConfig.snappy],
  ["loose", SpringConfig.loose],
  ["firm", SpringConfig.firm],
  ["elastic", SpringConfig.elastic],
];

describe("Rubber band properties", () => {
  describe.each(PRESETS)("with the %s preset", (_name, config) => {
    it("should leave every in-range value untouched", () => {
      for (let value = -20; value <= 20; value += 0.5) {
        expect(rubber(value, closedRange(-20, 20), config)).toBe(value);
      }
    });

    it("should keep results strictly outside the interval", () => {
      for (let offset = 0.25; offset <= 500; offset *= 2) {
        expect(rubberBand(100 + offset, 0, 100, config)).toBeGreaterThan(100);
        expect(rubberBand(-offset, 0, 100, config)).toBeLessThan(0);
      }
    });

    it("should be strictly monotonic on both sides", () => {
      let previousAbove = rubberBand(100, 0, 100, config);
      let previousBelow = rubberBand(0, 0, 100, config);
      for (let offset = 1; offset <= 1000; offset++) {
        const above = rubberBand(100 + offset, 0, 100, config);
        const below = rubberBand(-offset, 0, 100, config);
        expect(above).toBeGreaterThan(previousAbove);
        expect(below).toBeLessThan(previousBelow);
        previousAbove = above;
        previousBelow = below;
      }
    });

    it("should stay finite for extreme magnitudes", () => {
      for (const value of [Number.MAX_VALUE, -Number.MAX_VALUE, 1e300, -1e300]) {
        const result = rubberBand(value, 0, 100, config);
        expect(Number.isFinite(result)).toBe(true);
        expect(Number.isNaN(result)).toBe(false);
      }
    });

    it("should keep a degenerate interval's point", () => {
      expect(rubberBand(7, 7, 7, config)).toBe(7);
      expect(rubberBand(8, 7, 7, config)).toBeGreaterThan(7);
      expect(rubberBand(6, 7, 7, config)).toBeLessThan(7);
    });
  });

  it("should run the scenario from 120 to 150 past a 100 bound", () => {
    const at150 = rubberBand(150, 0, 100, SpringConfig.smooth);
    const at120 = rubberBand(120, 0, 100, SpringConfig.smooth);

    expect(at150).toBeGreaterThan(100);
    expect(Number.isFinite(at150)).toBe(true);
    expect(at150).toBeGreaterThan(at120);
    expect(rubberBand(25, 0, 100, SpringConfig.elastic)).toBe(25);
  });

  it("should converge to the bound from outside", () => {
    const gaps = [1, 0.1, 0.01, 0.001].map((offset) => rubberBand(100 + offset, 0, 100) - 100);

    for (let i = 1; i < gaps.length; i++) {
      expect(gaps[i]).toBeLessThan(gaps[i - 1]);
    }
    expect(gaps[gaps.length - 1]).toBeLessThan(0.002);
  });

  it("should converge to the lower bound from outside", () => {
    const gaps = [1, 0.1, 0.01, 0.001].map((offset) => 0 - rubberBand(-offset, 0, 100));

    for (let i = 1; i < gaps.length; i++) {
      expect(gaps[i]).toBeLessThan(gaps[i - 1]);
      expect(gaps[i]).toBeGreaterThan(0);
    }
    expect(gaps[gaps.length - 1]).toBeLessThan(0.002);
    expect(rubberBand(0, 0, 100)).toBe(0);
  });

  it("should agree across value types within their rounding", () => {
    const reference = rubberBand(150, 0, 100, SpringConfig.loose);

    expect(createRubber(float32)(150, closedRange(0, 100), SpringConfig.loose)).toBeCloseTo(
      reference,
      4
    );
    expect(createRubber(int32)(150, halfOpenRange(0, 100), SpringConfig.loose)).toBe(
      Math.trunc(reference)
    );
    expect(rubber(150n, closedRange(0n, 100n), SpringConfig.loose)).toBe(
      BigInt(Math.trunc(reference))
    );
    expect(
      rubber(new BN(150), closedRange(new BN(0), new BN(100)), SpringConfig.loose).toNumber()
    ).toBe(Math.trunc(reference));
    expect(
      rubber(new Decimal(150), closedRange(new Decimal(0), new Decimal(100)), SpringConfig.loose)
        .toNumber()
    ).toBe(reference);
  });

  describe("adapter table", () => {
    it("should resolve adapters from runtime types", () => {
      expect(resolveAdapter(1).name).toBe("float64");
      expect(resolveAdapter(1n).name).toBe("bigint");
      expect(resolveAdapter(new BN(1)).name).toBe("bn");
      expect(resolveAdapter(new Decimal(1)).name).toBe("decimal");
    });

    it("should reject unsupported values", () => {
      expect(() => resolveAdapter("12")).toThrow("Unsupported rubber band value type: string");
      expect(() => resolveAdapter(new Date(0))).toThrow(
        "Unsupported rubber band value type: Date"
      );
      expect(() => resolveAdapter(null)).toThrow("Unsupported rubber band value type: null");
    });

    it("should list every adapter under its own name", () => {
      for (const [key, adapter] of Object.entries(NUMERIC_ADAPTERS)) {
        expect(adapter.name).toBe(key);
      }
      expect(getNumericAdapter("uint16").fromDouble(65535.9)).toBe(65535);
    });
  });
});
