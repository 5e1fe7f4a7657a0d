import invariant from "tiny-invariant";
import { DEFAULT_SPRING_CONFIG, SpringConfig } from "../config/springPresets";
import { calculateResistance } from "./ResistanceEngine";

/**
 * Apply the rubber band effect to a double within [min, max]
 * @param value - Raw value
 * @param min - Lower bound
 * @param max - Upper bound
 * @param config - Spring settings, critically damped by default
 * @returns The value itself when in range, otherwise a displaced value beyond the nearest bound
 */
export function rubberBand(
  value: number,
  min: number,
  max: number,
  config: SpringConfig = DEFAULT_SPRING_CONFIG
): number {
  invariant(!Number.isNaN(value), "value must not be NaN");
  invariant(min <= max, "lowerBound must not exceed upperBound");

  if (value >= min && value <= max) {
    // While we're within range we don't rubber band the value.
    return value;
  }

  const distance = value > max ? value - max : min - value;
  const resistance = calculateResistance(distance, config);

  return value > max ? max + resistance : min - resistance;
}
