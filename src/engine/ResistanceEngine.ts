/**
 * Resistance Engine
 * Turns the overshoot past a bound into a bounded, strictly increasing displacement
 */

import _ from "lodash";
import invariant from "tiny-invariant";
import {
  BASE_DISPLACEMENT,
  DISPLACEMENT_PER_STIFFNESS,
  OSCILLATION_AMPLITUDE,
  OSCILLATION_CYCLES,
  OSCILLATION_DECAY,
  OVERDAMPED_REDUCTION,
  PROGRESS_SCALE,
} from "../constants";
import { DampingRegime, SpringConfig } from "../config/springPresets";
import { getLogger } from "../utils/Logger";

const logger = getLogger(module);

/**
 * Displacement the base curve approaches as distance grows
 */
export function maxDisplacement(config: SpringConfig): number {
  return BASE_DISPLACEMENT + DISPLACEMENT_PER_STIFFNESS / config.response;
}

/**
 * Normalized progress in [0, 1]: 0 at the bound, approaching 1 far away
 */
export function normalizedProgress(distance: number, config: SpringConfig): number {
  if (distance === Infinity) {
    return 1;
  }
  const scale = PROGRESS_SCALE / config.response;
  const total = distance + scale;
  return Number.isFinite(total) ? distance / total : 1 / (1 + scale / distance);
}

/**
 * Multiplicative factor carrying the damping character of the curve.
 *
 * The underdamped oscillation is a function of progress rather than raw
 * distance, and fades out as progress reaches 1. The slope of
 * progress * factor stays above 0.9 for every damping fraction below 1,
 * so the curve is strictly increasing for any response and converges to
 * maxDisplacement.
 */
export function springFactor(progress: number, config: SpringConfig): number {
  const damping = config.dampingFraction;

  switch (config.regime) {
    case DampingRegime.UNDERDAMPED: {
      const frequency = Math.sqrt(1 - damping * damping);
      const phase = 2 * Math.PI * OSCILLATION_CYCLES * frequency * progress;
      const oscillation =
        OSCILLATION_AMPLITUDE *
        Math.sin(phase) *
        Math.exp(-OSCILLATION_DECAY * progress) *
        (1 - progress);
      return 1 + oscillation;
    }
    case DampingRegime.CRITICALLY_DAMPED:
      return 1;
    case DampingRegime.OVERDAMPED:
      return 1 - (OVERDAMPED_REDUCTION * (damping - 1)) / (damping + 1);
  }
}

/**
 * Upper bound of calculateResistance for a config
 */
export function resistanceCeiling(config: SpringConfig): number {
  const ceiling = maxDisplacement(config);
  return config.regime === DampingRegime.OVERDAMPED
    ? ceiling * springFactor(1, config)
    : ceiling;
}

/**
 * Calculate the resistance for a distance past the nearest bound
 * @param distance - Non-negative overshoot
 * @param config - Spring settings
 * @returns Displacement to apply beyond the bound
 */
export function calculateResistance(distance: number, config: SpringConfig): number {
  invariant(distance >= 0, "distance must be non-negative");

  const progress = normalizedProgress(distance, config);
  const baseResistance = maxDisplacement(config) * progress;
  const resistance = baseResistance * springFactor(progress, config);

  if (!Number.isFinite(resistance) || resistance < 0) {
    logger.warn(
      `ResistanceEngine: Clamping resistance ${resistance} for distance ${distance} with ${config}`
    );
    return Number.isNaN(resistance)
      ? 0
      : _.clamp(resistance, 0, resistanceCeiling(config));
  }

  return resistance;
}
