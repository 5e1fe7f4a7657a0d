/**
 * Spring Configuration Presets
 * Resistance curve settings for the rubber band transform
 */

import invariant from "tiny-invariant";
import {
  CRITICAL_DAMPING,
  DISPLACEMENT_PER_STIFFNESS,
  PROGRESS_SCALE,
} from "../constants";

/**
 * Damping regime selected by the damping fraction
 */
export enum DampingRegime {
  UNDERDAMPED = "UNDERDAMPED",
  CRITICALLY_DAMPED = "CRITICALLY_DAMPED",
  OVERDAMPED = "OVERDAMPED",
}

/**
 * Named preset enum
 */
export enum SpringPreset {
  BOUNCY = "bouncy",
  SMOOTH = "smooth",
  SNAPPY = "snappy",
  LOOSE = "loose",
  FIRM = "firm",
  ELASTIC = "elastic",
}

export function classifyDamping(dampingFraction: number): DampingRegime {
  if (dampingFraction < CRITICAL_DAMPING) {
    return DampingRegime.UNDERDAMPED;
  }
  if (dampingFraction === CRITICAL_DAMPING) {
    return DampingRegime.CRITICALLY_DAMPED;
  }
  return DampingRegime.OVERDAMPED;
}

function isPositiveFinite(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

/**
 * Immutable spring settings for the resistance curve
 */
export class SpringConfig {
  /** How quickly resistance builds up (spring stiffness) */
  public readonly response: number;

  /**
   * Shape of the resistance curve.
   * Below 1 is underdamped (bouncy), 1 is critically damped (smooth),
   * above 1 is overdamped (viscous).
   */
  public readonly dampingFraction: number;

  constructor(response: number = 0.55, dampingFraction: number = 1.0) {
    invariant(isPositiveFinite(response), "response must be a positive finite number");
    invariant(
      Number.isFinite(DISPLACEMENT_PER_STIFFNESS / response) &&
        Number.isFinite(PROGRESS_SCALE / response),
      "response is too small for a finite resistance curve"
    );
    invariant(
      isPositiveFinite(dampingFraction),
      "dampingFraction must be a positive finite number"
    );
    this.response = response;
    this.dampingFraction = dampingFraction;
    Object.freeze(this);
  }

  static readonly bouncy = new SpringConfig(0.4, 0.6);
  static readonly smooth = new SpringConfig(0.55, 1.0);
  static readonly snappy = new SpringConfig(0.8, 1.0);
  static readonly loose = new SpringConfig(0.3, 0.8);
  static readonly firm = new SpringConfig(0.7, 1.2);
  static readonly elastic = new SpringConfig(0.35, 0.4);

  get regime(): DampingRegime {
    return classifyDamping(this.dampingFraction);
  }

  equals(other: SpringConfig): boolean {
    return (
      this.response === other.response &&
      this.dampingFraction === other.dampingFraction
    );
  }

  toString(): string {
    return `SpringConfig(response: ${this.response}, dampingFraction: ${this.dampingFraction})`;
  }
}

/**
 * Critically damped default used when no config is passed
 */
export const DEFAULT_SPRING_CONFIG = SpringConfig.smooth;

const PRESETS: Record<SpringPreset, SpringConfig> = {
  [SpringPreset.BOUNCY]: SpringConfig.bouncy,
  [SpringPreset.SMOOTH]: SpringConfig.smooth,
  [SpringPreset.SNAPPY]: SpringConfig.snappy,
  [SpringPreset.LOOSE]: SpringConfig.loose,
  [SpringPreset.FIRM]: SpringConfig.firm,
  [SpringPreset.ELASTIC]: SpringConfig.elastic,
};

export function isSpringPreset(name: string): name is SpringPreset {
  return Object.prototype.hasOwnProperty.call(PRESETS, name);
}

/**
 * Get configuration for a specific preset
 */
export function getSpringConfig(preset: SpringPreset): SpringConfig {
  return PRESETS[preset] ?? DEFAULT_SPRING_CONFIG;
}

/**
 * Create custom configuration by overriding preset
 */
export function createCustomConfig(
  basePreset: SpringPreset,
  overrides: Partial<Pick<SpringConfig, "response" | "dampingFraction">>
): SpringConfig {
  const baseConfig = getSpringConfig(basePreset);
  return new SpringConfig(
    overrides.response ?? baseConfig.response,
    overrides.dampingFraction ?? baseConfig.dampingFraction
  );
}
