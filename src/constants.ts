export enum Rounding {
  ROUND_DOWN,
  ROUND_HALF_UP,
  ROUND_UP,
}

// Resistance curve shape
export const BASE_DISPLACEMENT = 25.0;
export const DISPLACEMENT_PER_STIFFNESS = 15.0;
export const PROGRESS_SCALE = 20.0;

// Underdamped oscillation, expressed in progress space (0..1)
export const OSCILLATION_AMPLITUDE = 0.1;
export const OSCILLATION_CYCLES = 1;
export const OSCILLATION_DECAY = 2.0;

// Overdamped reduction
export const OVERDAMPED_REDUCTION = 0.15;

export const CRITICAL_DAMPING = 1.0;

export const INT8_BOUNDS = [-128, 127] as const;
export const INT16_BOUNDS = [-32768, 32767] as const;
export const INT32_BOUNDS = [-2147483648, 2147483647] as const;
export const UINT8_BOUNDS = [0, 255] as const;
export const UINT16_BOUNDS = [0, 65535] as const;
export const UINT32_BOUNDS = [0, 4294967295] as const;
export const INT64_BOUNDS = [-(2n ** 63n), 2n ** 63n - 1n] as const;
export const UINT64_BOUNDS = [0n, 2n ** 64n - 1n] as const;
