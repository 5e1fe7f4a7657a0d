import dotenv from 'dotenv';
import { RubberBandEnvConfig } from '../types';
import { getLogger } from '../utils/Logger';
import {
  createCustomConfig,
  isSpringPreset,
  SpringConfig,
  SpringPreset,
} from './springPresets';

const logger = getLogger(module);

function getEnvVarWithDefault(env: NodeJS.ProcessEnv, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function getOptionalNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  return value ? parseFloat(value) : undefined;
}

export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): RubberBandEnvConfig {
  return {
    preset: getEnvVarWithDefault(env, 'RUBBER_BAND_PRESET', SpringPreset.SMOOTH),
    response: getOptionalNumber(env, 'RUBBER_BAND_RESPONSE'),
    dampingFraction: getOptionalNumber(env, 'RUBBER_BAND_DAMPING_FRACTION'),
  };
}

export function validateEnvConfig(config: RubberBandEnvConfig): void {
  if (!isSpringPreset(config.preset)) {
    throw new Error(`Invalid RUBBER_BAND_PRESET: ${config.preset}`);
  }

  if (config.response !== undefined && !(Number.isFinite(config.response) && config.response > 0)) {
    throw new Error('RUBBER_BAND_RESPONSE must be a positive finite number');
  }

  if (
    config.dampingFraction !== undefined &&
    !(Number.isFinite(config.dampingFraction) && config.dampingFraction > 0)
  ) {
    throw new Error('RUBBER_BAND_DAMPING_FRACTION must be a positive finite number');
  }
}

/**
 * Load a spring config from RUBBER_BAND_* variables (and .env when reading process.env).
 * Nothing in the transform reads this implicitly; pass the result as `config`.
 */
export function loadSpringConfig(env: NodeJS.ProcessEnv = process.env): SpringConfig {
  if (env === process.env) {
    dotenv.config();
  }

  const envConfig = readEnvConfig(env);
  validateEnvConfig(envConfig);

  const preset = isSpringPreset(envConfig.preset) ? envConfig.preset : SpringPreset.SMOOTH;
  const config = createCustomConfig(preset, {
    response: envConfig.response,
    dampingFraction: envConfig.dampingFraction,
  });

  logger.info(`Config: Loaded ${preset} preset - ${config}`);
  return config;
}
