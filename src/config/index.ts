import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import type { AppConfig, AppEnv } from '../types/config.types';

const rootEnvPath = path.resolve(__dirname, '../../.env');
if (fs.existsSync(rootEnvPath)) {
  dotenv.config({ path: rootEnvPath });
}

dotenv.config();

export const DEFAULT_ALTITUDE_THRESHOLD_FT = 6000;
export const DEFAULT_RADIUS_KM = 10.0;

export const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const parseFloatNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const resolveBooleanFlag = (
  enableKey: string | undefined,
  disableKey: string | undefined,
  defaultValue: boolean,
): boolean => {
  if (enableKey !== undefined) {
    return enableKey === 'true';
  }
  if (disableKey !== undefined) {
    return disableKey !== 'true';
  }
  return defaultValue;
};

export const parseListEnv = (value: string | undefined): string[] => (value || '')
  .split(',')
  .map((item) => item.trim())
  .filter(Boolean);

const resolveEnv = (value: string | undefined): AppEnv => {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
};

/**
 * Config from an env map. Unparseable numbers fall back to their defaults.
 */
export const buildAppConfig = (env: NodeJS.ProcessEnv): AppConfig => {
  const radiusKm = parseFloatNumber(env.ASSIGN_RADIUS_KM, DEFAULT_RADIUS_KM);
  const targetLocations = parseListEnv(env.TARGET_LOCATIONS);

  return {
    env: resolveEnv(env.NODE_ENV),
    logging: {
      level: env.LOG_LEVEL || 'info',
      toFiles: env.LOG_TO_FILES === 'true',
    },
    assignment: {
      altitudeThresholdFt: parseNumber(env.ALTITUDE_THRESHOLD_FT, DEFAULT_ALTITUDE_THRESHOLD_FT),
      radiusKm: radiusKm > 0 ? radiusKm : DEFAULT_RADIUS_KM,
      includeFixes: resolveBooleanFlag(
        env.ENABLE_FIX_ASSIGNMENT,
        env.DISABLE_FIX_ASSIGNMENT,
        false,
      ),
      targetLocations: targetLocations.length > 0 ? targetLocations : undefined,
    },
  };
};

const config: AppConfig = buildAppConfig(process.env);

export default config;
