/**
 * Configuration type definitions
 */

export type AppEnv = 'development' | 'production' | 'test';

export interface LoggingConfig {
  level: string;
  toFiles: boolean;
}

export interface AssignmentConfig {
  altitudeThresholdFt: number;
  radiusKm: number;
  includeFixes: boolean;
  targetLocations?: string[];
}

export interface AppConfig {
  env: AppEnv;
  logging: LoggingConfig;
  assignment: AssignmentConfig;
}
