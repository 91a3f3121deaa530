/**
 * Configuration type definitions
 */
import type { SimChoice } from './aircraft.types';
import type { MissingAirportPolicy } from './flight.types';

export interface NavdataDatabaseConfig {
  url: string;
  pool: {
    max: number;
  };
}

export interface DatabaseConfig {
  navdata: Record<SimChoice, NavdataDatabaseConfig>;
  spatialIndexBootstrap: boolean;
}

export interface XplaneConfig {
  host: string;
  port: number;
  readTimeoutMs: number;
  connectTimeoutMs: number;
}

export interface MsfsConfig {
  appName: string;
  pollIntervalMs: number;
  /** Module exporting createNativeTelemetryApi() */
  bindingModule?: string;
}

export interface SimConfig {
  xplane: XplaneConfig;
  msfs: MsfsConfig;
}

export const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface LoggingConfig {
  level: LogLevel;
  /** Directory for JSON log files; console only when unset */
  directory?: string;
}

export interface LogbookConfig {
  path: string;
}

export interface TrackingConfig {
  missingAirportPolicy: MissingAirportPolicy;
  resetOnAircraftChange: boolean;
}

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  database: DatabaseConfig;
  sim: SimConfig;
  logbook: LogbookConfig;
  logging: LoggingConfig;
  tracking: TrackingConfig;
}
