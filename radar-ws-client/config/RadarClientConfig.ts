import { CONNECTION, DISPLAY, GEOMETRY } from '../utils/constants';
import { isLogLevel } from '../utils/ScanLogger';
import type { LoggerOptions } from '../utils/ScanLogger';

export interface RadarClientConfig {
  serverAddress: string;
  reconnectDelaySeconds: number;
  connectTimeoutSeconds: number;
  surfaceRadius: number;
  maxRangeUnits: number;
  propagationSpeed: number;
}

export interface DisplayConfig {
  frameIntervalMs: number;
}

export interface AppConfig {
  client: RadarClientConfig;
  logging: LoggerOptions;
  display: DisplayConfig;
}

export const DEFAULT_CLIENT_CONFIG: RadarClientConfig = {
  serverAddress: CONNECTION.DEFAULT_SERVER_ADDRESS,
  reconnectDelaySeconds: CONNECTION.DEFAULT_RECONNECT_DELAY_SECONDS,
  connectTimeoutSeconds: CONNECTION.DEFAULT_CONNECT_TIMEOUT_SECONDS,
  surfaceRadius: GEOMETRY.DEFAULT_SURFACE_RADIUS,
  maxRangeUnits: GEOMETRY.DEFAULT_MAX_RANGE_UNITS,
  propagationSpeed: GEOMETRY.PROPAGATION_SPEED,
};

export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.key = key;
  }
}

function readOptionalPositiveNumber(env: NodeJS.ProcessEnv, envKey: string, fallback: number): number {
  const value = env[envKey];
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(envKey, `Environment variable ${envKey} must be a positive number`);
  }
  return parsed;
}

function checkServerAddress(key: string, address: string): void {
  let protocol: string;
  try {
    protocol = new URL(address).protocol;
  } catch {
    throw new ConfigError(key, `${key} must be a valid URL, got "${address}"`);
  }
  if (protocol !== 'ws:' && protocol !== 'wss:') {
    throw new ConfigError(key, `${key} must use ws: or wss:, got "${protocol}"`);
  }
}

// Check a programmatically assembled config
export function validateClientConfig(config: RadarClientConfig): RadarClientConfig {
  checkServerAddress('serverAddress', config.serverAddress);
  const positive: Array<keyof Omit<RadarClientConfig, 'serverAddress'>> = [
    'reconnectDelaySeconds',
    'connectTimeoutSeconds',
    'surfaceRadius',
    'maxRangeUnits',
    'propagationSpeed',
  ];
  for (const key of positive) {
    const value = config[key];
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigError(key, `${key} must be a positive number, got ${value}`);
    }
  }
  return config;
}

export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): RadarClientConfig {
  const serverAddress = env.RADAR_SERVER_ADDRESS || DEFAULT_CLIENT_CONFIG.serverAddress;
  checkServerAddress('RADAR_SERVER_ADDRESS', serverAddress);

  return {
    serverAddress,
    reconnectDelaySeconds: readOptionalPositiveNumber(env, 'RADAR_RECONNECT_DELAY_SECONDS', DEFAULT_CLIENT_CONFIG.reconnectDelaySeconds),
    connectTimeoutSeconds: readOptionalPositiveNumber(env, 'RADAR_CONNECT_TIMEOUT_SECONDS', DEFAULT_CLIENT_CONFIG.connectTimeoutSeconds),
    surfaceRadius: readOptionalPositiveNumber(env, 'RADAR_SURFACE_RADIUS', DEFAULT_CLIENT_CONFIG.surfaceRadius),
    maxRangeUnits: readOptionalPositiveNumber(env, 'RADAR_MAX_RANGE_UNITS', DEFAULT_CLIENT_CONFIG.maxRangeUnits),
    propagationSpeed: readOptionalPositiveNumber(env, 'RADAR_PROPAGATION_SPEED', DEFAULT_CLIENT_CONFIG.propagationSpeed),
  };
}

function loadLoggingConfig(env: NodeJS.ProcessEnv): LoggerOptions {
  const rawLevel = env.RADAR_LOG_LEVEL?.trim().toUpperCase();
  if (rawLevel && !isLogLevel(rawLevel)) {
    throw new ConfigError('RADAR_LOG_LEVEL', `Environment variable RADAR_LOG_LEVEL must be one of DEBUG, INFO, WARN, ERROR`);
  }
  return {
    level: rawLevel && isLogLevel(rawLevel) ? rawLevel : 'INFO',
    directory: env.RADAR_LOG_DIR || null,
  };
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    client: loadClientConfig(env),
    logging: loadLoggingConfig(env),
    display: {
      frameIntervalMs: readOptionalPositiveNumber(env, 'RADAR_FRAME_INTERVAL_MS', DISPLAY.DEFAULT_FRAME_INTERVAL_MS),
    },
  };
}
