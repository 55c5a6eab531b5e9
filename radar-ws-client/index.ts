// Main client export
export { ConnectionManager } from './core/ConnectionManager';
export type { ConnectionManagerOptions } from './core/ConnectionManager';

// Pipeline stages
export { decodeScanReport, encodeScanReport } from './protocol/ScanDecoder';
export { computePosition, rangeFraction, oneWayDistance, toRadians } from './geometry/GeometryTransform';

// Transport
export { WebSocketTransport } from './transport/WebSocketTransport';
export type { ScanTransport, TransportFactory, ConnectOptions } from './transport/WebSocketTransport';
export { TypedEventEmitter } from './handlers/TypedEventEmitter';

// Configuration
export {
  loadAppConfig,
  loadClientConfig,
  validateClientConfig,
  ConfigError,
  DEFAULT_CLIENT_CONFIG,
} from './config/RadarClientConfig';
export type { AppConfig, DisplayConfig, RadarClientConfig } from './config/RadarClientConfig';

// Type exports
export * from './types';

// Re-export commonly used utilities
export { scanLogger, ScanLogger, sleep, CONNECTION, GEOMETRY, DISPLAY } from './utils';
export type { LogLevel, LoggerOptions } from './utils';
