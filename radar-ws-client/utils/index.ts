export { CONNECTION, GEOMETRY, DISPLAY } from './constants';
export { sleep } from './sleep';
export { ScanLogger, scanLogger, LOG_LEVELS, isLogLevel } from './ScanLogger';
export type { LogLevel, LoggerOptions } from './ScanLogger';
