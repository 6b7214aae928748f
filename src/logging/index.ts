export { LogLevel, parseLogLevel, tryParseLogLevel, isLevelEnabled } from './LogLevel.js';
export { Logger } from './Logger.js';
export type { WinstonSink } from './Logger.js';
export {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export {
  registerComponent,
  setComponentLevel,
  clearComponentLevel,
  getEffectiveLevel,
  getRegisteredComponents,
  resetDebugRegistry,
} from './DebugModeRegistry.js';
export type { ComponentStatus } from './DebugModeRegistry.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LoggingConfiguration, TimestampFormat } from './config.js';
export { ConsoleTransport, FileTransport, formatClassicTimestamp } from './transports.js';
export type { LogTransport, OutputFormat } from './transports.js';
