/**
 * webdriver-session-plan
 *
 * Builds W3C WebDriver new-session requests from browser option sets.
 */

export * from './capabilities/index.js';
export * from './options/index.js';
export * from './driver-service/index.js';
export * from './session/index.js';
export * from './config/session-config.js';
export * from './shared/errors/index.js';
export {
  LoggingService,
  createLogger,
  getLogger,
  setLogger,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type Logger,
  type LogWriter,
} from './shared/services/logging.service.js';
