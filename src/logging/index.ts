/**
 * Logging and observability utilities.
 */

export { generateCallId } from "./call-id.js";
export {
  createLogger,
  isLogLevel,
  silentLogger,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions,
} from "./logger.js";
