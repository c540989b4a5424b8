/**
 * Utility exports
 */

// Formatting utilities
export { formatBytes, formatDuration } from "./format";
export type { LogLevel } from "./logger";
// Logger
export { debug, error, getLogLevel, info, isLogLevel, logger, setLogLevel, warn } from "./logger";
// Naming utilities
export { generateArchiveName, safeTimestamp } from "./naming";
