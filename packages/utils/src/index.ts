/**
 * @clicksynth/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Type guards
 * - Logger
 */

// Command execution
export { executeCommand, type CommandResult, type CommandOptions } from './command.js';

// File operations
export { ensureDir, safeWriteFile, isDirectory, listFiles } from './file.js';

// Path utilities
export { getExtension, getBasename } from './path.js';

// Type guards
export { isObject } from './guards.js';

// Time utilities
export { formatDuration, formatTimecode } from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
