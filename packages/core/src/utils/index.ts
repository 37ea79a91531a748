/**
 * Utility functions
 */

export { serializeForLog, truncateString, errorToLog } from './logging.js';
