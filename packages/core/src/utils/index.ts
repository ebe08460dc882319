/**
 * Utility functions for transports and the request chain
 */

export {
  createConsoleLogger,
  truncateString,
  sanitizeHeadersForLog,
  describeBodyForLog,
  errorToLog,
} from './logging.js';
