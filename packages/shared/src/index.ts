/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  newDocumentContext,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Metrics
export {
  register,
  linesClassifiedCounter,
  recordsExtractedCounter,
  scansCounter,
  scanDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export { validateRosterDocument, isValidRosterDocument, type ValidationResult } from './schemas';

// Roster extraction engine
export * from './roster';
