export { HuntGlitchLogger, createHuntGlitchLogger } from './huntglitch-logger.js';
export type { HuntGlitchLoggerOptions } from './huntglitch-logger.js';
export { withErrorReporting, runWithErrorReporting, reportError } from './reporting.js';
export type { ErrorReporter, ReportingContext } from './reporting.js';
export { errorReportingPlugin } from './http/index.js';
export type { ErrorReportingPluginOptions } from './http/index.js';
