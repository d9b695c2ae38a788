/**
 * huntglitch-node: forwards captured exceptions and log messages to the
 * HuntGlitch collector.
 *
 * @example
 * import { createHuntGlitchLogger } from 'huntglitch-node';
 *
 * // Reads PROJECT_KEY / DELIVERABLE_KEY from the environment or .env files.
 * const huntglitch = createHuntGlitchLogger({ overrides: { retries: 2 } });
 *
 * await huntglitch.sendLog('Login attempt failed', 'warning', {
 *   additional_data: { attempt_count: 3 },
 * });
 */

export {
  HuntGlitchLogger,
  createHuntGlitchLogger,
  withErrorReporting,
  runWithErrorReporting,
  reportError,
  errorReportingPlugin,
} from './interfaces/index.js';
export type {
  HuntGlitchLoggerOptions,
  ErrorReporter,
  ReportingContext,
  ErrorReportingPluginOptions,
} from './interfaces/index.js';

export {
  DeliveryClient,
  createFetchTransport,
  resolveClientConfig,
  loadClientConfig,
  defaultConfigPaths,
  ENV_KEYS,
  encodeEvent,
} from './infrastructure/index.js';
export type {
  DeliveryClientDeps,
  Transport,
  TransportRequest,
  TransportResponse,
  WirePayload,
  ConfigResolution,
  ResolveConfigOptions,
} from './infrastructure/index.js';

export { createExceptionEvent, createLogEvent, clientConfigSchema, DEFAULT_ENDPOINT } from './application/index.js';
export type { ClientConfig, ClientConfigInput, EventOptions, LogOptions } from './application/index.js';

export {
  HuntGlitchError,
  ConfigurationError,
  TransientDeliveryError,
  RejectedDeliveryError,
  ExhaustedRetriesError,
  LOG_TYPE_NAMES,
  LOG_TYPE_CODES,
} from './domain/index.js';
export type {
  Event,
  ExceptionEvent,
  LogEvent,
  EventKind,
  LogType,
  LogTypeName,
  DeliveryResult,
  DeliveryError,
  AdditionalData,
  EventTags,
} from './domain/index.js';
