export {
  eventOptionsSchema,
  logOptionsSchema,
  logMessageSchema,
  logTypeSchema,
  formatIssues,
} from './event-schema.js';
export type { EventOptions, LogOptions } from './event-schema.js';
export { createExceptionEvent, createLogEvent, describeError } from './event-factory.js';
export type { ErrorDescription } from './event-factory.js';
export { firstStackLocation } from './stack-frame.js';
export type { StackLocation } from './stack-frame.js';
export { clientConfigSchema, DEFAULT_ENDPOINT, MAX_TIMER_MS } from './config-schema.js';
export type { ClientConfig, ClientConfigInput } from './config-schema.js';
