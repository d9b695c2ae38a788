export type {
  Event,
  EventKind,
  ExceptionEvent,
  LogEvent,
  ExceptionPayload,
  LogPayload,
  AdditionalData,
  EventTags,
} from './event.js';
export { LOG_TYPE_NAMES, LOG_TYPE_CODES, isLogTypeName, toLogTypeName } from './log-type.js';
export type { LogType, LogTypeName } from './log-type.js';
export {
  HuntGlitchError,
  ConfigurationError,
  TransientDeliveryError,
  RejectedDeliveryError,
  ExhaustedRetriesError,
  getErrorMessage,
} from './errors.js';
export type {
  HuntGlitchErrorCode,
  TransientReason,
  RejectionReason,
  DeliveryError,
} from './errors.js';
export type { DeliveryResult, DeliveryState } from './delivery.js';
