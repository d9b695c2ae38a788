import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import {
  RejectedDeliveryError,
  type ExceptionEvent,
  type ExceptionPayload,
  type LogEvent,
  type LogPayload,
  type LogType,
} from '../domain/index.js';
import {
  eventOptionsSchema,
  formatIssues,
  logMessageSchema,
  logOptionsSchema,
  logTypeSchema,
  type EventOptions,
  type LogOptions,
} from './event-schema.js';
import { firstStackLocation } from './stack-frame.js';

/** Name/value/stack triple extracted from whatever was thrown. */
export interface ErrorDescription {
  readonly error_name: string;
  readonly error_value: string;
  readonly stack: string | null;
}

function stringifyThrown(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    const json = JSON.stringify(value);
    if (json !== undefined) return json;
  } catch {
    // falls through to String()
  }
  return String(value);
}

/**
 * Describes a caught value without relying on anything beyond the
 * standard `Error` shape. Non-errors (`throw 'oops'`) are kept as text.
 */
export function describeError(error: unknown): ErrorDescription {
  if (error instanceof Error) {
    return {
      error_name: error.name || 'Error',
      error_value: error.message,
      stack: error.stack ?? null,
    };
  }

  return {
    error_name: 'NonErrorThrown',
    error_value: stringifyThrown(error),
    stack: null,
  };
}

function parseOrReject<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new RejectedDeliveryError('invalid_event', `Invalid ${what}: ${issues.join('; ')}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Builds an exception event from a caught value.
 *
 * @throws RejectedDeliveryError when `additional_data` or `tags` are malformed.
 */
export function createExceptionEvent(error: unknown, options: EventOptions = {}): ExceptionEvent {
  const { additional_data, tags } = parseOrReject(eventOptionsSchema, options, 'event options');
  const description = describeError(error);
  const location = firstStackLocation(description.stack);

  const payload: ExceptionPayload = {
    ...description,
    file_name: location?.file_name ?? null,
    line_number: location?.line_number ?? null,
    log_type: 'error',
  };
  const event: ExceptionEvent = {
    kind: 'exception',
    event_id: randomUUID(),
    timestamp: new Date().toISOString(),
    payload: Object.freeze(payload),
    additional_data: Object.freeze({ ...additional_data }),
    tags: Object.freeze({ ...tags }),
  };
  return Object.freeze(event);
}

/**
 * Builds a log event from a message and severity.
 *
 * @throws RejectedDeliveryError when the message is blank, the log type is
 *   unknown, or the options are malformed.
 */
export function createLogEvent(message: string, logType: LogType, options: LogOptions = {}): LogEvent {
  const text = parseOrReject(logMessageSchema, message, 'log message');
  const log_type = parseOrReject(logTypeSchema, logType, 'log type');
  const parsed = parseOrReject(logOptionsSchema, options, 'log options');

  const payload: LogPayload = {
    message: text,
    log_type,
    error_name: parsed.error_name ?? null,
    file_name: parsed.file_name ?? null,
    line_number: parsed.line_number ?? null,
  };
  const event: LogEvent = {
    kind: 'log',
    event_id: randomUUID(),
    timestamp: new Date().toISOString(),
    payload: Object.freeze(payload),
    additional_data: Object.freeze({ ...parsed.additional_data }),
    tags: Object.freeze({ ...parsed.tags }),
  };
  return Object.freeze(event);
}
