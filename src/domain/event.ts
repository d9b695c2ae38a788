/**
 * Core domain types for the HuntGlitch event model.
 *
 * These types define the canonical shape of an event between the
 * moment it is captured and the moment it is handed to the transport.
 * They carry no framework dependencies.
 */

import type { LogTypeName } from './log-type.js';

/** Free-form key/value data attached to an event by the caller. */
export type AdditionalData = Record<string, unknown>;

/** Flat string labels used for filtering on the collector side. */
export type EventTags = Record<string, string>;

/** Event discriminator. */
export type EventKind = 'exception' | 'log';

/** Serializable representation of a caught error. */
export interface ExceptionPayload {
  readonly error_name: string;
  readonly error_value: string;
  readonly stack: string | null;
  readonly file_name: string | null;
  readonly line_number: number | null;
  readonly log_type: LogTypeName;
}

/** A message recorded on purpose, without an underlying error. */
export interface LogPayload {
  readonly message: string;
  readonly log_type: LogTypeName;
  readonly error_name: string | null;
  readonly file_name: string | null;
  readonly line_number: number | null;
}

interface EventBase {
  readonly event_id: string;
  readonly timestamp: string; // ISO-8601
  readonly additional_data: Readonly<AdditionalData>;
  readonly tags: Readonly<EventTags>;
}

export interface ExceptionEvent extends EventBase {
  readonly kind: 'exception';
  readonly payload: ExceptionPayload;
}

export interface LogEvent extends EventBase {
  readonly kind: 'log';
  readonly payload: LogPayload;
}

/**
 * Canonical Event entity.
 *
 * Frozen by the factory that builds it; nothing downstream mutates it.
 */
export type Event = ExceptionEvent | LogEvent;
