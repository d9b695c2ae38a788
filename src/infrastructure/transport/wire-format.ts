import { hostname } from 'node:os';
import type { ClientConfig } from '../../application/index.js';
import {
  LOG_TYPE_CODES,
  RejectedDeliveryError,
  getErrorMessage,
  type AdditionalData,
  type Event,
  type EventKind,
  type EventTags,
} from '../../domain/index.js';

export const CLIENT_NAME = 'huntglitch-node';
export const CLIENT_VERSION = '1.0.0';

/** Where the event came from; attached to every request. */
export interface RuntimeContext {
  readonly runtime: 'node';
  readonly runtime_version: string;
  readonly platform: string;
  readonly hostname: string;
  readonly client: string;
}

/**
 * JSON body POSTed to the collector.
 *
 * `payload.log_type` travels as the numeric code (1..5), not the name.
 */
export interface WirePayload {
  readonly project_key: string;
  readonly deliverable_key: string;
  readonly kind: EventKind;
  readonly event_id: string;
  readonly timestamp: string;
  readonly payload: Readonly<Record<string, unknown>>;
  readonly additional_data: Readonly<AdditionalData>;
  readonly tags: Readonly<EventTags>;
  readonly context: RuntimeContext;
}

export function runtimeContext(): RuntimeContext {
  return {
    runtime: 'node',
    runtime_version: process.version,
    platform: process.platform,
    hostname: hostname(),
    client: `${CLIENT_NAME}/${CLIENT_VERSION}`,
  };
}

export function toWirePayload(
  config: Pick<ClientConfig, 'project_key' | 'deliverable_key'>,
  event: Event,
  context: RuntimeContext = runtimeContext(),
): WirePayload {
  return {
    project_key: config.project_key,
    deliverable_key: config.deliverable_key,
    kind: event.kind,
    event_id: event.event_id,
    timestamp: event.timestamp,
    payload: { ...event.payload, log_type: LOG_TYPE_CODES[event.payload.log_type] },
    additional_data: event.additional_data,
    tags: event.tags,
    context,
  };
}

/**
 * Serializes an event into the request body.
 *
 * `JSON.stringify` throws on circular structures and BigInt values found in
 * `additional_data`; those surface as a non-retryable rejection.
 */
export function encodeEvent(
  config: Pick<ClientConfig, 'project_key' | 'deliverable_key'>,
  event: Event,
  context?: RuntimeContext,
): string {
  try {
    return JSON.stringify(toWirePayload(config, event, context));
  } catch (err: unknown) {
    throw new RejectedDeliveryError(
      'serialization',
      `Event ${event.event_id} cannot be serialized: ${getErrorMessage(err)}`,
      { cause: err },
    );
  }
}
