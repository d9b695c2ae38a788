import type { Logger } from 'pino';
import {
  createExceptionEvent,
  createLogEvent,
  type ClientConfig,
  type EventOptions,
  type LogOptions,
} from '../application/index.js';
import {
  RejectedDeliveryError,
  type DeliveryResult,
  type Event,
  type LogType,
} from '../domain/index.js';
import {
  DeliveryClient,
  createDiagnosticLogger,
  loadClientConfig,
  type ResolveConfigOptions,
  type Transport,
} from '../infrastructure/index.js';

interface LoggerDependencies {
  transport?: Transport;
  log?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Either a pre-resolved `config`, or the loader inputs (`overrides`, `env`,
 * `paths`); the two cannot be combined.
 */
export type HuntGlitchLoggerOptions = LoggerDependencies &
  (
    | (ResolveConfigOptions & { config?: undefined })
    | { config: ClientConfig; overrides?: never; env?: never; paths?: never }
  );

/**
 * Public entry point: turns exceptions and messages into events and hands
 * them to the delivery client.
 *
 * Create one at startup with {@link createHuntGlitchLogger} and pass it to
 * the code that reports errors; there is no process-wide default instance.
 */
export class HuntGlitchLogger {
  readonly config: ClientConfig;
  /** Local diagnostics channel (pino); never part of the delivery contract. */
  readonly diagnostics: Logger;
  private readonly client: DeliveryClient;

  constructor(config: ClientConfig, client: DeliveryClient, diagnostics: Logger) {
    this.config = config;
    this.client = client;
    this.diagnostics = diagnostics;
  }

  /**
   * Reports a caught error.
   *
   * @example
   * try {
   *   await chargeCard(order);
   * } catch (err) {
   *   await huntglitch.captureException(err, {
   *     additional_data: { order_id: order.id },
   *     tags: { feature: 'payments' },
   *   });
   * }
   */
  captureException(error: unknown, options: EventOptions = {}): Promise<DeliveryResult> {
    return this.deliver(() => createExceptionEvent(error, options));
  }

  /** Reports a message with a severity name (`'warning'`) or code (`2`). */
  sendLog(message: string, logType: LogType, options: LogOptions = {}): Promise<DeliveryResult> {
    return this.deliver(() => createLogEvent(message, logType, options));
  }

  private async deliver(build: () => Event): Promise<DeliveryResult> {
    let event: Event;
    try {
      event = build();
    } catch (err: unknown) {
      if (err instanceof RejectedDeliveryError) return this.client.settleEarlyFailure(err);
      throw err;
    }
    return this.client.send(event);
  }
}

/**
 * Builds a logger from explicit options, the environment and `.env` files.
 *
 * @throws ConfigurationError when either key is missing or a setting is invalid.
 */
export function createHuntGlitchLogger(options: HuntGlitchLoggerOptions = {}): HuntGlitchLogger {
  const config =
    options.config ??
    loadClientConfig({ overrides: options.overrides, env: options.env, paths: options.paths });
  const log = options.log ?? createDiagnosticLogger();
  const client = new DeliveryClient(config, {
    transport: options.transport,
    log,
    sleep: options.sleep,
  });
  return new HuntGlitchLogger(config, client, log);
}
