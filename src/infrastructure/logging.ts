import pino, { type Logger } from 'pino';

/**
 * Diagnostic logger used when the caller does not inject one.
 *
 * Quiet by default (`warn`): the host application owns its own output and
 * only silenced delivery failures are worth surfacing.
 */
export function createDiagnosticLogger(level: string = process.env['HUNTGLITCH_LOG_LEVEL'] ?? 'warn'): Logger {
  return pino({ name: 'huntglitch', level });
}
