import type { AdditionalData, EventTags } from '../domain/index.js';
import type { HuntGlitchLogger } from './huntglitch-logger.js';

/** The part of the logger the helpers need; easy to fake in tests. */
export type ErrorReporter = Pick<HuntGlitchLogger, 'captureException' | 'diagnostics'>;

export interface ReportingContext {
  additional_data?: AdditionalData;
  tags?: EventTags;
  /** Attach a truncated rendering of the call arguments. */
  include_arguments?: boolean;
}

const MAX_ARGUMENTS_LENGTH = 500;

function summarizeArguments(args: readonly unknown[]): string {
  let text: string;
  try {
    text = JSON.stringify(args);
  } catch {
    text = args.map((arg) => String(arg)).join(', ');
  }
  return text.length > MAX_ARGUMENTS_LENGTH ? text.slice(0, MAX_ARGUMENTS_LENGTH) : text;
}

/**
 * Reports an error and resolves either way.
 *
 * With `silent_failures` off `captureException` rejects; that failure is
 * logged locally so it can never replace the error being reported.
 */
export async function reportError(
  reporter: ErrorReporter,
  error: unknown,
  additional_data: AdditionalData,
  tags: EventTags = {},
): Promise<void> {
  try {
    await reporter.captureException(error, { additional_data, tags });
  } catch (reportErr: unknown) {
    reporter.diagnostics.warn({ err: reportErr }, 'Failed to report error to HuntGlitch');
  }
}

/**
 * Wraps a function so any error it throws (or rejects with) is reported,
 * then re-thrown unchanged.
 */
export function withErrorReporting<Args extends unknown[], R>(
  reporter: ErrorReporter,
  fn: (...args: Args) => R | Promise<R>,
  context: ReportingContext = {},
): (...args: Args) => Promise<R> {
  const functionName = fn.name || 'anonymous';

  return async (...args: Args): Promise<R> => {
    try {
      return await fn(...args);
    } catch (err: unknown) {
      const data: AdditionalData = { function_name: functionName, ...context.additional_data };
      if (context.include_arguments) data['arguments'] = summarizeArguments(args);
      await reportError(reporter, err, data, context.tags);
      throw err;
    }
  };
}

/**
 * Runs one named operation; a failure is reported with the operation name
 * and `extra` as additional data, then re-thrown.
 */
export async function runWithErrorReporting<R>(
  reporter: ErrorReporter,
  operation: string,
  run: () => R | Promise<R>,
  extra: AdditionalData = {},
): Promise<R> {
  try {
    return await run();
  } catch (err: unknown) {
    await reportError(reporter, err, { operation, ...extra });
    throw err;
  }
}
