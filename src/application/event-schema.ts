import { z } from 'zod';
import { toLogTypeName } from '../domain/index.js';

/**
 * Zod schemas for the caller-supplied parts of an event.
 *
 * - `additional_data` is open-ended; it only has to survive JSON serialization,
 *   which is checked later by the wire encoder.
 * - `tags` are flat string labels.
 */
export const eventOptionsSchema = z.object({
  additional_data: z.record(z.string(), z.unknown()).default({}),
  tags: z.record(z.string(), z.string()).default({}),
});

/** Extra fields a manual log entry may pin explicitly. */
export const logOptionsSchema = eventOptionsSchema.extend({
  error_name: z.string().min(1).max(255).optional(),
  file_name: z.string().min(1).optional(),
  line_number: z.number().int().nonnegative().optional(),
});

export const logMessageSchema = z.string().trim().min(1, 'Log message must not be empty');

/** Accepts a severity name (case-insensitive) or its numeric wire code. */
export const logTypeSchema = z
  .union([z.string(), z.number().int()])
  .transform((value, ctx) => {
    const name = toLogTypeName(value);
    if (name === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown log type: ${String(value)}`,
      });
      return z.NEVER;
    }
    return name;
  });

export type EventOptions = z.input<typeof eventOptionsSchema>;
export type LogOptions = z.input<typeof logOptionsSchema>;

/** Flattens zod issues into "path: message" lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
