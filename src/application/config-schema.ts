import { z } from 'zod';

export const DEFAULT_ENDPOINT = 'https://lighthouse.huntglitch.com/api/v1/logs';

/**
 * Accepts real booleans and the usual env spellings.
 * `z.coerce.boolean()` would turn the string "false" into true.
 */
const envBoolean = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .transform((value) => value === 'true' || value === '1' || value === 'yes'),
]);

/** Largest delay `setTimeout` honours; anything above fires after 1 ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Zod schema for the client configuration.
 *
 * Numeric fields coerce so values straight from `process.env` validate;
 * an empty env value counts as absent and falls back to the default.
 */
export const clientConfigSchema = z.object({
  project_key: z
    .string({ required_error: 'Required (set PROJECT_KEY)' })
    .trim()
    .min(1, 'Must not be empty'),
  deliverable_key: z
    .string({ required_error: 'Required (set DELIVERABLE_KEY)' })
    .trim()
    .min(1, 'Must not be empty'),
  endpoint: z.string().url().default(DEFAULT_ENDPOINT),
  silent_failures: envBoolean.default(true),
  retries: z.coerce.number().int().nonnegative().default(3),
  timeout_ms: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(10_000),
  retry_delay_ms: z.coerce.number().int().nonnegative().max(MAX_TIMER_MS).default(500),
  max_retry_delay_ms: z.coerce.number().int().nonnegative().max(MAX_TIMER_MS).default(5_000),
});

/** Configuration as a caller passes it in code, before defaults apply. */
export type ClientConfigInput = z.input<typeof clientConfigSchema>;

/** Validated configuration; frozen once built. */
export type ClientConfig = Readonly<z.output<typeof clientConfigSchema>>;
