/** Severity names accepted by the collector. */
export const LOG_TYPE_NAMES = ['debug', 'warning', 'notice', 'info', 'error'] as const;

export type LogTypeName = (typeof LOG_TYPE_NAMES)[number];

/** Numeric code sent on the wire for each severity. */
export const LOG_TYPE_CODES: Readonly<Record<LogTypeName, number>> = {
  debug: 1,
  warning: 2,
  notice: 3,
  info: 4,
  error: 5,
};

/**
 * Callers may pass either the name or its numeric code. Other strings are
 * allowed by the type (and rejected at runtime) so editors still suggest
 * the known names.
 */
export type LogType = LogTypeName | number | (string & {});

export function isLogTypeName(value: unknown): value is LogTypeName {
  return typeof value === 'string' && LOG_TYPE_NAMES.some((name) => name === value);
}

/**
 * Normalizes a name or numeric code to the canonical name.
 * Returns null for anything the collector would not recognise.
 */
export function toLogTypeName(value: LogType): LogTypeName | null {
  if (typeof value === 'number') {
    return LOG_TYPE_NAMES.find((name) => LOG_TYPE_CODES[name] === value) ?? null;
  }
  const lowered = value.trim().toLowerCase();
  if (lowered === 'warn') return 'warning';
  return isLogTypeName(lowered) ? lowered : null;
}
