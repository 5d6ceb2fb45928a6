// client_secret, access_token, Authorization, ...
const SENSITIVE_KEY = /secret|token|authorization/i;
const MAX_DEPTH = 5;

/** Keeps the last four characters of long secrets. */
export function maskSecret(secret: string): string {
  return secret.length > 8 ? `****${secret.slice(-4)}` : '[masked]';
}

/** Copy of the value safe for log output. */
export function maskSensitive(value: unknown, depth = 0): unknown {
  if (depth >= MAX_DEPTH) return '[truncated]';
  if (Array.isArray(value)) return value.map((item) => maskSensitive(item, depth + 1));
  if (typeof value !== 'object' || value === null) return value;

  return Object.fromEntries(
    Object.entries(value).map(([key, field]) => [
      key,
      SENSITIVE_KEY.test(key)
        ? typeof field === 'string'
          ? maskSecret(field)
          : '[masked]'
        : maskSensitive(field, depth + 1),
    ]),
  );
}
