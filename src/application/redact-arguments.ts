/** Key fragments whose values never reach the audit log (case-insensitive). */
const SENSITIVE_KEYS = [
  'password',
  'secret',
  'token',
  'api_key',
  'apikey',
  'authorization',
  'credential',
];

export const REDACTED = '[REDACTED]';

function isSensitive(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((fragment) => lower.includes(fragment));
}

/**
 * Copies `value`, replacing values under sensitive keys with `[REDACTED]`.
 * Recurses into arrays and plain objects; repeated references become `[CIRCULAR]`.
 */
export function redactArguments(value: unknown, visited: WeakSet<object> = new WeakSet()): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (visited.has(value)) {
    return '[CIRCULAR]';
  }
  visited.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redactArguments(item, visited));
  }

  const result: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    result[key] = isSensitive(key) ? REDACTED : redactArguments(inner, visited);
  }
  return result;
}
