const SECRET_KEY_PATTERN = /(token|secret|password|api[_-]?key|authorization|cookie|credential)/i;
const PARTICIPANT_KEY_PATTERN = /^(passengerDetails|guestDetails|driverDetails|participants)$/;

const MAX_DEPTH = 6;

function redactUnknown(value: unknown, key: string | undefined, depth: number): unknown {
  if (depth > MAX_DEPTH) return '[TRUNCATED]';
  if (value === null || value === undefined) return value;

  if (key && SECRET_KEY_PATTERN.test(key)) {
    return '[REDACTED]';
  }

  if (key && PARTICIPANT_KEY_PATTERN.test(key)) {
    const count = Array.isArray(value) ? value.length : 1;
    return `[REDACTED_PARTICIPANTS count=${count}]`;
  }

  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: process.env.NODE_ENV === 'development' ? value.stack : undefined,
    };
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactUnknown(item, undefined, depth + 1));
  }

  if (value instanceof Map) {
    return redactUnknown(Object.fromEntries(value), key, depth);
  }

  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      result[childKey] = redactUnknown(childValue, childKey, depth + 1);
    }
    return result;
  }

  return String(value);
}

/**
 * Mask credentials and traveller details before a record leaves the process.
 * Top-level keys of `data` are checked the same way as nested ones.
 */
export function redactSecrets(data: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    result[key] = redactUnknown(value, key, 0);
  }
  return result;
}

export function safeSnippet(value: string, maxLength = 140): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, maxLength)}...(truncated)`;
}
