const SENSITIVE_KEY_FRAGMENTS = ['authorization', 'cookie', 'token', 'secret', 'password', 'apikey', 'api_key', 'session'];

const REDACTED = '[REDACTED]';
const MAX_DEPTH = 12;

const normalizeKey = (key: string) => key.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

type KeyPredicate = (key: string) => boolean;

const createKeyPredicate = (extraSensitiveKeys: readonly string[]): KeyPredicate => {
  const extra = new Set(extraSensitiveKeys.map(normalizeKey).filter(key => key.length > 0));
  return key => {
    const normalized = normalizeKey(key);
    return extra.has(normalized) || SENSITIVE_KEY_FRAGMENTS.some(fragment => normalized.includes(fragment));
  };
};

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null;

/**
 * Header fields and path captures travel as `{name, value}` / `{key, value}`
 * pairs; the pair's name decides whether its value is shown.
 */
const pairName = (value: Record<string, unknown>): string | undefined => {
  const keys = Object.keys(value);
  if (keys.length !== 2 || !('value' in value)) {
    return undefined;
  }

  if (typeof value.name === 'string') {
    return value.name;
  }

  return typeof value.key === 'string' ? value.key : undefined;
};

/** Error fields worth keeping in a log line: name, message, string or numeric code, status, stack and cause. */
export const describeError = (error: unknown): Record<string, unknown> => {
  if (!(error instanceof Error)) {
    return {name: 'NonError', message: typeof error === 'string' ? error : Object.prototype.toString.call(error)};
  }

  const described: Record<string, unknown> = {name: error.name, message: error.message};
  if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
    described.code = error.code;
  }

  if ('status' in error && typeof error.status === 'number') {
    described.status = error.status;
  }

  if (error.stack) {
    described.stack = error.stack;
  }

  if (error.cause !== undefined) {
    described.cause = describeError(error.cause);
  }

  return described;
};

const createSanitizer = (isSensitive: KeyPredicate) => {
  const seen = new WeakSet<object>();

  const sanitize = (value: unknown, depth: number): unknown => {
    switch (typeof value) {
      case 'string':
      case 'number':
      case 'boolean':
      case 'undefined':
        return value;
      case 'bigint':
      case 'symbol':
        return value.toString();
      case 'function':
        return '[FUNCTION]';
      case 'object':
        break;
    }

    if (value === null) {
      return null;
    }

    if (depth > MAX_DEPTH) {
      return '[TRUNCATED]';
    }

    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? '[INVALID_DATE]' : value.toISOString();
    }

    if (value instanceof Error) {
      return describeError(value);
    }

    if (value instanceof Uint8Array) {
      return `[BUFFER ${value.byteLength} bytes]`;
    }

    if (seen.has(value)) {
      return '[CIRCULAR]';
    }

    seen.add(value);

    if (value instanceof Map) {
      return sanitize(Object.fromEntries(value), depth);
    }

    if (Array.isArray(value)) {
      return value.map(item => sanitize(item, depth + 1));
    }

    if (!isRecord(value)) {
      return Object.prototype.toString.call(value);
    }

    const name = pairName(value);
    if (name !== undefined && isSensitive(name)) {
      return {...value, value: REDACTED};
    }

    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, isSensitive(key) ? REDACTED : sanitize(entry, depth + 1)])
    );
  };

  return sanitize;
};

/** JSON-safe copy of `value` with sensitive keys and header or capture values replaced. */
export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: readonly string[];
}): unknown => createSanitizer(createKeyPredicate(extraSensitiveKeys))(value, 0);
