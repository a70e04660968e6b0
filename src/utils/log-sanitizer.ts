/**
 * Log sanitization utilities
 *
 * Serializers that keep connection strings, credentials and oversized
 * cache keys out of log lines.
 */

/**
 * Truncate a string for safe logging
 *
 * @param maxLength - Maximum length (default 100)
 */
export function truncate(value: string | null | undefined, maxLength: number = 100): string | null {
  if (value === null || value === undefined || typeof value !== 'string') {
    return null;
  }

  if (value.length <= maxLength) {
    return value;
  }

  return `${value.slice(0, maxLength)}...[truncated]`;
}

// Patterns that might contain sensitive data
const SENSITIVE_PATTERNS: RegExp[] = [
  // Connection strings
  /redis:\/\/[^\s]+/gi,
  /rediss:\/\/[^\s]+/gi,
  /postgres:\/\/[^\s]+/gi,
  /mongodb:\/\/[^\s]+/gi,
  // API keys and tokens
  /Bearer\s+[A-Za-z0-9\-._~+/]+=*/gi,
  /api[_-]?key[=:]\s*[^\s]+/gi,
  // File paths
  /\/home\/[^\s]+/g,
  /\/Users\/[^\s]+/g,
];

/**
 * Redact sensitive content from an error message and cap its length
 */
export function sanitizeErrorMessage(message: string): string {
  if (!message) {
    return 'Unknown error';
  }

  let sanitized = message;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }

  return truncate(sanitized, 500) ?? 'Unknown error';
}

/**
 * Sanitize an error for safe logging
 *
 * Keeps name, message, code and the cause chain (one level deep).
 * Stack traces are included only in development.
 */
export function sanitizeError(error: unknown): Record<string, unknown> | null {
  if (!error) {
    return null;
  }

  if (error instanceof Error) {
    const sanitized: Record<string, unknown> = {
      name: error.name,
      message: sanitizeErrorMessage(error.message),
    };

    if ('code' in error && typeof error.code === 'string') {
      sanitized['code'] = error.code;
    }

    if (error.cause instanceof Error) {
      sanitized['cause'] = {
        name: error.cause.name,
        message: sanitizeErrorMessage(error.cause.message),
      };
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      sanitized['stack'] = error.stack.split('\n').slice(0, 10).join('\n');
    }

    return sanitized;
  }

  if (typeof error === 'string') {
    return { message: sanitizeErrorMessage(error) };
  }

  return { type: typeof error };
}

/**
 * Pino serializers for log sanitization
 *
 * Usage in pino configuration:
 * ```typescript
 * const logger = pino({ serializers: logSerializers });
 * ```
 */
export const logSerializers = {
  error: (err: unknown): Record<string, unknown> | null => sanitizeError(err),
  err: (err: unknown): Record<string, unknown> | null => sanitizeError(err),

  // Keys are caller-defined and may be arbitrarily long
  key: (key: string | null | undefined): string | null => truncate(key, 200),

  // Raw payloads from Redis
  payload: (p: unknown): unknown => {
    if (typeof p === 'string') {
      return truncate(p, 200);
    }
    if (p && typeof p === 'object') {
      return '[object]';
    }
    return p;
  },
};
