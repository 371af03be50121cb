/**
 * Sensitive Data Redaction
 *
 * Field-name and value-pattern redaction applied to every log entry's metadata,
 * so credentials presented by clients (API keys, Basic pairs, bearer tokens)
 * never reach log output in clear text.
 */

// Patterns for detecting sensitive fields (by key name)
const SENSITIVE_FIELD_PATTERNS: readonly RegExp[] = [
  /^password$/i,
  /^passwd$/i,
  /^pwd$/i,
  /^secret$/i,
  /^token$/i,
  /^api[_-]?key$/i,
  /^apikey$/i,
  /^auth[_-]?token$/i,
  /^access[_-]?token$/i,
  /^refresh[_-]?token$/i,
  /^id[_-]?token$/i,
  /^private[_-]?key$/i,
  /^client[_-]?secret$/i,
  /^jwt$/i,
  /^bearer$/i,
  /^authorization$/i,
  /^cookie$/i,
  /_key$/i,
  /_secret$/i,
  /_token$/i,
  /_password$/i,
];

// Patterns for detecting sensitive values (by content)
const SENSITIVE_VALUE_PATTERNS: readonly RegExp[] = [
  /^[a-zA-Z0-9_-]+\.eyJ/,         // JWT token
  /^eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*\./, // JWT token (header first)
  /^Bearer\s+\S+/i,               // Bearer token
  /^Basic\s+[a-zA-Z0-9+/=]+$/i,   // Basic auth
  /^-----BEGIN (RSA |EC |DSA |OPENSSH )?PRIVATE KEY-----/, // PEM keys
];

/**
 * Check if a field name indicates sensitive data
 */
export function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some(pattern => pattern.test(fieldName));
}

/**
 * Check if a value looks like sensitive data
 */
export function isSensitiveValue(value: unknown): boolean {
  if (typeof value !== 'string') {
    return false;
  }
  return SENSITIVE_VALUE_PATTERNS.some(pattern => pattern.test(value));
}

/**
 * Mask a sensitive value, showing only first 2 and last 2 characters
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '****';
  }
  return value.substring(0, 2) + '****' + value.substring(value.length - 2);
}

/** Type for sanitized output */
export type SanitizedData =
  | string
  | number
  | boolean
  | null
  | undefined
  | SanitizedData[]
  | { [key: string]: SanitizedData };

/**
 * Recursively sanitize a value for logging.
 * Removes or masks sensitive fields and values.
 */
export function sanitizeForLogging(
  data: unknown,
  options: {
    depth?: number;
    maxDepth?: number;
    redactKeys?: string[];
  } = {}
): SanitizedData {
  const maxDepth = options.maxDepth ?? 10;
  const currentDepth = options.depth ?? 0;
  const redactKeys = options.redactKeys ?? [];

  if (currentDepth > maxDepth) {
    return '[Max Depth Exceeded]';
  }

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    if (isSensitiveValue(data)) {
      return maskValue(data);
    }
    return data;
  }

  if (typeof data === 'number' || typeof data === 'boolean') {
    return data;
  }

  if (typeof data === 'function') {
    return '[Function]';
  }

  if (typeof data === 'symbol') {
    return '[Symbol]';
  }

  if (typeof data === 'bigint') {
    return data.toString();
  }

  if (data instanceof Date) {
    return data.toISOString();
  }

  if (data instanceof Error) {
    return {
      name: data.name,
      message: sanitizeErrorMessage(data),
    };
  }

  if (data instanceof Map) {
    const sanitized: Record<string, SanitizedData> = {};
    for (const [key, value] of data.entries()) {
      const keyStr = String(key);
      sanitized[keyStr] = isSensitiveField(keyStr) || redactKeys.includes(keyStr)
        ? '[REDACTED]'
        : sanitizeForLogging(value, { ...options, depth: currentDepth + 1 });
    }
    return sanitized;
  }

  if (data instanceof Set || Array.isArray(data)) {
    return [...data].map(item =>
      sanitizeForLogging(item, { ...options, depth: currentDepth + 1 })
    );
  }

  if (typeof data !== 'object') {
    return String(data);
  }

  const sanitized: Record<string, SanitizedData> = {};
  for (const [key, value] of Object.entries(data)) {
    sanitized[key] = isSensitiveField(key) || redactKeys.includes(key)
      ? '[REDACTED]'
      : sanitizeForLogging(value, { ...options, depth: currentDepth + 1 });
  }

  return sanitized;
}

/**
 * Sanitize HTTP headers for logging.
 * Removes credential values while preserving the authorization scheme.
 */
export function sanitizeHeaders(
  headers: Record<string, unknown>,
  extraSensitive: readonly string[] = []
): Record<string, unknown> {
  const sensitiveHeaders = new Set([
    'authorization', 'proxy-authorization', 'cookie', 'set-cookie',
    'x-api-key', 'x-auth-token',
    ...extraSensitive.map(h => h.toLowerCase()),
  ]);

  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(headers)) {
    const lowerKey = key.toLowerCase();

    if (!sensitiveHeaders.has(lowerKey) && !isSensitiveField(key)) {
      sanitized[key] = value;
      continue;
    }

    const strValue = String(value);
    const scheme = /^(Bearer|Basic)\s/i.exec(strValue);
    sanitized[key] = lowerKey === 'authorization' && scheme
      ? `${scheme[1]} [REDACTED]`
      : '[REDACTED]';
  }

  return sanitized;
}

/**
 * Sanitize error message to prevent information leakage.
 * Strips JWTs, bearer/basic credentials and inline secrets from error text.
 */
export function sanitizeErrorMessage(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error';
  }

  let message: string;
  if (error instanceof Error) {
    message = error.message;
  } else if (typeof error === 'string') {
    message = error;
  } else {
    message = String(error);
  }

  const patterns = [
    { pattern: /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g, replacement: '[JWT]' },
    { pattern: /Bearer\s+[a-zA-Z0-9._~+/-]+=*/gi, replacement: 'Bearer ***' },
    { pattern: /Basic\s+[a-zA-Z0-9+/=]+/gi, replacement: 'Basic ***' },
    { pattern: /password['"]?\s*[:=]\s*['"]?[^\s'"]+/gi, replacement: 'password=***' },
    { pattern: /secret['"]?\s*[:=]\s*['"]?[^\s'"]+/gi, replacement: 'secret=***' },
  ];

  for (const { pattern, replacement } of patterns) {
    message = message.replace(pattern, replacement);
  }

  return message;
}
