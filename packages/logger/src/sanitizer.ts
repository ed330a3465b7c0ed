/**
 * @wp-promote/logger - Sensitive Data Sanitizer
 * Masks sensitive fields in log output
 */

export const SENSITIVE_KEYS = [
  'password',
  'secret',
  'token',
  'authorization',
  'auth_key',
  'salt',
  'private_key',
] as const;

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some(k => lowerKey.includes(k));
}

/**
 * Mask a single keyed value.
 * Partially reveals long values (first 4 and last 4 chars).
 */
export function maskEntry(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    if (typeof value === 'string' && value.length > 8) {
      return `${value.slice(0, 4)}****${value.slice(-4)}`;
    }
    return '****';
  }
  return maskSensitiveData(value);
}

/**
 * Recursively mask sensitive data in objects.
 */
export function maskSensitiveData(obj: unknown): unknown {
  if (!obj || typeof obj !== 'object') return obj;

  if (Array.isArray(obj)) {
    return obj.map(maskSensitiveData);
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    masked[key] = maskEntry(key, value);
  }
  return masked;
}
