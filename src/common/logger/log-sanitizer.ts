/**
 * Log Sanitizer - Redacts credentials and requester documents from log output
 */
import * as winston from 'winston';

// Sensitive keys to redact (case-insensitive, substring match)
const SENSITIVE_KEYS = [
  'password',
  'pass',
  'secret',
  'token',
  'authorization',
  'apiKey',
  'api_key',
  'cpf',
  'nationalId',
];

const REDACTED = '[REDACTED]';

// 000.000.000-00 or 11 bare digits
const CPF_PATTERN = /\b\d{3}\.?\d{3}\.?\d{3}-?\d{2}\b/g;

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive.toLowerCase()));
}

/**
 * Recursively sanitize a value, redacting sensitive keys and masking
 * national ID numbers embedded in free text.
 */
export function sanitizeObject(obj: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }

  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return obj.replace(CPF_PATTERN, REDACTED);
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => sanitizeObject(item, depth + 1));
  }

  if (obj instanceof Date) {
    return obj;
  }

  if (typeof obj === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      sanitized[key] = isSensitiveKey(key) ? REDACTED : sanitizeObject(value, depth + 1);
    }
    return sanitized;
  }

  return obj;
}

/**
 * Winston format transformer that sanitizes every log entry. Winston keeps
 * level and message under symbol keys too, so those are copied back.
 */
export const sanitizeFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = key === 'level' ? info[key] : sanitizeObject(info[key]);
  }
  return info;
});
