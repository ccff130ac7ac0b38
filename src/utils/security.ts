/**
 * Helpers for keeping credentials out of logs and bounding user input
 */

import { logger } from '../core/logger';

const MAX_INPUT_LENGTH = 1000;

// Patterns to detect sensitive data
const SENSITIVE_PATTERNS = {
  // Airtable personal access tokens
  airtableToken: /\bpat[A-Za-z0-9]{10,}(?:\.[A-Za-z0-9]+)?\b/g,
  // Bearer headers
  bearer: /Bearer\s+[A-Za-z0-9._\-]+/gi,
  // MongoDB URIs
  mongoUri: /mongodb(?:\+srv)?:\/\/[^\s"'<>]+/gi,
};

const SENSITIVE_FIELDS = new Set(['apiKey', 'token', 'authorization', 'password', 'uri']);

/**
 * Mask sensitive data in strings
 */
export function maskSensitiveData(text: string, maskChar: string = '*'): string {
  if (!text) {
    return text;
  }

  return text
    .replace(SENSITIVE_PATTERNS.airtableToken, () => `pat${maskChar.repeat(12)}`)
    .replace(SENSITIVE_PATTERNS.bearer, () => `Bearer ${maskChar.repeat(12)}`)
    .replace(SENSITIVE_PATTERNS.mongoUri, match => `${match.split('://')[0]}://${maskChar.repeat(20)}`);
}

export function sanitizeForLogging(data: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (SENSITIVE_FIELDS.has(key)) {
      sanitized[key] = '[REDACTED]';
    } else if (typeof value === 'string') {
      sanitized[key] = maskSensitiveData(value);
    } else {
      sanitized[key] = value;
    }
  }
  return sanitized;
}

/**
 * Strips control characters and bounds the length of chat input
 */
export function validateInput(input: string): string {
  let sanitized = input.replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g, '').trim();

  if (sanitized.length > MAX_INPUT_LENGTH) {
    secureLog({
      message: 'Input truncated due to length',
      originalLength: input.length,
      maxLength: MAX_INPUT_LENGTH,
    }, 'warn');
    sanitized = sanitized.substring(0, MAX_INPUT_LENGTH);
  }

  return sanitized;
}

export function secureLog(
  data: Record<string, unknown> & { message: string },
  level: 'info' | 'warn' | 'error' | 'debug' = 'info'
): void {
  const { message, ...meta } = data;
  logger.log(level, maskSensitiveData(message), sanitizeForLogging(meta));
}
