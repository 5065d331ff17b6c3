/**
 * Masking helpers so conversation content (emails, phone numbers, keys)
 * never reaches the logs verbatim.
 */

// Patterns to detect sensitive data
const SENSITIVE_PATTERNS = {
  apiKey: /(?:api[_-]?key|apikey|access[_-]?token|secret[_-]?key)\s*[:=]\s*['"]?([a-zA-Z0-9_\-]{20,})['"]?/gi,
  jwt: /eyJ[A-Za-z0-9-_=]+\.eyJ[A-Za-z0-9-_=]+\.?[A-Za-z0-9-_.+/=]*/g,
  email: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  creditCard: /\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/g,
  phone: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g,
};

export const MAX_INPUT_LENGTH = 10000;

/**
 * Mask sensitive data in strings
 * @param maskChar - Character to use for masking (default: '*')
 */
export function maskSensitiveData(text: string, maskChar: string = '*'): string {
  let sanitized = text;

  sanitized = sanitized.replace(SENSITIVE_PATTERNS.apiKey, (match: string, key: string) =>
    match.replace(key, maskChar.repeat(key.length))
  );

  sanitized = sanitized.replace(SENSITIVE_PATTERNS.jwt, () => `JWT_${maskChar.repeat(20)}`);

  // Mask email addresses (keep domain visible)
  sanitized = sanitized.replace(SENSITIVE_PATTERNS.email, (match: string) => {
    const [local, domain] = match.split('@');
    return `${maskChar.repeat(Math.min(local.length, 3))}***@${domain}`;
  });

  sanitized = sanitized.replace(SENSITIVE_PATTERNS.creditCard, () => maskChar.repeat(16));
  sanitized = sanitized.replace(SENSITIVE_PATTERNS.phone, () => maskChar.repeat(10));

  return sanitized;
}

/**
 * Strip control characters other than line breaks and trim. Length is
 * enforced where input enters (see MAX_INPUT_LENGTH), never by cutting.
 */
export function sanitizeInput(input: string): string {
  return input.replace(/[\x00-\x09\x0B-\x1F\x7F]/g, '').trim();
}

/**
 * A short masked preview of user text, safe to log.
 */
export function previewForLog(text: string, length: number = 100): string {
  return maskSensitiveData(text.substring(0, length));
}
