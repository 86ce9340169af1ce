/**
 * Log sanitization helpers
 *
 * Rules:
 * - Never mutates the original object (returns a sanitized copy)
 * - Drops secret-bearing fields (case-insensitive)
 * - Masks Slack tokens found inside strings
 */

const SENSITIVE_FIELDS = new Set([
  'token',
  'accesstoken',
  'access_token',
  'bottoken',
  'bot_token',
  'authorization',
  'cookie',
  'secret',
  'signingsecret',
  'signing_secret',
  'signature',
  'password',
  'apikey',
  'api_key',
  'clientsecret',
  'client_secret',
]);

const SLACK_TOKEN_PATTERN = /\bxox[abposr]-[A-Za-z0-9-]+/g;

function isSensitiveField(key: string): boolean {
  const lowerKey = key.toLowerCase();
  if (SENSITIVE_FIELDS.has(lowerKey)) {
    return true;
  }
  return lowerKey.endsWith('_token') || lowerKey.endsWith('password');
}

export function maskSecretsInString(value: string): string {
  return value.replace(SLACK_TOKEN_PATTERN, (match) => `${match.slice(0, 5)}***`);
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return maskSecretsInString(value);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (value instanceof Error) {
    return { name: value.name, message: maskSecretsInString(value.message) };
  }
  if (value && typeof value === 'object' && !(value instanceof Date)) {
    return sanitizeForLogs(value);
  }
  return value;
}

export function sanitizeForLogs(obj: object): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveField(key)) {
      continue;
    }
    sanitized[key] = sanitizeValue(value);
  }

  return sanitized;
}
