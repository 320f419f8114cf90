const REDACT_KEYS = new Set([
  'password',
  'token',
  'authorization',
  'apikey',
  'api_key',
  'x-api-key',
  'secret',
  'cookie',
  'set-cookie',
  'credentials',
]);

export function shouldRedact(key: string): boolean {
  return REDACT_KEYS.has(key.toLowerCase());
}

export function deepRedact(value: unknown): unknown {
  if (value == null) return value;
  if (Array.isArray(value)) return value.map((v) => deepRedact(v));
  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, v] of Object.entries(value)) {
      result[key] = shouldRedact(key) ? '[REDACTED]' : deepRedact(v);
    }
    return result;
  }
  return value;
}

/** Masks `apiKey=...` style query parameters inside URLs and messages. */
export function redactUrl(text: string): string {
  return text.replace(/([?&](?:apiKey|api_key|key|token)=)[^&\s]+/gi, '$1[REDACTED]');
}
