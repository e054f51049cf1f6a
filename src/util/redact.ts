/**
 * Redaction utilities for logs. Masks passenger details (names, dates of
 * birth, emails) in strings and in structured log arguments.
 * Redaction is disabled when LOG_LEVEL=debug to aid local debugging.
 */

const SENSITIVE_KEYS = new Set([
  'firstname',
  'first_name',
  'lastname',
  'last_name',
  'dob',
  'dateofbirth',
  'email',
  'passengers',
]);

function scrubString(input: string): string {
  let out = input;
  out = out.replace(/[\w.+-]+@[\w-]+\.[\w.-]+/g, '[REDACTED_EMAIL]');
  // "born 1990-04-02" / "dob: 1990-04-02"
  out = out.replace(
    /\b(born(?:\s+on)?|dob:?|date of birth:?)\s*\d{4}-\d{2}-\d{2}\b/gi,
    '$1 [REDACTED_DOB]',
  );
  // "my name is Jane Doe", "passenger Jane Doe"
  out = out.replace(
    /\b(name is|passenger:?)\s+[A-Z][a-zA-Z'-]*(\s+[A-Z][a-zA-Z'-]*)*/g,
    '$1 [REDACTED_NAME]',
  );
  return out;
}

function scrubDeep(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === 'string') return scrubString(value);
  if (typeof value !== 'object' || value === null) return value;
  if (seen.has(value)) return value;
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((v) => scrubDeep(v, seen));
  }
  if (value instanceof Error) return value;
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = SENSITIVE_KEYS.has(k.toLowerCase()) ? '[REDACTED]' : scrubDeep(v, seen);
  }
  return out;
}

/**
 * Scrub PII-like patterns from a log argument.
 */
export function scrubPII(arg: unknown, enabled: boolean): unknown {
  if (!enabled) return arg;
  return scrubDeep(arg);
}

export function scrubMessage(msg: string, enabled: boolean): string {
  return enabled ? scrubString(msg) : msg;
}
