/**
 * Secret and PII redaction for log output.
 */

const REDACTED = "[REDACTED]";

/**
 * Keys whose values are always redacted (matched case-insensitively).
 */
const SENSITIVE_KEYS: ReadonlySet<string> = new Set([
  "password",
  "secret",
  "token",
  "apikey",
  "api_key",
  "openaiapikey",
  "cohereapikey",
  "secretkey",
  "langfusesecretkey",
  "authorization",
  "cookie",
]);

const EMAIL_PATTERN = "[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\\.[a-zA-Z]{2,}";

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Redact a single key/value pair.
 *
 * Sensitive keys lose their whole value; e-mail addresses inside string values
 * (queries, document titles) are replaced in place.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }

  if (typeof value === "string") {
    return value.replace(new RegExp(EMAIL_PATTERN, "g"), REDACTED);
  }

  return value;
}

/**
 * Apply {@link redactValue} to every top-level field of a log record.
 */
export function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]) => [key, redactValue(key, value)]),
  );
}

const SECRET_FIELDS = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "openaiApiKey",
  "cohereApiKey",
  "secretKey",
  "langfuseSecretKey",
  "authorization",
  "cookie",
];

/**
 * Pino `redact` paths: every secret field at the top level and one level deep
 * (e.g. `config.apiKey`, `headers.authorization`).
 */
export const REDACT_PATHS: string[] = [
  ...SECRET_FIELDS,
  ...SECRET_FIELDS.map((field) => `*.${field}`),
];
