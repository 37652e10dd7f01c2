const SENSITIVE_KEYS = /^(authorization|password|passwd|pass|secret|token|api[_-]?key|credential|credentials|cookie|session[_-]?cookie|otp|access[_-]?token|refresh[_-]?token)$/i;
const SENSITIVE_VALUES = /Bearer\s|ghp_|gho_|github_pat_|sk-[A-Za-z0-9]|eyJ[A-Za-z0-9_-]{10,}\.|-----BEGIN\s+(?:RSA\s+|EC\s+|OPENSSH\s+)?PRIVATE\s+KEY/;

export const REDACTED = "[REDACTED]";

/**
 * Deep-copies a log or response payload, masking credential-like keys and
 * values. Intents carry login passwords, so everything logged goes through here.
 */
export function redactPayload(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value !== "object") {
    if (typeof value === "string" && SENSITIVE_VALUES.test(value)) return REDACTED;
    return value;
  }
  if (Array.isArray(value)) return value.map(redactPayload);
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    if (SENSITIVE_KEYS.test(k) && typeof v === "string") {
      result[k] = REDACTED;
    } else {
      result[k] = redactPayload(v);
    }
  }
  return result;
}

export function redactRecord(value: Record<string, unknown>): Record<string, unknown> {
  const redacted = redactPayload(value);
  return typeof redacted === "object" && redacted !== null && !Array.isArray(redacted)
    ? Object.fromEntries(Object.entries(redacted))
    : {};
}
