// Keys and value shapes that must never reach the audit trail verbatim.
const SENSITIVE_KEYS = /^(authorization|password|secret|token|bot[_-]?token|api[_-]?key|credential|private[_-]?key|access[_-]?token|refresh[_-]?token|client[_-]?secret|webhook[_-]?url|connection[_-]?string|database[_-]?url)$/i;
const SENSITIVE_VALUES = /Bearer\s|ghp_|gho_|github_pat_|sk-ant-|sk-proj-|AKIA[A-Z0-9]{16}|xox[bpas]-|eyJ[A-Za-z0-9_-]{10,}\.|-----BEGIN\s+(?:RSA\s+|EC\s+|OPENSSH\s+)?PRIVATE\s+KEY|[MN][A-Za-z\d]{23,25}\.[\w-]{6}\.[\w-]{27,}|discord(?:app)?\.com\/api\/webhooks\/|mongodb(\+srv)?:\/\/[^\s]+|postgres(ql)?:\/\/[^\s]+|redis:\/\/[^\s]+/;

function redactValue(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "string") return SENSITIVE_VALUES.test(value) ? "[REDACTED]" : value;
  if (typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(redactValue);
  return redactPayload(Object.fromEntries(Object.entries(value)));
}

export function redactPayload(payload: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(payload)) {
    result[k] = SENSITIVE_KEYS.test(k) && typeof v === "string" ? "[REDACTED]" : redactValue(v);
  }
  return result;
}
