const SENSITIVE_KEY = /token|secret|authorization|password/i;

function redact(extra: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(extra)) {
    out[k] = SENSITIVE_KEY.test(k) ? "[REDACTED]" : v;
  }
  return out;
}

export function logInfo(message: string, extra: Record<string, unknown> = {}) {
  console.log(JSON.stringify({ level: "INFO", message, ...redact(extra) }));
}

export function logWarn(message: string, extra: Record<string, unknown> = {}) {
  console.warn(JSON.stringify({ level: "WARN", message, ...redact(extra) }));
}

export function logError(message: string, extra: Record<string, unknown> = {}) {
  console.error(JSON.stringify({ level: "ERROR", message, ...redact(extra) }));
}
