export const REDACTED = "[REDACTED]";

/**
 * Builds the list of strings to scrub from log output. The flag is an
 * arbitrary byte string, so both of the decodings a log line might carry
 * are included.
 */
export function secretStrings(secrets: ReadonlyArray<string | Buffer>): string[] {
  const out = new Set<string>();
  for (const secret of secrets) {
    if (typeof secret === "string") {
      if (secret.length > 0) out.add(secret);
      continue;
    }
    if (secret.length === 0) continue;
    out.add(secret.toString("utf-8"));
    out.add(secret.toString("latin1"));
  }
  // Longest first so a secret that contains another is replaced whole.
  return [...out].sort((a, b) => b.length - a.length);
}

export function redactString(value: string, secrets: readonly string[]): string {
  let result = value;
  for (const secret of secrets) {
    if (result.includes(secret)) result = result.split(secret).join(REDACTED);
  }
  return result;
}

export function redactPayload(value: unknown, secrets: readonly string[]): unknown {
  if (value === null || value === undefined || secrets.length === 0) return value;
  if (typeof value === "string") return redactString(value, secrets);
  if (typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map((item: unknown) => redactPayload(item, secrets));
  if (value instanceof Error) return redactString(value.message, secrets);
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    result[k] = redactPayload(v, secrets);
  }
  return result;
}
