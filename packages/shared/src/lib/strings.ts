export function coerceString(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") return String(value);
  return "";
}

export function coerceTrimmedString(value: unknown): string {
  return coerceString(value).trim();
}

export function formatUnknown(value: unknown, fallback = ""): string {
  if (value instanceof Error && typeof value.message === "string") {
    const msg = value.message.trim();
    if (msg) return msg;
  }
  const primitive = coerceTrimmedString(value);
  if (primitive) return primitive;
  try {
    const encoded = JSON.stringify(value);
    if (typeof encoded === "string" && encoded !== "{}" && encoded !== "[]") return encoded;
  } catch {
    // circular or unserializable
    return fallback;
  }
  return fallback;
}

/**
 * Flattens flag values that may arrive as one string, a repeated flag (array),
 * or a comma/space separated list into trimmed, non-empty entries.
 */
export function splitListArg(value: unknown): string[] {
  const raw = Array.isArray(value) ? value : [value];
  const out: string[] = [];
  for (const entry of raw) {
    for (const part of coerceString(entry).split(/[\s,]+/)) {
      const trimmed = part.trim();
      if (trimmed) out.push(trimmed);
    }
  }
  return out;
}

export function uniqueInOrder<T>(values: readonly T[]): T[] {
  const seen = new Set<T>();
  const out: T[] = [];
  for (const value of values) {
    if (seen.has(value)) continue;
    seen.add(value);
    out.push(value);
  }
  return out;
}
