// Narrowing helpers for untyped store payloads.

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Some store APIs wrap single objects in one-element arrays; unwrap those. */
export function recordOrFirst(value: unknown): Record<string, unknown> | null {
  if (isRecord(value)) {
    return value;
  }
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return isRecord(first) ? first : null;
  }
  return null;
}

export function sanitizeText(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== "string") {
    return null;
  }
  const normalized = value.trim();
  return normalized.length > 0 ? normalized : null;
}

export function firstText(candidates: unknown[]): string | null {
  for (const candidate of candidates) {
    const normalized = sanitizeText(candidate);
    if (normalized) {
      return normalized;
    }
  }
  return null;
}

/** Text that may arrive as `{ name }`, `{ value }` or `{ url }` objects. */
export function textOf(value: unknown, keys: readonly string[] = ["name", "value"]): string | null {
  if (isRecord(value)) {
    return firstText(keys.map((key) => value[key]));
  }
  return sanitizeText(value);
}

export function numericOrNull(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value.trim().replace(",", "."));
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return null;
}

/** First candidate that is a positive finite number. */
export function firstPositive(candidates: unknown[]): number | null {
  for (const candidate of candidates) {
    const value = numericOrNull(candidate);
    if (value !== null && value > 0) {
      return value;
    }
  }
  return null;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
