// Field-level readers for untrusted candidate data. Nothing here converts
// across types implicitly: a number is never read as a string, an object
// never as an array.

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/** Trimmed string, or null when absent, blank or not a string. */
export function asText(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function asBoolean(value: unknown): boolean {
  return value === true;
}

/** Numbers and numeric strings; NaN and everything else is null. */
export function asNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isNaN(value) ? null : value;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

export function asStringList(value: unknown, limit: number): string[] {
  const out: string[] = [];
  for (const item of asArray(value)) {
    const text = asText(item);
    if (text === null) continue;
    out.push(text);
    if (out.length >= limit) break;
  }
  return out;
}

export function asEnum<T extends string>(
  value: unknown,
  allowed: readonly T[],
  fallback: T,
  normalize: (raw: string) => string = (raw) => raw.toLowerCase()
): T {
  const text = asText(value);
  if (text === null) return fallback;
  const normalized = normalize(text);
  return allowed.find((candidate) => candidate === normalized) ?? fallback;
}

export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/** Upper snake case: runs of non-alphanumerics collapse to one underscore. */
export function toUpperSnake(value: string): string {
  return value
    .trim()
    .replace(/[^A-Za-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .toUpperCase();
}
