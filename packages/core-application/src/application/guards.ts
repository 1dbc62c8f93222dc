export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function getString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

export function getNumber(v: unknown): number | undefined {
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}

export function getBoolean(v: unknown): boolean | undefined {
  return typeof v === "boolean" ? v : undefined;
}

export function getStringArray(v: unknown): string[] | undefined {
  return Array.isArray(v) && v.every((x): x is string => typeof x === "string") ? v : undefined;
}
