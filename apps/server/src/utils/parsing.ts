/**
 * Defensive parsing helpers for untyped upstream JSON
 */

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseString(value: unknown, fallback = ''): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return fallback;
}

export function parseOptionalString(value: unknown): string | undefined {
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

export function parseNumber(value: unknown, fallback = 0): number {
  const parsed = parseOptionalNumber(value);
  return parsed ?? fallback;
}

export function parseOptionalNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function parseBoolean(value: unknown): boolean {
  return value === true || value === 'true';
}

/**
 * Parse an ISO date string, returning undefined for missing or invalid input
 */
export function parseDateString(value: unknown): Date | undefined {
  if (typeof value !== 'string' || value.length === 0) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function getNestedObject(value: UnknownRecord, key: string): UnknownRecord | undefined {
  const nested = value[key];
  return isRecord(nested) ? nested : undefined;
}

export function getArray(value: UnknownRecord, key: string): unknown[] {
  const nested = value[key];
  return Array.isArray(nested) ? nested : [];
}

/**
 * Array of non-empty strings; anything else in the array is skipped
 */
export function parseStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === 'string' && entry.length > 0);
}
