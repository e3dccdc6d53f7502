import type { JsonObject, JsonValue } from '../types/json';
import { isJsonObject } from './sanitize';

// Transform outputs are never trusted to be complete. Every read goes through
// one of these and falls back to an empty value instead of throwing.

export function readString(source: JsonObject, key: string, fallback = ''): string {
  const value = source[key];
  return typeof value === 'string' ? value : fallback;
}

/**
 * Like readString, but also renders numbers ("year": 2020) and string lists
 * ("technologies": ["Python", "SQL"]) as text.
 */
export function readText(source: JsonObject, key: string, fallback = ''): string {
  const value = source[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (Array.isArray(value)) {
    const parts = value.filter((item): item is string => typeof item === 'string' && item.trim() !== '');
    return parts.length > 0 ? parts.join(', ') : fallback;
  }
  return fallback;
}

export function readNumber(source: JsonObject, key: string, fallback = 0): number {
  const value = source[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim().replace(/%$/, ''));
    if (Number.isFinite(parsed)) return parsed;
  }
  return fallback;
}

export function hasNumber(source: JsonObject, key: string): boolean {
  return Number.isFinite(readNumber(source, key, Number.NaN));
}

export function toStringList(value: JsonValue | undefined): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}

export function readStringList(source: JsonObject, key: string): string[] {
  return toStringList(source[key]);
}

export function readRecordList(source: JsonObject, key: string): JsonObject[] {
  const value = source[key];
  if (!Array.isArray(value)) return [];
  return value.filter(isJsonObject);
}

/**
 * Projects a record onto a fixed set of text fields, leaving out the ones
 * that are absent or empty.
 */
export function pickText<K extends string>(
  source: JsonObject,
  keys: readonly K[],
): Partial<Record<K, string>> {
  const picked: Partial<Record<K, string>> = {};
  for (const key of keys) {
    const value = readText(source, key).trim();
    if (value) picked[key] = value;
  }
  return picked;
}
