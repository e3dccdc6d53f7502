import type { JsonObject, JsonValue } from '../types/json';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDroppableEntry(value: JsonValue): boolean {
  return value === null || value === '' || (Array.isArray(value) && value.length === 0);
}

function isDroppableItem(value: JsonValue): boolean {
  return isDroppableEntry(value) || (isJsonObject(value) && Object.keys(value).length === 0);
}

/**
 * Recursively strips empty values from a parsed structure.
 *
 * Mapping entries go when their value is null, '' or []; sequence items go
 * when they are null, '', [] or {}. Children are cleaned first, so a value that
 * only becomes empty after cleaning is dropped too and the result is stable
 * under a second pass.
 */
export function sanitizeStructure(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeStructure(item)).filter((item) => !isDroppableItem(item));
  }

  if (isJsonObject(value)) {
    const cleaned: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      const next = sanitizeStructure(entry);
      if (!isDroppableEntry(next)) {
        cleaned[key] = next;
      }
    }
    return cleaned;
  }

  return value;
}

export function sanitizeObject(value: JsonObject): JsonObject {
  const cleaned = sanitizeStructure(value);
  return isJsonObject(cleaned) ? cleaned : {};
}
