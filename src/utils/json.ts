/**
 * JSON value types and parsing helpers.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Safely parse a JSON string with fallback on error.
 *
 * @param json - The JSON string to parse (can be null/undefined)
 * @param fallback - Value to return if parsing fails
 * @param onError - Optional callback for logging/reporting parse errors
 *
 * @example
 * const payload = safeJsonParse(row.payload, {});
 */
export function safeJsonParse<T>(
  json: string | null | undefined,
  fallback: T,
  onError?: (error: Error, rawValue: string) => void
): T {
  if (json === null || json === undefined) {
    return fallback;
  }

  try {
    return JSON.parse(json) as T;
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return fallback;
  }
}

/**
 * Narrow an unknown value to a plain JSON object.
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert an arbitrary value into a JsonValue, dropping what JSON cannot carry
 * (undefined, functions, symbols) and turning bigints into decimal strings.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null) return null;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return value.toString();
    case 'object': {
      if (Array.isArray(value)) {
        return value.map((item) => toJsonValue(item));
      }
      const result: JsonObject = {};
      for (const [key, item] of Object.entries(value)) {
        if (item === undefined || typeof item === 'function' || typeof item === 'symbol') {
          continue;
        }
        result[key] = toJsonValue(item);
      }
      return result;
    }
    default:
      return null;
  }
}

/**
 * Like toJsonValue, but always yields an object (non-objects become `{}`).
 */
export function toJsonObject(value: unknown): JsonObject {
  const converted = toJsonValue(value);
  return isJsonObject(converted) ? converted : {};
}
