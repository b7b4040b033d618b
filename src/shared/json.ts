/**
 * JSON parsing utilities
 * Used for unwrapping secret payloads and reading GitHub error bodies
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: unknown };

/**
 * Check whether a value is a plain JSON object (not an array or null)
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse JSON, returning undefined instead of throwing
 * @param jsonStr - JSON string to parse
 * @returns Parsed value, or undefined when the input is not valid JSON
 */
export function parseJsonSafe(jsonStr: string): unknown {
  try {
    const parsed: unknown = JSON.parse(jsonStr);
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * Parse JSON with a contextual error message
 * @param jsonStr - JSON string to parse
 * @param context - Context for error messages
 * @returns Parsed value
 */
export function safeJsonParse(jsonStr: string, context = 'JSON'): unknown {
  try {
    const parsed: unknown = JSON.parse(jsonStr);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(
      `Failed to parse ${context}: ${reason}\n` +
      `Input: ${jsonStr.substring(0, 200)}...`
    );
  }
}
