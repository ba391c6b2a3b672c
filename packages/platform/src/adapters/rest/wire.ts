/**
 * Wire Naming
 *
 * JSON bodies use snake_case keys ("food_id"); records in TypeScript use
 * camelCase ("foodId"). Only top-level keys are converted: no entity
 * has nested objects.
 */

/** "foodId" → "food_id" */
export function toWireName(fieldName: string): string {
  return fieldName.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase();
}

/** "food_id" → "foodId" */
export function fromWireName(wireName: string): string {
  return wireName.replace(/_([a-z0-9])/g, (_, letter: string) => letter.toUpperCase());
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Converts a record's keys to wire names for a response body */
export function toWire(record: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    out[toWireName(key)] = value;
  }
  return out;
}

/**
 * Converts a request body's keys to field names. Anything that is not a
 * JSON object is returned as-is for the schema to reject.
 */
export function fromWire(body: unknown): unknown {
  if (!isPlainObject(body)) return body;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    out[fromWireName(key)] = value;
  }
  return out;
}
