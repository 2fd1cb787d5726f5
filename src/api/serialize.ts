/**
 * DICEPOOL - JSON Serialization
 *
 * Engine values are bigints; JSON has no bigint. Every bigint leaves the API
 * as a decimal string.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export function serialize(value: unknown): JsonValue {
  if (typeof value === 'bigint') return value.toString();
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) return value.map(serialize);
  if (typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined) out[key] = serialize(entry);
    }
    return out;
  }
  return String(value);
}
