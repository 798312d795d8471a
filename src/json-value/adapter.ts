import { JsonKind, JsonObject, JsonValue } from '../types/json-value';

/**
 * Read-only view over a JSON tree.
 *
 * The validator only ever touches its input through this interface, so a
 * tree produced by another JSON library can be classified by supplying an
 * adapter for it.
 */
export interface JsonValueAdapter<T> {
  kindOf(value: T): JsonKind;
  /** Whether `key` is an own member of the object `value` */
  hasKey(value: T, key: string): boolean;
  getKey(value: T, key: string): T | undefined;
  asString(value: T): string | undefined;
  /** A number, or a bigint for an integer outside the safe range */
  asNumber(value: T): number | bigint | undefined;
  /** Elements of an array value; empty for any other kind */
  elements(value: T): readonly T[];
  /** Copy of the value as a plain JSON tree */
  toJson(value: T): JsonValue;
}

function isObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function hasOwn(value: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(value, key);
}

/**
 * Adapter for the plain values `JSON.parse` returns
 */
export const plainJsonAdapter: JsonValueAdapter<JsonValue> = {
  kindOf(value) {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    switch (typeof value) {
      case 'boolean':
        return 'boolean';
      case 'number':
      case 'bigint':
        return 'number';
      case 'string':
        return 'string';
      default:
        return 'object';
    }
  },

  hasKey(value, key) {
    return isObject(value) && hasOwn(value, key);
  },

  getKey(value, key) {
    return isObject(value) && hasOwn(value, key) ? value[key] : undefined;
  },

  asString(value) {
    return typeof value === 'string' ? value : undefined;
  },

  asNumber(value) {
    return typeof value === 'number' || typeof value === 'bigint' ? value : undefined;
  },

  elements(value) {
    return Array.isArray(value) ? value : [];
  },

  toJson(value) {
    return structuredClone(value);
  },
};
