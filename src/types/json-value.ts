/**
 * Represents any JSON value as produced by `JSON.parse`.
 *
 * `bigint` holds integers a `number` cannot represent exactly. `JSON.parse`
 * never produces one; adapters over lossless JSON trees may.
 */
export type JsonValue = string | number | bigint | boolean | null | JsonValue[] | JsonObject;

/**
 * Represents a JSON object
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonArray = JsonValue[];

export type JsonKind = 'null' | 'boolean' | 'number' | 'string' | 'array' | 'object';
