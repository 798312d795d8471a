import { JsonArray, JsonObject, JsonValue } from '../types/json-value';

/**
 * Parameters of a request or notification
 */
export type Params = ArrayParams | MapParams | NoParams;

export interface ArrayParams {
  readonly type: 'array';
  readonly values: JsonArray;
}

export interface MapParams {
  readonly type: 'map';
  readonly entries: JsonObject;
}

export interface NoParams {
  readonly type: 'none';
}

const NONE: NoParams = { type: 'none' };

export const Params = {
  array(values: JsonArray): ArrayParams {
    return { type: 'array', values };
  },

  map(entries: JsonObject): MapParams {
    return { type: 'map', entries };
  },

  none(): NoParams {
    return NONE;
  },

  /**
   * Arrays become positional params, objects named params, and every other
   * value means no params at all
   */
  fromValue(value: JsonValue): Params {
    if (Array.isArray(value)) return Params.array(value);
    if (typeof value === 'object' && value !== null) return Params.map(value);
    return NONE;
  },

  getArray(params: Params): JsonArray | undefined {
    return params.type === 'array' ? params.values : undefined;
  },

  getMap(params: Params): JsonObject | undefined {
    return params.type === 'map' ? params.entries : undefined;
  },

  /** Wire form, or `undefined` when the `params` member is omitted */
  toJson(params: Params): JsonArray | JsonObject | undefined {
    switch (params.type) {
      case 'array':
        return params.values;
      case 'map':
        return params.entries;
      case 'none':
        return undefined;
    }
  },
};
