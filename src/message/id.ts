import { ConstructionError } from '../errors/base';

/**
 * Request identifier.
 *
 * `none` is distinct from a missing member: it only ever appears on an error
 * response whose request id could not be determined, and serializes as `null`.
 */
export type Id = NumberId | StringId | NoneId;

/**
 * `value` is a `number` inside the safe integer range and a `bigint` for the
 * rest of the 64-bit range
 */
export interface NumberId {
  readonly type: 'number';
  readonly value: number | bigint;
}

export interface StringId {
  readonly type: 'string';
  readonly value: string;
}

export interface NoneId {
  readonly type: 'none';
}

/**
 * An id a request or success response can carry
 */
export type PresentId = NumberId | StringId;

const NONE: NoneId = { type: 'none' };

const MIN_ID = -(2n ** 63n);
const MAX_ID = 2n ** 63n - 1n;

/**
 * Whether `value` can be used as a numeric id. Ids are 64-bit signed
 * integers; a `number` must also be held exactly, so only safe integers pass.
 */
export function isIdInteger(value: number | bigint): boolean {
  if (typeof value === 'bigint') {
    return value >= MIN_ID && value <= MAX_ID;
  }
  return Number.isSafeInteger(value);
}

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

function normalize(value: number | bigint): number | bigint {
  if (typeof value === 'bigint' && value >= MIN_SAFE && value <= MAX_SAFE) {
    return Number(value);
  }
  return value;
}

export const Id = {
  /**
   * A bigint inside the safe integer range is stored as a number.
   *
   * @throws {ConstructionError} If `value` is not a safe integer number or a
   * 64-bit bigint
   */
  num(value: number | bigint): NumberId {
    if (!isIdInteger(value)) {
      throw new ConstructionError('Numeric id must be a 64-bit integer held exactly', {
        value: String(value),
      });
    }
    return { type: 'number', value: normalize(value) };
  },

  str(value: string): StringId {
    return { type: 'string', value };
  },

  none(): NoneId {
    return NONE;
  },

  /**
   * Builds an id from a plain number or string, the way callers usually
   * hold them
   */
  from(value: number | bigint | string): PresentId {
    return typeof value === 'string' ? Id.str(value) : Id.num(value);
  },

  asNumber(id: Id): number | bigint | undefined {
    return id.type === 'number' ? id.value : undefined;
  },

  asString(id: Id): string | undefined {
    return id.type === 'string' ? id.value : undefined;
  },

  isNone(id: Id): id is NoneId {
    return id.type === 'none';
  },

  equals(a: Id, b: Id): boolean {
    if (a.type === 'none' || b.type === 'none') {
      return a.type === b.type;
    }
    return a.type === b.type && a.value === b.value;
  },

  /** Wire form: the number, the string, or `null` */
  toJson(id: Id): number | bigint | string | null {
    return id.type === 'none' ? null : id.value;
  },
};
