import { ConstructionError } from '../errors/base';

/**
 * Error codes the protocol itself defines
 */
export enum StandardErrorCode {
  /** Invalid JSON was received */
  ParseError = -32700,
  /** The JSON sent is not a valid request object */
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  /** Internal JSON-RPC error */
  InternalError = -32603,
}

export type StandardErrorName = keyof typeof StandardErrorCode;

/**
 * Classification of an error code.
 *
 * Every integer maps to exactly one variant: the five standard codes to their
 * named variant, anything else to `ServerError` with the integer kept.
 */
export type ErrorCode =
  | { readonly type: StandardErrorName }
  | { readonly type: 'ServerError'; readonly code: number; readonly message?: string };

const STANDARD_MESSAGES: Readonly<Record<StandardErrorName, string>> = {
  ParseError: 'Parse error',
  InvalidRequest: 'Invalid Request',
  MethodNotFound: 'Method not found',
  InvalidParams: 'Invalid params',
  InternalError: 'Internal error',
};

const STANDARD_NAMES: readonly StandardErrorName[] = [
  'ParseError',
  'InvalidRequest',
  'MethodNotFound',
  'InvalidParams',
  'InternalError',
];

const STANDARD_BY_CODE: ReadonlyMap<number, StandardErrorName> = new Map(
  STANDARD_NAMES.map((name): [number, StandardErrorName] => [StandardErrorCode[name], name]),
);

export const SERVER_ERROR_MESSAGE = 'Server error';

/**
 * @throws {ConstructionError} If `code` is not a safe integer
 */
export function assertErrorInteger(code: number): void {
  if (!Number.isSafeInteger(code)) {
    throw new ConstructionError('Error code must be an integer', { code: String(code) });
  }
}

export const ErrorCode = {
  ParseError: { type: 'ParseError' } satisfies ErrorCode,
  InvalidRequest: { type: 'InvalidRequest' } satisfies ErrorCode,
  MethodNotFound: { type: 'MethodNotFound' } satisfies ErrorCode,
  InvalidParams: { type: 'InvalidParams' } satisfies ErrorCode,
  InternalError: { type: 'InternalError' } satisfies ErrorCode,

  /**
   * @throws {ConstructionError} If `code` is not a safe integer
   */
  serverError(code: number, message?: string): ErrorCode {
    assertErrorInteger(code);
    return message === undefined
      ? { type: 'ServerError', code }
      : { type: 'ServerError', code, message };
  },

  /**
   * @throws {ConstructionError} If `code` is not a safe integer
   */
  fromInteger(code: number): ErrorCode {
    assertErrorInteger(code);
    const name = STANDARD_BY_CODE.get(code);
    return name ? { type: name } : { type: 'ServerError', code };
  },

  toInteger(errorCode: ErrorCode): number {
    return errorCode.type === 'ServerError' ? errorCode.code : StandardErrorCode[errorCode.type];
  },

  message(errorCode: ErrorCode): string {
    if (errorCode.type === 'ServerError') {
      return errorCode.message ?? SERVER_ERROR_MESSAGE;
    }
    return STANDARD_MESSAGES[errorCode.type];
  },

  isStandard(code: number): boolean {
    return STANDARD_BY_CODE.has(code);
  },
};
