import { JsonObject, JsonValue } from '../types/json-value';
import { ErrorCode, assertErrorInteger } from './error-code';

/**
 * Error object carried by an error response
 */
export interface RpcError {
  readonly code: number;
  readonly message: string;
  readonly data?: JsonValue;
}

function build(code: number, message: string, data: JsonValue | undefined): RpcError {
  assertErrorInteger(code);
  return data === undefined ? { code, message } : { code, message, data };
}

export const RpcError = {
  /**
   * Fills code and message from the classification
   */
  fromCode(errorCode: ErrorCode, data?: JsonValue): RpcError {
    return build(ErrorCode.toInteger(errorCode), ErrorCode.message(errorCode), data);
  },

  /**
   * @throws {ConstructionError} If `code` is not an integer
   */
  custom(code: number, message: string, data?: JsonValue): RpcError {
    return build(code, message, data);
  },

  /**
   * Application-defined error with the generic "Server error" text
   */
  serverError(code: number, data?: JsonValue): RpcError {
    return RpcError.fromCode(ErrorCode.serverError(code), data);
  },

  parseError(data?: JsonValue): RpcError {
    return RpcError.fromCode(ErrorCode.ParseError, data);
  },

  invalidRequest(data?: JsonValue): RpcError {
    return RpcError.fromCode(ErrorCode.InvalidRequest, data);
  },

  methodNotFound(data?: JsonValue): RpcError {
    return RpcError.fromCode(ErrorCode.MethodNotFound, data);
  },

  invalidParams(data?: JsonValue): RpcError {
    return RpcError.fromCode(ErrorCode.InvalidParams, data);
  },

  internalError(data?: JsonValue): RpcError {
    return RpcError.fromCode(ErrorCode.InternalError, data);
  },

  /** Returns a copy carrying `data`, replacing any data already present */
  withData(error: RpcError, data: JsonValue): RpcError {
    return build(error.code, error.message, data);
  },

  /**
   * Classifies the payload's code. A non-standard code keeps the payload's
   * own message.
   */
  classify(error: RpcError): ErrorCode {
    const errorCode = ErrorCode.fromInteger(error.code);
    return errorCode.type === 'ServerError'
      ? ErrorCode.serverError(error.code, error.message)
      : errorCode;
  },

  toJson(error: RpcError): JsonObject {
    const json: JsonObject = { code: error.code, message: error.message };
    if (error.data !== undefined) {
      json.data = error.data;
    }
    return json;
  },
};
