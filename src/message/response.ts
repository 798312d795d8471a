import { plainJsonAdapter } from '../json-value/adapter';
import { JsonValue } from '../types/json-value';
import { errorResponse } from './builders';
import { ValidationFailure } from './failure';
import { Id, isIdInteger } from './id';
import { RpcError } from './rpc-error';
import { ErrorMessage } from './types';

function recoverId(value: JsonValue): Id {
  const id = plainJsonAdapter.getKey(value, 'id');
  if (typeof id === 'string') return Id.str(id);
  if ((typeof id === 'number' || typeof id === 'bigint') && isIdInteger(id)) return Id.num(id);
  return Id.none();
}

/**
 * Builds the error response a server sends for a rejected message.
 *
 * Undecodable text gets a parse error, anything else an invalid request.
 * The id is taken from the rejected object when it holds a usable one, and
 * the failure detail goes into `data`.
 */
export function errorResponseFor(rejection: ValidationFailure): ErrorMessage {
  if (rejection.reason === 'parse-error') {
    return errorResponse(Id.none(), RpcError.parseError(rejection.detail));
  }
  return errorResponse(recoverId(rejection.value), RpcError.invalidRequest(rejection.detail));
}
