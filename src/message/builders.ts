import { JSONRPC_VERSION } from '../constants/protocol';
import { JsonValue } from '../types/json-value';
import { ValidationFailure } from './failure';
import { Id, PresentId } from './id';
import { Params } from './params';
import { RpcError } from './rpc-error';
import {
  ErrorMessage,
  InvalidMessage,
  NotificationMessage,
  RequestMessage,
  SuccessMessage,
} from './types';

export function request(id: PresentId, method: string, params: Params = Params.none()): RequestMessage {
  return { kind: 'request', jsonrpc: JSONRPC_VERSION, id, method, params };
}

export function notification(method: string, params: Params = Params.none()): NotificationMessage {
  return { kind: 'notification', jsonrpc: JSONRPC_VERSION, method, params };
}

export function success(id: PresentId, result: JsonValue): SuccessMessage {
  return { kind: 'success', jsonrpc: JSONRPC_VERSION, id, result };
}

export function errorResponse(id: Id, error: RpcError): ErrorMessage {
  return { kind: 'error', jsonrpc: JSONRPC_VERSION, id, error };
}

export function invalid(failures: readonly ValidationFailure[]): InvalidMessage {
  return { kind: 'invalid', failures };
}
