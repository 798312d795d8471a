import { JsonRpcVersion } from '../constants/protocol';
import { JsonValue } from '../types/json-value';
import { ValidationFailure } from './failure';
import { Id, PresentId } from './id';
import { Params } from './params';
import { RpcError } from './rpc-error';

export interface RequestMessage {
  readonly kind: 'request';
  readonly jsonrpc: JsonRpcVersion;
  readonly id: PresentId;
  readonly method: string;
  readonly params: Params;
}

/**
 * A request without an id. The receiver sends no response.
 */
export interface NotificationMessage {
  readonly kind: 'notification';
  readonly jsonrpc: JsonRpcVersion;
  readonly method: string;
  readonly params: Params;
}

export interface SuccessMessage {
  readonly kind: 'success';
  readonly jsonrpc: JsonRpcVersion;
  readonly id: PresentId;
  readonly result: JsonValue;
}

export interface ErrorMessage {
  readonly kind: 'error';
  readonly jsonrpc: JsonRpcVersion;
  /** `none` when the request's id could not be determined */
  readonly id: Id;
  readonly error: RpcError;
}

/**
 * Outcome of rejecting a value. Never transmitted as is; see
 * `JsonRpc.errorResponseFor` for the response a server sends instead.
 */
export interface InvalidMessage {
  readonly kind: 'invalid';
  readonly failures: readonly ValidationFailure[];
}

export type JsonRpcMessage =
  | RequestMessage
  | NotificationMessage
  | SuccessMessage
  | ErrorMessage
  | InvalidMessage;

export type JsonRpcMessageKind = JsonRpcMessage['kind'];

/**
 * Result of classifying a top-level value: one message for an object (or
 * any rejected value), one message per element for a batch array
 */
export type ValidationOutcome =
  | { readonly type: 'single'; readonly message: JsonRpcMessage }
  | { readonly type: 'batch'; readonly messages: readonly JsonRpcMessage[] };
