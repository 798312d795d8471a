import { JsonObject, JsonValue } from '../types/json-value';
import { Id } from './id';
import { Params } from './params';
import { RpcError } from './rpc-error';
import { JsonRpcMessage } from './types';

/**
 * Converts a message to its wire form as a plain JSON tree, `jsonrpc` first.
 *
 * An invalid message becomes an array of `{reason, detail, value}` objects;
 * it describes a rejection and is not a protocol message.
 */
export function serializeMessage(message: JsonRpcMessage): JsonValue {
  switch (message.kind) {
    case 'request': {
      const json: JsonObject = { jsonrpc: message.jsonrpc, method: message.method };
      const params = Params.toJson(message.params);
      if (params !== undefined) json.params = params;
      json.id = Id.toJson(message.id);
      return json;
    }
    case 'notification': {
      const json: JsonObject = { jsonrpc: message.jsonrpc, method: message.method };
      const params = Params.toJson(message.params);
      if (params !== undefined) json.params = params;
      return json;
    }
    case 'success':
      return { jsonrpc: message.jsonrpc, result: message.result, id: Id.toJson(message.id) };
    case 'error':
      return {
        jsonrpc: message.jsonrpc,
        error: RpcError.toJson(message.error),
        id: Id.toJson(message.id),
      };
    case 'invalid':
      return message.failures.map(({ reason, detail, value }) => ({ reason, detail, value }));
  }
}

export function serializeBatch(messages: readonly JsonRpcMessage[]): JsonValue {
  return messages.map(serializeMessage);
}

/**
 * Prints a JSON tree compactly, as `JSON.stringify` does, writing bigints as
 * bare integer literals
 */
export function stringifyJson(value: JsonValue): string {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return `[${value.map(stringifyJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const members = Object.entries(value).map(
      ([key, member]) => `${JSON.stringify(key)}:${stringifyJson(member)}`,
    );
    return `{${members.join(',')}}`;
  }
  return JSON.stringify(value);
}
