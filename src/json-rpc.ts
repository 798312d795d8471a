import { JsonRpcVersion } from './constants/protocol';
import { JsonValue } from './types/json-value';
import { errorResponse, notification, request, success } from './message/builders';
import { ValidationFailure } from './message/failure';
import { Id, PresentId } from './message/id';
import { Params } from './message/params';
import { parseText } from './message/parser';
import { errorResponseFor } from './message/response';
import { RpcError } from './message/rpc-error';
import { serializeBatch, serializeMessage, stringifyJson } from './message/serializer';
import {
  ErrorMessage,
  JsonRpcMessage,
  NotificationMessage,
  RequestMessage,
  SuccessMessage,
  ValidationOutcome,
} from './message/types';
import { MessageValidator } from './message/validator';

const defaultValidator = MessageValidator.plain();

/**
 * Entry point for building, classifying and serializing messages.
 *
 * Accessors return `undefined` when the member does not belong to the
 * message's kind; they never throw.
 */
export class JsonRpc {
  static request(id: PresentId | number | bigint | string, method: string, params?: Params): RequestMessage {
    return request(toPresentId(id), method, params);
  }

  static notification(method: string, params?: Params): NotificationMessage {
    return notification(method, params);
  }

  static success(id: PresentId | number | bigint | string, result: JsonValue): SuccessMessage {
    return success(toPresentId(id), result);
  }

  /**
   * @param id - Pass `Id.none()` (or `null`) when the request id is unknown
   */
  static error(id: Id | number | bigint | string | null, error: RpcError): ErrorMessage {
    return errorResponse(id === null ? Id.none() : toId(id), error);
  }

  /**
   * Classifies an already decoded JSON value
   */
  static fromValue(raw: JsonValue): ValidationOutcome {
    return defaultValidator.validate(raw);
  }

  /**
   * Decodes and classifies JSON text
   */
  static parse(text: string): ValidationOutcome {
    return parseText(text, defaultValidator);
  }

  static toValue(message: JsonRpcMessage): JsonValue {
    return serializeMessage(message);
  }

  static toBatchValue(messages: readonly JsonRpcMessage[]): JsonValue {
    return serializeBatch(messages);
  }

  static stringify(message: JsonRpcMessage | readonly JsonRpcMessage[]): string {
    return stringifyJson(isBatch(message) ? serializeBatch(message) : serializeMessage(message));
  }

  static errorResponseFor(rejection: ValidationFailure): ErrorMessage {
    return errorResponseFor(rejection);
  }

  /**
   * `none` for an error response whose request id was unknown; `undefined`
   * for notifications and invalid messages
   */
  static getId(message: JsonRpcMessage): Id | undefined {
    switch (message.kind) {
      case 'request':
      case 'success':
      case 'error':
        return message.id;
      default:
        return undefined;
    }
  }

  /**
   * `undefined` only for invalid messages, which carry no envelope
   */
  static getVersion(message: JsonRpcMessage): JsonRpcVersion | undefined {
    return message.kind === 'invalid' ? undefined : message.jsonrpc;
  }

  static getMethod(message: JsonRpcMessage): string | undefined {
    return message.kind === 'request' || message.kind === 'notification'
      ? message.method
      : undefined;
  }

  static getParams(message: JsonRpcMessage): Params | undefined {
    return message.kind === 'request' || message.kind === 'notification'
      ? message.params
      : undefined;
  }

  static getResult(message: JsonRpcMessage): JsonValue | undefined {
    return message.kind === 'success' ? message.result : undefined;
  }

  static getError(message: JsonRpcMessage): RpcError | undefined {
    return message.kind === 'error' ? message.error : undefined;
  }

  static getFailures(message: JsonRpcMessage): readonly ValidationFailure[] | undefined {
    return message.kind === 'invalid' ? message.failures : undefined;
  }
}

function toPresentId(id: PresentId | number | bigint | string): PresentId {
  return typeof id === 'object' ? id : Id.from(id);
}

function toId(id: Id | number | bigint | string): Id {
  return typeof id === 'object' ? id : Id.from(id);
}

function isBatch(
  message: JsonRpcMessage | readonly JsonRpcMessage[],
): message is readonly JsonRpcMessage[] {
  return Array.isArray(message);
}
