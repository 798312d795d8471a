import { DEFAULT_MAX_BATCH_SIZE, JSONRPC_VERSION } from '../constants/protocol';
import { JsonValueAdapter, plainJsonAdapter } from '../json-value/adapter';
import { JsonValue } from '../types/json-value';
import { Logger, noLogger } from '../util/logger';
import { OptionsValidator } from '../util/options-validator';
import { errorResponse, invalid, notification, request, success } from './builders';
import { FailureReason, failure } from './failure';
import { Id, PresentId, isIdInteger } from './id';
import { Params } from './params';
import { RpcError } from './rpc-error';
import { InvalidMessage, JsonRpcMessage, ValidationOutcome } from './types';

export interface ValidatorOptions {
  /** Longest batch accepted; longer batches are rejected whole */
  maxBatchSize?: number;
  logger?: Logger;
}

type Failed = { ok: false; reason: FailureReason; detail: string };

type Check<V> = { ok: true; value: V } | Failed;

function pass<V>(value: V): Check<V> {
  return { ok: true, value };
}

function fail(reason: FailureReason, detail: string): Failed {
  return { ok: false, reason, detail };
}

/**
 * Classifies parsed JSON values as JSON-RPC messages.
 *
 * Shapes are tried in a fixed order and the first match wins: request,
 * notification, success, error. A value matching none of them, or failing
 * a member check of the shape it matched, becomes an `invalid` message
 * carrying the reason and the value. Nothing is thrown for bad input.
 */
export class MessageValidator<T = JsonValue> {
  private readonly maxBatchSize: number;
  private readonly logger: Logger;

  constructor(
    private readonly adapter: JsonValueAdapter<T>,
    options: ValidatorOptions = {},
  ) {
    this.maxBatchSize = OptionsValidator.validateMaxBatchSize(
      options.maxBatchSize,
      DEFAULT_MAX_BATCH_SIZE,
    );
    this.logger = (options.logger ?? noLogger).createNested('MessageValidator');
  }

  /**
   * Validator over the plain values `JSON.parse` returns
   */
  static plain(options: ValidatorOptions = {}): MessageValidator<JsonValue> {
    return new MessageValidator(plainJsonAdapter, options);
  }

  /**
   * Classifies a top-level value. Arrays are batches and each element is
   * classified on its own; an empty or oversized batch is one invalid message.
   */
  validate(raw: T): ValidationOutcome {
    if (this.adapter.kindOf(raw) !== 'array') {
      return { type: 'single', message: this.validateMessage(raw) };
    }

    const elements = this.adapter.elements(raw);
    if (elements.length === 0) {
      return { type: 'single', message: this.reject(raw, 'empty-batch', 'Batch must not be empty') };
    }
    if (elements.length > this.maxBatchSize) {
      return {
        type: 'single',
        message: this.reject(
          raw,
          'batch-too-large',
          `Batch of ${elements.length} messages exceeds the limit of ${this.maxBatchSize}`,
        ),
      };
    }

    this.logger.debug('Validating batch', { size: elements.length });
    return { type: 'batch', messages: elements.map((element) => this.validateMessage(element)) };
  }

  /**
   * Classifies a single value. An array is rejected here like any other
   * non-object.
   */
  validateMessage(raw: T): JsonRpcMessage {
    const { adapter } = this;

    if (adapter.kindOf(raw) !== 'object') {
      return this.reject(raw, 'not-an-object', 'Message must be a JSON object');
    }

    const version = adapter.getKey(raw, 'jsonrpc');
    if (version === undefined) {
      return this.reject(raw, 'invalid-version', 'Missing "jsonrpc" member');
    }
    if (adapter.asString(version) !== JSONRPC_VERSION) {
      return this.reject(raw, 'invalid-version', `"jsonrpc" must be exactly "${JSONRPC_VERSION}"`);
    }

    const hasId = adapter.hasKey(raw, 'id');
    const methodValue = adapter.getKey(raw, 'method');
    const method = methodValue === undefined ? undefined : adapter.asString(methodValue);

    if (method !== undefined) {
      const params = this.readParams(raw);
      if (!params.ok) return this.reject(raw, params.reason, params.detail);

      if (!hasId) {
        return notification(method, params.value);
      }
      const id = this.readPresentId(raw);
      if (!id.ok) return this.reject(raw, id.reason, id.detail);
      return request(id.value, method, params.value);
    }

    const result = adapter.getKey(raw, 'result');
    if (result !== undefined && hasId) {
      const id = this.readPresentId(raw);
      if (!id.ok) return this.reject(raw, id.reason, id.detail);
      return success(id.value, adapter.toJson(result));
    }

    const errorValue = adapter.getKey(raw, 'error');
    if (errorValue !== undefined) {
      // missing and null ids both mean the request id was unknown
      const id = this.readId(raw);
      if (!id.ok) return this.reject(raw, id.reason, id.detail);
      const error = this.readError(errorValue);
      if (!error.ok) return this.reject(raw, error.reason, error.detail);
      return errorResponse(id.value, error.value);
    }

    if (methodValue !== undefined) {
      return this.reject(raw, 'field-type-mismatch', '"method" must be a string');
    }
    if (result !== undefined) {
      return this.reject(raw, 'unrecognized-shape', 'Response with "result" is missing "id"');
    }
    return this.reject(
      raw,
      'unrecognized-shape',
      'Object is not a request, notification, success or error response',
    );
  }

  private reject(raw: T, reason: FailureReason, detail: string): InvalidMessage {
    this.logger.debug('Rejected message', { reason, detail });
    return invalid([failure(reason, detail, this.adapter.toJson(raw))]);
  }

  private readParams(raw: T): Check<Params> {
    const value = this.adapter.getKey(raw, 'params');
    if (value === undefined) {
      return pass(Params.none());
    }
    switch (this.adapter.kindOf(value)) {
      case 'array':
      case 'object':
        return pass(Params.fromValue(this.adapter.toJson(value)));
      default:
        return fail('field-type-mismatch', '"params" must be an array or an object');
    }
  }

  private readId(raw: T): Check<Id> {
    const value = this.adapter.getKey(raw, 'id');
    if (value === undefined) {
      return pass(Id.none());
    }
    switch (this.adapter.kindOf(value)) {
      case 'null':
        return pass(Id.none());
      case 'string': {
        const str = this.adapter.asString(value);
        return str === undefined ? fail('invalid-id', '"id" is unreadable') : pass(Id.str(str));
      }
      case 'number': {
        const num = this.adapter.asNumber(value);
        if (num === undefined || !isIdInteger(num)) {
          return fail('invalid-id', '"id" must be a 64-bit integer held exactly');
        }
        return pass(Id.num(num));
      }
      default:
        return fail('invalid-id', '"id" must be a string, an integer or null');
    }
  }

  private readPresentId(raw: T): Check<PresentId> {
    const id = this.readId(raw);
    if (!id.ok) return id;
    if (id.value.type === 'none') {
      return fail('invalid-id', '"id" must not be null on a request or success response');
    }
    return pass(id.value);
  }

  private readError(value: T): Check<RpcError> {
    const { adapter } = this;
    if (adapter.kindOf(value) !== 'object') {
      return fail('field-type-mismatch', '"error" must be an object');
    }

    const codeValue = adapter.getKey(value, 'code');
    const code = codeValue === undefined ? undefined : adapter.asNumber(codeValue);
    if (typeof code !== 'number' || !Number.isSafeInteger(code)) {
      return fail('field-type-mismatch', '"error.code" must be an integer');
    }

    const messageValue = adapter.getKey(value, 'message');
    const message = messageValue === undefined ? undefined : adapter.asString(messageValue);
    if (message === undefined) {
      return fail('field-type-mismatch', '"error.message" must be a string');
    }

    const data = adapter.getKey(value, 'data');
    return pass(RpcError.custom(code, message, data === undefined ? undefined : adapter.toJson(data)));
  }
}
