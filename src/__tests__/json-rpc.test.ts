import { JsonRpc, Id, Params, RpcError, ErrorCode, JsonRpcMessage } from '../index';
import { batch, onlyFailure, single } from './test-utils';

describe('JsonRpc', () => {
  describe('fromValue', () => {
    it('classifies a request with positional params', () => {
      const message = single(
        JsonRpc.fromValue({ jsonrpc: '2.0', method: 'sum', params: [1, 2], id: 1 }),
      );
      expect(message).toEqual({
        kind: 'request',
        jsonrpc: '2.0',
        id: { type: 'number', value: 1 },
        method: 'sum',
        params: { type: 'array', values: [1, 2] },
      });
    });

    it('classifies an object without id as a notification', () => {
      const message = single(JsonRpc.fromValue({ jsonrpc: '2.0', method: 'log', params: { x: 1 } }));
      expect(message).toEqual({
        kind: 'notification',
        jsonrpc: '2.0',
        method: 'log',
        params: { type: 'map', entries: { x: 1 } },
      });
    });

    it('classifies a success response', () => {
      const message = single(JsonRpc.fromValue({ jsonrpc: '2.0', result: 19, id: 1 }));
      expect(message).toEqual({
        kind: 'success',
        jsonrpc: '2.0',
        id: { type: 'number', value: 1 },
        result: 19,
      });
    });

    it('classifies an error response with a null id', () => {
      const message = single(
        JsonRpc.fromValue({
          jsonrpc: '2.0',
          error: { code: -32601, message: 'Method not found' },
          id: null,
        }),
      );
      expect(message.kind).toBe('error');
      expect(JsonRpc.getId(message)).toEqual(Id.none());
      const error = JsonRpc.getError(message);
      expect(error).toEqual({ code: -32601, message: 'Method not found' });
      expect(error && RpcError.classify(error)).toEqual(ErrorCode.MethodNotFound);
    });

    it('rejects an object without the version member', () => {
      const raw = { method: 'sum', id: 1 };
      const failure = onlyFailure(single(JsonRpc.fromValue(raw)));
      expect(failure).toEqual({
        reason: 'invalid-version',
        detail: 'Missing "jsonrpc" member',
        value: raw,
      });
    });

    it('classifies each batch element on its own and keeps their order', () => {
      const malformed = { jsonrpc: '2.0', foo: 1 };
      const messages = batch(
        JsonRpc.fromValue([{ jsonrpc: '2.0', method: 'sum', params: [1, 2], id: 1 }, malformed]),
      );
      expect(messages).toHaveLength(2);
      expect(messages[0].kind).toBe('request');
      expect(onlyFailure(messages[1])).toEqual({
        reason: 'unrecognized-shape',
        detail: 'Object is not a request, notification, success or error response',
        value: malformed,
      });
    });

    it('does not share params with the input', () => {
      const raw = { jsonrpc: '2.0', method: 'sum', params: [1, 2], id: 1 };
      const message = single(JsonRpc.fromValue(raw));
      raw.params.push(99);
      expect(JsonRpc.getParams(message)).toEqual(Params.array([1, 2]));
    });

    it('rejects an empty batch as a whole', () => {
      const failure = onlyFailure(single(JsonRpc.fromValue([])));
      expect(failure.reason).toBe('empty-batch');
      expect(failure.value).toEqual([]);
    });
  });

  describe('builders', () => {
    it('accepts plain ids', () => {
      expect(JsonRpc.request('a', 'echo').id).toEqual({ type: 'string', value: 'a' });
      expect(JsonRpc.success(7, true).id).toEqual({ type: 'number', value: 7 });
      expect(JsonRpc.error(null, RpcError.internalError()).id).toEqual({ type: 'none' });
    });

    it('defaults to no params', () => {
      expect(JsonRpc.request(1, 'ping').params).toEqual({ type: 'none' });
      expect(JsonRpc.notification('ping').params).toEqual({ type: 'none' });
    });
  });

  describe('toValue', () => {
    it('omits params when there are none', () => {
      expect(JsonRpc.toValue(JsonRpc.request(0, 'test'))).toEqual({
        jsonrpc: '2.0',
        method: 'test',
        id: 0,
      });
    });

    it('places the version member first', () => {
      const value = JsonRpc.toValue(JsonRpc.success('x', { ok: true }));
      expect(Object.keys(value ?? {})[0]).toBe('jsonrpc');
    });

    it('writes a null id for an error response without id', () => {
      expect(JsonRpc.toValue(JsonRpc.error(Id.none(), RpcError.parseError()))).toEqual({
        jsonrpc: '2.0',
        error: { code: -32700, message: 'Parse error' },
        id: null,
      });
    });

    it('serializes a batch as an array', () => {
      expect(
        JsonRpc.toBatchValue([JsonRpc.notification('a'), JsonRpc.success(1, null)]),
      ).toEqual([
        { jsonrpc: '2.0', method: 'a' },
        { jsonrpc: '2.0', result: null, id: 1 },
      ]);
    });

    it('lists the failures of an invalid message', () => {
      const message = single(JsonRpc.fromValue(42));
      expect(JsonRpc.toValue(message)).toEqual([
        { reason: 'not-an-object', detail: 'Message must be a JSON object', value: 42 },
      ]);
    });
  });

  describe('stringify', () => {
    it('prints a request', () => {
      const message = JsonRpc.request(1, 'sum', Params.array([1, 2]));
      expect(JsonRpc.stringify(message)).toBe(
        '{"jsonrpc":"2.0","method":"sum","params":[1,2],"id":1}',
      );
    });

    it('prints a 64-bit id as an integer literal', () => {
      expect(JsonRpc.stringify(JsonRpc.request(9223372036854775807n, 'a'))).toBe(
        '{"jsonrpc":"2.0","method":"a","id":9223372036854775807}',
      );
      expect(JsonRpc.stringify(JsonRpc.success(-(2n ** 63n), [2n ** 60n, 'x']))).toBe(
        '{"jsonrpc":"2.0","result":[1152921504606846976,"x"],"id":-9223372036854775808}',
      );
    });

    it('prints nested members the way JSON.stringify does', () => {
      const result = { a: [true, null], 'k"': 'v', n: 1.5 };
      expect(JsonRpc.stringify(JsonRpc.success(1, result))).toBe(
        `{"jsonrpc":"2.0","result":${JSON.stringify(result)},"id":1}`,
      );
    });

    it('prints a batch', () => {
      expect(JsonRpc.stringify([JsonRpc.notification('tick')])).toBe(
        '[{"jsonrpc":"2.0","method":"tick"}]',
      );
    });
  });

  describe('parse', () => {
    it('decodes and classifies text', () => {
      const message = single(JsonRpc.parse('{"jsonrpc":"2.0","method":"subtract","params":[42,23],"id":"a1"}'));
      expect(message).toEqual(JsonRpc.request('a1', 'subtract', Params.array([42, 23])));
    });

    it('turns undecodable text into a parse failure', () => {
      const text = '{"jsonrpc": "2.0", "method": "foobar, "params": "bar", "baz]';
      const failure = onlyFailure(single(JsonRpc.parse(text)));
      expect(failure.reason).toBe('parse-error');
      expect(failure.value).toBe(text);
    });

    it('rejects an id the platform parser cannot read exactly', () => {
      const failure = onlyFailure(
        single(JsonRpc.parse('{"jsonrpc":"2.0","method":"a","id":9223372036854775807}')),
      );
      expect(failure.reason).toBe('invalid-id');
    });

    it('classifies every element of a batch of scalars as invalid', () => {
      const messages = batch(JsonRpc.parse('[1,2,3]'));
      expect(messages.map((m) => onlyFailure(m).reason)).toEqual([
        'not-an-object',
        'not-an-object',
        'not-an-object',
      ]);
    });
  });

  describe('accessors', () => {
    const requestMessage = JsonRpc.request(1, 'sum', Params.array([1, 2]));
    const notificationMessage = JsonRpc.notification('log', Params.map({ level: 'info' }));
    const successMessage = JsonRpc.success(1, 3);
    const errorMessage = JsonRpc.error(1, RpcError.methodNotFound());
    const invalidMessage = single(JsonRpc.fromValue('nope'));

    it('reads the version', () => {
      expect(JsonRpc.getVersion(requestMessage)).toBe('2.0');
      expect(JsonRpc.getVersion(notificationMessage)).toBe('2.0');
      expect(JsonRpc.getVersion(successMessage)).toBe('2.0');
      expect(JsonRpc.getVersion(errorMessage)).toBe('2.0');
      expect(JsonRpc.getVersion(invalidMessage)).toBeUndefined();
    });

    it('reads the id', () => {
      expect(JsonRpc.getId(requestMessage)).toEqual(Id.num(1));
      expect(JsonRpc.getId(notificationMessage)).toBeUndefined();
      expect(JsonRpc.getId(successMessage)).toEqual(Id.num(1));
      expect(JsonRpc.getId(errorMessage)).toEqual(Id.num(1));
      expect(JsonRpc.getId(invalidMessage)).toBeUndefined();
    });

    it('reads the method and params', () => {
      expect(JsonRpc.getMethod(requestMessage)).toBe('sum');
      expect(JsonRpc.getMethod(notificationMessage)).toBe('log');
      expect(JsonRpc.getMethod(successMessage)).toBeUndefined();
      expect(JsonRpc.getParams(notificationMessage)).toEqual(Params.map({ level: 'info' }));
      expect(JsonRpc.getParams(errorMessage)).toBeUndefined();
    });

    it('reads the result and error', () => {
      expect(JsonRpc.getResult(successMessage)).toBe(3);
      expect(JsonRpc.getResult(requestMessage)).toBeUndefined();
      expect(JsonRpc.getError(errorMessage)).toEqual({ code: -32601, message: 'Method not found' });
      expect(JsonRpc.getError(successMessage)).toBeUndefined();
    });

    it('reads the failures', () => {
      expect(JsonRpc.getFailures(invalidMessage)).toHaveLength(1);
      expect(JsonRpc.getFailures(requestMessage)).toBeUndefined();
    });
  });

  describe('round trip', () => {
    const messages: [string, JsonRpcMessage][] = [
      ['request without params', JsonRpc.request(0, 'test')],
      ['request with named params', JsonRpc.request('a', 'test', Params.map({ flag: true }))],
      ['notification with positional params', JsonRpc.notification('update', Params.array([1, 'two', null]))],
      ['success with a null result', JsonRpc.success(5, null)],
      ['success with a nested result', JsonRpc.success('r', { items: [{ id: 1 }], total: 1 })],
      ['error with data', JsonRpc.error('e', RpcError.invalidParams({ field: 'x' }))],
      ['error without id', JsonRpc.error(null, RpcError.custom(-32000, 'Busy'))],
    ];

    it.each(messages)('%s survives serialization', (_name, message) => {
      expect(single(JsonRpc.fromValue(JsonRpc.toValue(message)))).toEqual(message);
    });

    it.each(messages)('%s classifies the same when validated twice', (_name, message) => {
      const once = single(JsonRpc.fromValue(JsonRpc.toValue(message)));
      const twice = single(JsonRpc.fromValue(JsonRpc.toValue(once)));
      expect(twice).toEqual(once);
    });
  });
});
