export { Id, NumberId, StringId, NoneId, PresentId, isIdInteger } from './id';
export { Params, ArrayParams, MapParams, NoParams } from './params';
export { ErrorCode, StandardErrorCode, StandardErrorName, SERVER_ERROR_MESSAGE } from './error-code';
export { RpcError } from './rpc-error';
export { FailureReason, ValidationFailure } from './failure';
export {
  RequestMessage,
  NotificationMessage,
  SuccessMessage,
  ErrorMessage,
  InvalidMessage,
  JsonRpcMessage,
  JsonRpcMessageKind,
  ValidationOutcome,
} from './types';
export { MessageValidator, ValidatorOptions } from './validator';
export { serializeMessage, serializeBatch } from './serializer';
export { errorResponseFor } from './response';
export { parseText } from './parser';
