/* istanbul ignore file */
export { JsonRpc } from './json-rpc';
export * from './message';
export { JsonValueAdapter, plainJsonAdapter } from './json-value';
export { JsonValue, JsonObject, JsonArray, JsonKind } from './types/json-value';
export { JSONRPC_VERSION, JsonRpcVersion, DEFAULT_MAX_BATCH_SIZE } from './constants/protocol';
export { JsonRpcEnvelopeError, ConstructionError, ConfigurationError } from './errors';
export { Logger, ConsoleLogger, TestLogger, TestLogEntry, NoLogger, noLogger } from './util/logger';
