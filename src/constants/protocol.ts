/**
 * Version marker every JSON-RPC 2.0 envelope carries in its `jsonrpc` member
 */
export const JSONRPC_VERSION = '2.0';

export type JsonRpcVersion = typeof JSONRPC_VERSION;

/**
 * Limits applied by `MessageValidator` when no options are given.
 * An unlimited batch size keeps every element of a batch.
 */
export const DEFAULT_MAX_BATCH_SIZE = Number.POSITIVE_INFINITY;

