import { JsonValue } from '../types/json-value';

/**
 * Why a value was rejected as a JSON-RPC message
 */
export type FailureReason =
  /** Text could not be decoded as JSON */
  | 'parse-error'
  /** The value is not a JSON object */
  | 'not-an-object'
  /** The `jsonrpc` member is missing or is not "2.0" */
  | 'invalid-version'
  /** The members present match none of the message shapes */
  | 'unrecognized-shape'
  /** A recognized member holds the wrong JSON type */
  | 'field-type-mismatch'
  /** The `id` member is not a string or integer, or is null where not allowed */
  | 'invalid-id'
  /** A batch array with no elements */
  | 'empty-batch'
  /** A batch array longer than the configured limit */
  | 'batch-too-large';

export interface ValidationFailure {
  readonly reason: FailureReason;
  /** Human-readable explanation naming the offending member */
  readonly detail: string;
  /** The rejected value, as received */
  readonly value: JsonValue;
}

export function failure(reason: FailureReason, detail: string, value: JsonValue): ValidationFailure {
  return { reason, detail, value };
}
