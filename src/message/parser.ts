import { JsonValue } from '../types/json-value';
import { invalid } from './builders';
import { failure } from './failure';
import { ValidationOutcome } from './types';
import { MessageValidator } from './validator';

/**
 * Decodes `text` with `JSON.parse` and classifies the result. Text that is
 * not JSON becomes an invalid message with reason `parse-error`.
 */
export function parseText(text: string, validator: MessageValidator<JsonValue>): ValidationOutcome {
  let decoded: JsonValue;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    if (!(error instanceof SyntaxError)) {
      throw error;
    }
    return { type: 'single', message: invalid([failure('parse-error', error.message, text)]) };
  }
  return validator.validate(decoded);
}
