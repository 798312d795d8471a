import { ConfigurationError } from '../errors/base';

/**
 * Utility class for validating validator options
 */
export class OptionsValidator {
  /**
   * Validates a batch size limit and returns the value to use
   *
   * @param value - The configured limit, if any
   * @param defaultValue - Used when no limit is configured
   * @throws ConfigurationError if the limit is not a positive integer or Infinity
   */
  static validateMaxBatchSize(value: unknown, defaultValue: number): number {
    if (value === undefined) {
      return defaultValue;
    }

    if (typeof value !== 'number' || Number.isNaN(value)) {
      throw new ConfigurationError('maxBatchSize must be a number', {
        value: String(value),
        type: typeof value,
      });
    }

    if (value === Number.POSITIVE_INFINITY) {
      return value;
    }

    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigurationError('maxBatchSize must be a positive integer', { value });
    }

    return value;
  }
}
