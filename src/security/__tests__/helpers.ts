import { isQueryValidationError, QueryValidationError } from '../errors.js';

/**
 * Runs `fn` and returns the QueryValidationError it throws.
 * Anything else (including not throwing) fails the test.
 */
export function rejectionOf(fn: () => unknown): QueryValidationError {
  try {
    fn();
  } catch (error) {
    if (isQueryValidationError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a QueryValidationError but the call succeeded');
}
