// Result types for adapter responses

/**
 * Represents the outcome of an operation that may succeed or fail.
 * Discriminated union prevents invalid states.
 */
export type Result<T> =
  | { readonly success: true; readonly data: T; readonly message: string }        // Success with data
  | { readonly success: true; readonly message: string }                          // Success without data (not found)
  | { readonly success: false; readonly message: string };                        // Failure

export type Success<T> = { readonly success: true; readonly data: T; readonly message: string };

/**
 * Type guard to check if Result has data (success with data case).
 */
export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success && 'data' in result;
}

/**
 * Type guard to check if Result is not found (success without data case).
 */
export function isNotFound<T>(result: Result<T>): result is { readonly success: true; readonly message: string } {
  return result.success && !('data' in result);
}

/**
 * Type guard to check if Result is a failure.
 */
export function isFailure<T>(result: Result<T>): result is { readonly success: false; readonly message: string } {
  return !result.success;
}

/**
 * Unwraps a Result into its data, throwing with the result message otherwise.
 * Used at service boundaries where missing reference data is fatal.
 */
export function unwrapResult<T>(result: Result<T>, what: string): T {
  if (isSuccess(result)) {
    return result.data;
  }
  if (isNotFound(result)) {
    throw new Error(`${what} not available: ${result.message}`);
  }
  throw new Error(`${what} failed to load: ${result.message}`);
}
