import { CodecError } from './CodecError.js';

type Outcome<T> =
  | { readonly isSuccess: true; readonly value: T }
  | { readonly isSuccess: false; readonly error: CodecError };

/**
 * Represents the result of a codec call, containing either the decoded/encoded value
 * or the error that stopped it.
 * @typeParam T - The value type on success.
 */
export class CodecResult<T> {
  private readonly outcome: Outcome<T>;

  private constructor(outcome: Outcome<T>) {
    this.outcome = outcome;
  }

  /**
   * Creates a successful result.
   */
  static success<T>(value: T): CodecResult<T> {
    return new CodecResult<T>({ isSuccess: true, value });
  }

  /**
   * Creates a failed result.
   */
  static failure<T>(error: CodecError): CodecResult<T> {
    return new CodecResult<T>({ isSuccess: false, error });
  }

  /**
   * Whether the codec call succeeded.
   */
  get isSuccess(): boolean {
    return this.outcome.isSuccess;
  }

  /**
   * The value. Only set when isSuccess is true.
   */
  get value(): T | undefined {
    return this.outcome.isSuccess ? this.outcome.value : undefined;
  }

  /**
   * Error details. Only set when isSuccess is false.
   */
  get error(): CodecError | undefined {
    return this.outcome.isSuccess ? undefined : this.outcome.error;
  }

  /**
   * Gets the value if successful, or throws the original CodecError.
   */
  getValueOrThrow(): T {
    if (this.outcome.isSuccess) {
      return this.outcome.value;
    }
    throw this.outcome.error;
  }
}

/**
 * Runs a synchronous codec operation and captures a CodecError as a failed result.
 * Anything else thrown by the operation propagates unchanged.
 *
 * @example
 * ```typescript
 * const result = tryCodec(() => unhexlify(userInput));
 * if (!result.isSuccess) {
 *   console.warn(result.error?.message);
 * }
 * ```
 */
export function tryCodec<T>(operation: () => T): CodecResult<T> {
  try {
    return CodecResult.success(operation());
  } catch (error) {
    if (error instanceof CodecError) {
      return CodecResult.failure(error);
    }
    throw error;
  }
}
