/**
 * Error codes raised by the bitforge codec primitives.
 *
 * Code ranges:
 * - 10-19: Argument errors (width, integer value, range)
 * - 20-29: Input data errors (bit-string shape, bit units, hex text)
 */
export const CodecErrorCodes = {
  /** Requested bit or byte width is negative or not an integer. */
  InvalidWidth: 10,

  /** Input number is not an exact integer (fraction, NaN or infinity). */
  InvalidInteger: 11,

  /** Integer does not fit the requested width and signedness. */
  OutOfRange: 12,

  /** Bit-string length is not a multiple of 8 where byte alignment is required. */
  MisalignedLength: 20,

  /** A bit-string unit is something other than 0 or 1. */
  InvalidBitUnit: 21,

  /** Hex text has an odd length or a non-hex character. */
  InvalidHexInput: 22,
} as const;

export type CodecErrorCode = (typeof CodecErrorCodes)[keyof typeof CodecErrorCodes];

/**
 * Offending values attached to a {@link CodecError}.
 */
export type CodecErrorDetails = Readonly<Record<string, number | bigint | boolean | string>>;

/**
 * Gets the name of an error code, e.g. `'OutOfRange'`.
 */
export function getCodecErrorName(code: number): string {
  for (const [name, value] of Object.entries(CodecErrorCodes)) {
    if (value === code) {
      return name;
    }
  }
  return 'UnknownError';
}

/**
 * Synchronous failure of a codec operation.
 * Always thrown before any part of the result is produced.
 */
export class CodecError extends Error {
  readonly code: CodecErrorCode;
  readonly details: CodecErrorDetails;

  constructor(code: CodecErrorCode, message: string, details: CodecErrorDetails = {}) {
    super(message);
    this.name = 'CodecError';
    this.code = code;
    this.details = details;
  }

  /**
   * Human-readable name of the error code.
   */
  get errorName(): string {
    return getCodecErrorName(this.code);
  }
}

/**
 * Check if a value is a CodecError, optionally with a specific code.
 */
export function isCodecError(value: unknown, code?: CodecErrorCode): value is CodecError {
  return value instanceof CodecError && (code === undefined || value.code === code);
}
