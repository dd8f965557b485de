/**
 * Error types for Metablock core.
 * Every failure raised while decoding, building or verifying signed metadata
 * is one of these, including failures caused by adversarial input.
 */

/**
 * Base class for all Metablock-specific errors.
 */
export class MetablockError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Malformed path, malformed raw bytes, or a document that does not parse
 * against its declared schema.
 */
export class EncodingError extends MetablockError {
  constructor(message: string) {
    super(message, 'ENCODING_ERROR');
  }
}

/**
 * Error for detailed AJV validation failures with multiple field errors.
 */
export class SchemaValidationError extends EncodingError {
  constructor(
    typeName: string,
    public readonly errors: Array<{
      field: string;
      message: string;
      value: unknown;
    }>
  ) {
    const errorSummary = errors
      .map(err => `${err.field}: ${err.message}`)
      .join(', ');

    super(`${typeName} validation failed: ${errorSummary}`);
  }
}

/**
 * An operation was called with structurally incompatible inputs.
 */
export class IllegalArgumentError extends MetablockError {
  constructor(message: string) {
    super(message, 'ILLEGAL_ARGUMENT');
  }
}

/**
 * Threshold verification failed. `satisfied` and `required` are set when the
 * failure is an unmet threshold.
 */
export class VerificationFailureError extends MetablockError {
  constructor(
    message: string,
    public readonly satisfied?: number,
    public readonly required?: number
  ) {
    super(message, 'VERIFICATION_FAILURE');
  }
}

/**
 * A single signature did not verify against the key it claims.
 */
export class SignatureVerificationError extends MetablockError {
  constructor(message: string = "Signature verification failed.", public readonly keyId?: string) {
    super(message, 'BAD_SIGNATURE');
  }
}

export class KeyFormatError extends MetablockError {
  constructor(message: string) {
    super(message, 'INVALID_KEY_FORMAT');
  }
}
