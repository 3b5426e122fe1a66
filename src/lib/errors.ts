export type DerivationErrorCode =
  | "invalid_input"
  | "encoding_range"
  | "hash_configuration";

export class DerivationError extends Error {
  constructor(
    public readonly code: DerivationErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "DerivationError";
  }

  toJSON(): { error: string; code: DerivationErrorCode; message: string } {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/** Malformed or negative input. */
export class InvalidInputError extends DerivationError {
  constructor(message: string) {
    super("invalid_input", message);
    this.name = "InvalidInputError";
  }
}

/** Combined value does not fit the fixed 32-byte field. */
export class EncodingRangeError extends DerivationError {
  constructor(message: string) {
    super("encoding_range", message);
    this.name = "EncodingRangeError";
  }
}

/** The hash primitive failed or returned something other than a 32-byte digest. */
export class HashConfigurationError extends DerivationError {
  constructor(message: string, options?: ErrorOptions) {
    super("hash_configuration", message, options);
    this.name = "HashConfigurationError";
  }
}
