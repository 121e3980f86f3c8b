/**
 * Raised when the optimizer is handed values it cannot represent
 * (a disallowed text encoding, a non-integer in an integer collection, ...)
 */
export class EncodingError extends Error {
  readonly kind = "EncodingError" as const;

  constructor(message: string) {
    super(message);
    this.name = "EncodingError";
  }
}
