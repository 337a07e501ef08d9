export class E2EError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "E2EError";
    this.code = code;
  }
}

// ── Codec errors ──

/** Malformed base64 at any boundary (salt, verifier, field payload, stored key). */
export class DecodingError extends E2EError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "DECODING", options);
    this.name = "DecodingError";
  }
}

/** Sealed box could not be opened: truncated, tampered, or sealed for another key. */
export class DecryptionError extends E2EError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "DECRYPTION", options);
    this.name = "DecryptionError";
  }
}

export class InvalidKeyError extends E2EError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "INVALID_KEY", options);
    this.name = "InvalidKeyError";
  }
}

export class KeyDerivationError extends E2EError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "KEY_DERIVATION", options);
    this.name = "KeyDerivationError";
  }
}

/** A derived public key differs from the one recorded by the server. */
export class KeyMismatchError extends E2EError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "KEY_MISMATCH", options);
    this.name = "KeyMismatchError";
  }
}

// ── PIN entry errors ──

export class PinFormatError extends E2EError {
  constructor(message = "PIN must be exactly 6 digits", options?: ErrorOptions) {
    super(message, "PIN_FORMAT", options);
    this.name = "PinFormatError";
  }
}

export class NonInteractiveInputError extends E2EError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "NON_INTERACTIVE", options);
    this.name = "NonInteractiveInputError";
  }
}

export class PinEntryAbortedError extends E2EError {
  constructor(message = "PIN entry cancelled", options?: ErrorOptions) {
    super(message, "PIN_ABORTED", options);
    this.name = "PinEntryAbortedError";
  }
}

export class PinEntryTimeoutError extends E2EError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "PIN_TIMEOUT", options);
    this.name = "PinEntryTimeoutError";
  }
}

export class MaxAttemptsExceededError extends E2EError {
  constructor(message = "maximum PIN attempts exceeded", options?: ErrorOptions) {
    super(message, "MAX_ATTEMPTS", options);
    this.name = "MaxAttemptsExceededError";
  }
}

// ── Collaborator errors ──

export class InvalidMetadataError extends E2EError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "INVALID_METADATA", options);
    this.name = "InvalidMetadataError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to E2EError (preserves cause chain). */
export function toE2EError(value: unknown): E2EError {
  if (value instanceof E2EError) return value;
  if (value instanceof Error) return new E2EError(value.message, "UNKNOWN", { cause: value });
  return new E2EError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
