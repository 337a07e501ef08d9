/**
 * pinbox public API barrel.
 *
 * PIN-derived X25519 keypairs, libsodium-compatible sealed boxes, encrypted
 * field decoding, and the session object that ties them to PIN entry.
 * @module
 */

export type { TtyInput, TtyPinSourceOptions } from "./adapters/tty-pin-source.js";
export { TtyPinSource } from "./adapters/tty-pin-source.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export type { UnlockEncryptionOptions, UnlockResult } from "./core/encryption-unlock.js";
export { unlockEncryption } from "./core/encryption-unlock.js";
export { PIN_LENGTH, parsePin } from "./core/pin-format.js";
export type { SessionKeyManagerOptions } from "./core/session-key-manager.js";
export { MAX_PIN_ATTEMPTS, SessionKeyManager } from "./core/session-key-manager.js";
export {
  DecodingError,
  DecryptionError,
  E2EError,
  errorMessage,
  InvalidKeyError,
  InvalidMetadataError,
  KeyDerivationError,
  KeyMismatchError,
  MaxAttemptsExceededError,
  NonInteractiveInputError,
  PinEntryAbortedError,
  PinEntryTimeoutError,
  PinFormatError,
  toE2EError,
} from "./errors.js";
export type { EncryptionMetaSource } from "./interfaces/encryption-meta-source.js";
export type { Logger } from "./interfaces/logger.js";
export type { PinSource } from "./interfaces/pin-source.js";
export type { ResolvedSessionConfig, SessionConfig } from "./types/config.js";
export { DEFAULT_SESSION_CONFIG, resolveSessionConfig } from "./types/config.js";
export type { EncryptionMeta } from "./types/encryption-meta.js";
export { encryptionMetaSchema } from "./types/encryption-meta.js";
export * from "./utils/crypto/index.js";
export { noopLogger } from "./utils/noop-logger.js";
