export { decodeBase64, encodeBase64 } from "./base64.js";
export {
  decryptField,
  ENCRYPTED_PREFIX,
  encryptField,
  isEncrypted,
  tryDecryptField,
} from "./field-codec.js";
export {
  ARGON2_MEM_LIMIT,
  ARGON2_OPS_LIMIT,
  ARGON2_PARALLELISM,
  clampScalar,
  deriveKeyPair,
  SALT_BYTES,
  SEED_BYTES,
} from "./key-derivation.js";
export type { KeyPair, PersistedKeyPair } from "./key-manager.js";
export {
  assertPublicKeyMatches,
  decodeKeyPair,
  destroyKey,
  encodeKeyPair,
  fingerprintPublicKey,
  generateKeyPair,
  KEY_BYTES,
} from "./key-manager.js";
export { PUBLIC_KEY_BYTES, SEAL_OVERHEAD, seal, sealOpen } from "./sealed-box.js";
export type { Sodium } from "./sodium-loader.js";
export { getSodium } from "./sodium-loader.js";
export { createVerifier, VERIFIER_PLAINTEXT, verify } from "./verifier.js";
