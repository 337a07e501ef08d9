import type { EncryptionMeta } from "../types/encryption-meta.js";
import { encodeBase64 } from "../utils/crypto/base64.js";
import { deriveKeyPair } from "../utils/crypto/key-derivation.js";
import type { KeyPair } from "../utils/crypto/key-manager.js";
import { createVerifier } from "../utils/crypto/verifier.js";

export interface EncryptionFixture {
  keyPair: KeyPair;
  meta: EncryptionMeta;
}

/**
 * Play the server's part of PIN setup: derive the keypair for `pin` and
 * `salt` and publish salt, verifier and public key the way the API does.
 */
export async function createEncryptionFixture(
  pin: string,
  salt: Uint8Array = new Uint8Array(16),
): Promise<EncryptionFixture> {
  const keyPair = await deriveKeyPair(pin, salt);
  return {
    keyPair,
    meta: {
      salt: await encodeBase64(salt),
      verifier: await createVerifier(keyPair),
      publicKey: await encodeBase64(keyPair.publicKey),
    },
  };
}
