/**
 * Sealed box: anonymous sender encryption.
 *
 * Wire format (libsodium `crypto_box_seal`):
 *
 *   ephemeral_pk (32) ‖ XSalsa20-Poly1305(plaintext) (len + 16)
 *
 * with nonce = BLAKE2b-192(ephemeral_pk ‖ recipient_pk). A fresh ephemeral
 * keypair per call makes every ciphertext distinct.
 */

import { DecryptionError, InvalidKeyError } from "../../errors.js";
import type { KeyPair } from "./key-manager.js";
import { getSodium } from "./sodium-loader.js";

export const PUBLIC_KEY_BYTES = 32;
/** Ephemeral public key plus Poly1305 tag. */
export const SEAL_OVERHEAD = 48;

/** Encrypt a message so only the holder of `recipientPublicKey` can open it. */
export async function seal(
  plaintext: Uint8Array,
  recipientPublicKey: Uint8Array,
): Promise<Uint8Array> {
  if (recipientPublicKey.length !== PUBLIC_KEY_BYTES) {
    throw new InvalidKeyError(
      `recipient public key must be ${PUBLIC_KEY_BYTES} bytes, got ${recipientPublicKey.length}`,
    );
  }
  const sodium = await getSodium();
  return sodium.crypto_box_seal(plaintext, recipientPublicKey);
}

/**
 * Decrypt a sealed-box ciphertext with the recipient's keypair.
 * @throws {DecryptionError} if the ciphertext is truncated, tampered, or sealed for another key
 */
export async function sealOpen(ciphertext: Uint8Array, recipient: KeyPair): Promise<Uint8Array> {
  if (ciphertext.length < SEAL_OVERHEAD) {
    throw new DecryptionError(
      `decryption failed: ciphertext is ${ciphertext.length} bytes, minimum is ${SEAL_OVERHEAD}`,
    );
  }

  const sodium = await getSodium();
  try {
    return sodium.crypto_box_seal_open(ciphertext, recipient.publicKey, recipient.privateKey);
  } catch (err) {
    throw new DecryptionError("decryption failed: invalid ciphertext or wrong key", {
      cause: err,
    });
  }
}
