/**
 * Verifier: a sealed box of a fixed string, published next to the salt so a
 * freshly derived keypair can be checked before it is trusted.
 */

import type { KeyPair } from "./key-manager.js";
import { decodeBase64, encodeBase64 } from "./base64.js";
import { seal, sealOpen } from "./sealed-box.js";

/** Sealed by the server at PIN setup; part of the wire format, not a display string. */
export const VERIFIER_PLAINTEXT = "sunday-e2e-verify";

/** Seal {@link VERIFIER_PLAINTEXT} for `keyPair.publicKey`, base64-encoded. */
export async function createVerifier(keyPair: KeyPair): Promise<string> {
  const ciphertext = await seal(new TextEncoder().encode(VERIFIER_PLAINTEXT), keyPair.publicKey);
  return encodeBase64(ciphertext);
}

/**
 * Whether `keyPair` opens `verifierB64` to exactly {@link VERIFIER_PLAINTEXT}.
 * Decoding and decryption failures mean "no"; this never throws.
 */
export async function verify(keyPair: KeyPair, verifierB64: string): Promise<boolean> {
  try {
    const ciphertext = await decodeBase64(verifierB64, "verifier");
    const plaintext = await sealOpen(ciphertext, keyPair);
    return new TextDecoder().decode(plaintext) === VERIFIER_PLAINTEXT;
  } catch {
    return false;
  }
}
