/**
 * PIN → keypair derivation.
 *
 * Mirrors what the server does with libsodium:
 *
 *   seed       = crypto_pwhash(32, pin, salt, OPS, MEM, ARGON2ID13)
 *   privateKey = clamp(SHA-512(seed)[0..32])
 *   publicKey  = crypto_scalarmult_base(privateKey)
 *
 * which is exactly `crypto_box_seed_keypair(seed)`. The parameters below are
 * a compatibility contract with keys already derived server-side; changing any
 * of them derives different keys from the same PIN.
 */

import { errorMessage, KeyDerivationError } from "../../errors.js";
import type { KeyPair } from "./key-manager.js";
import { getSodium } from "./sodium-loader.js";

export const ARGON2_OPS_LIMIT = 3;
/** 64 MiB. libsodium takes bytes; Argon2 itself sees 65536 KiB. */
export const ARGON2_MEM_LIMIT = 64 * 1024 * 1024;
/** libsodium's crypto_pwhash always runs a single lane. */
export const ARGON2_PARALLELISM = 1;
export const SEED_BYTES = 32;
export const SALT_BYTES = 16;
export const SCALAR_BYTES = 32;

/** Return a clamped copy of the first 32 bytes of `bytes` (RFC 7748 §5). */
export function clampScalar(bytes: Uint8Array): Uint8Array {
  if (bytes.length < SCALAR_BYTES) {
    throw new KeyDerivationError(`scalar needs ${SCALAR_BYTES} bytes, got ${bytes.length}`);
  }
  const scalar = bytes.slice(0, SCALAR_BYTES);
  scalar[0] &= 248;
  scalar[31] &= 127;
  scalar[31] |= 64;
  return scalar;
}

/**
 * Derive the X25519 keypair for `pin` and `salt`.
 *
 * The PIN is not format-checked here; that happens at the PIN source. Any
 * string derives to some key, the empty string included. The salt must be
 * {@link SALT_BYTES} long because libsodium refuses any other length.
 *
 * @throws {KeyDerivationError} when libsodium rejects the inputs
 */
export async function deriveKeyPair(pin: string, salt: Uint8Array): Promise<KeyPair> {
  const sodium = await getSodium();

  let seed: Uint8Array;
  try {
    seed = sodium.crypto_pwhash(
      SEED_BYTES,
      pin,
      salt,
      ARGON2_OPS_LIMIT,
      ARGON2_MEM_LIMIT,
      sodium.crypto_pwhash_ALG_ARGON2ID13,
    );
  } catch (err) {
    throw new KeyDerivationError(`Argon2id derivation failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const digest = sodium.crypto_hash_sha512(seed);
  const privateKey = clampScalar(digest);
  sodium.memzero(seed);
  sodium.memzero(digest);

  const publicKey = sodium.crypto_scalarmult_base(privateKey);
  return { publicKey, privateKey };
}
