/**
 * Key management: keypair shape, the base64 form handed to credential
 * storage, secret zeroing, fingerprints and the public-key match check.
 */

import { InvalidKeyError, KeyMismatchError } from "../../errors.js";
import { decodeBase64, encodeBase64 } from "./base64.js";
import { getSodium } from "./sodium-loader.js";

export const KEY_BYTES = 32;

export interface KeyPair {
  publicKey: Uint8Array;
  /** Clamped X25519 scalar. Never log or serialize outside {@link encodeKeyPair}. */
  privateKey: Uint8Array;
}

/** Standard base64 of both halves, as kept by the caller's credential store. */
export interface PersistedKeyPair {
  publicKey: string;
  privateKey: string;
}

/** Generate a random X25519 keypair (not PIN-derived). */
export async function generateKeyPair(): Promise<KeyPair> {
  const sodium = await getSodium();
  const kp = sodium.crypto_box_keypair();
  return { publicKey: kp.publicKey, privateKey: kp.privateKey };
}

/** Zero-fill a secret key, rendering it unusable. */
export function destroyKey(secretKey: Uint8Array): void {
  secretKey.fill(0);
}

/** First 8 bytes of a public key, encoded as lowercase hex. */
export function fingerprintPublicKey(pk: Uint8Array): string {
  return Buffer.from(pk.subarray(0, 8)).toString("hex");
}

export async function encodeKeyPair(kp: KeyPair): Promise<PersistedKeyPair> {
  return {
    publicKey: await encodeBase64(kp.publicKey),
    privateKey: await encodeBase64(kp.privateKey),
  };
}

/**
 * Restore a keypair from its persisted form.
 * @throws {DecodingError} on malformed base64
 * @throws {InvalidKeyError} when either half is not 32 bytes
 */
export async function decodeKeyPair(persisted: PersistedKeyPair): Promise<KeyPair> {
  const privateKey = await decodeBase64(persisted.privateKey, "private key");
  if (privateKey.length !== KEY_BYTES) {
    throw new InvalidKeyError(
      `private key has invalid length ${privateKey.length}, expected ${KEY_BYTES}`,
    );
  }

  const publicKey = await decodeBase64(persisted.publicKey, "public key");
  if (publicKey.length !== KEY_BYTES) {
    throw new InvalidKeyError(
      `public key has invalid length ${publicKey.length}, expected ${KEY_BYTES}`,
    );
  }

  return { publicKey, privateKey };
}

/**
 * Compare a derived public key with an independently supplied one in
 * constant time.
 * @throws {KeyMismatchError} when they differ
 */
export async function assertPublicKeyMatches(
  derived: Uint8Array,
  expected: Uint8Array,
): Promise<void> {
  const sodium = await getSodium();
  if (derived.length !== expected.length || !sodium.memcmp(derived, expected)) {
    throw new KeyMismatchError(
      "derived public key does not match server record; possible data corruption",
    );
  }
}
