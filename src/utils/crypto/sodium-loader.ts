/**
 * Sodium loader: initializes and caches the libsodium WASM build.
 *
 * The sumo build is required: `crypto_pwhash`, `crypto_hash_sha512` and
 * `crypto_scalarmult_base` are not part of the standard wrappers.
 */

import type libsodiumSumo from "libsodium-wrappers-sumo";

export type Sodium = typeof libsodiumSumo;

let pending: Promise<Sodium> | undefined;

/**
 * Returns an initialized libsodium instance.
 * Concurrent first callers share a single initialization.
 */
export function getSodium(): Promise<Sodium> {
  pending ??= load();
  return pending;
}

async function load(): Promise<Sodium> {
  try {
    const sodium = (await import("libsodium-wrappers-sumo")).default;
    await sodium.ready;
    return sodium;
  } catch (err) {
    pending = undefined;
    throw err;
  }
}
