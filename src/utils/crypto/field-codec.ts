/**
 * Encrypted field values: the `e2e::<base64>` strings carried inside
 * otherwise plain API payloads.
 *
 * The prefix is the only discriminator: a value without it is plaintext and
 * passes through untouched.
 */

import { DecryptionError } from "../../errors.js";
import type { Logger } from "../../interfaces/logger.js";
import { noopLogger } from "../noop-logger.js";
import { decodeBase64, encodeBase64 } from "./base64.js";
import type { KeyPair } from "./key-manager.js";
import { fingerprintPublicKey } from "./key-manager.js";
import { seal, sealOpen } from "./sealed-box.js";

export const ENCRYPTED_PREFIX = "e2e::";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

/** Whether `value` carries the encrypted-field prefix. */
export function isEncrypted(value: string): boolean {
  return value.startsWith(ENCRYPTED_PREFIX);
}

/** Seal a UTF-8 string for `recipientPublicKey` and tag it. */
export async function encryptField(plaintext: string, recipientPublicKey: Uint8Array): Promise<string> {
  const ciphertext = await seal(encoder.encode(plaintext), recipientPublicKey);
  return ENCRYPTED_PREFIX + (await encodeBase64(ciphertext));
}

/**
 * Decrypt a tagged value; untagged values are returned unchanged.
 * @throws {DecodingError} when the payload is not valid base64
 * @throws {DecryptionError} when the sealed box does not open (including an empty
 *   payload) or opens to bytes that are not valid UTF-8
 */
export async function decryptField(value: string, keyPair: KeyPair): Promise<string> {
  if (!isEncrypted(value)) return value;

  const ciphertext = await decodeBase64(value.slice(ENCRYPTED_PREFIX.length), "ciphertext");
  const plaintext = await sealOpen(ciphertext, keyPair);
  try {
    return decoder.decode(plaintext);
  } catch (err) {
    throw new DecryptionError("decryption failed: plaintext is not valid UTF-8", { cause: err });
  } finally {
    plaintext.fill(0);
  }
}

/**
 * Display-path variant of {@link decryptField}: on failure it logs a warning
 * and returns the original value so the caller always has something to show.
 */
export async function tryDecryptField(
  value: string,
  keyPair: KeyPair,
  logger: Logger = noopLogger,
): Promise<string> {
  try {
    return await decryptField(value, keyPair);
  } catch (err) {
    logger.warn("could not decrypt field", {
      error: err,
      key: fingerprintPublicKey(keyPair.publicKey),
    });
    return value;
  }
}
