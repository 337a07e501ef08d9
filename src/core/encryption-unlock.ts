/**
 * Unlock flow run after sign-in: fetch the server's encryption metadata,
 * obtain the keypair through the session manager, and make sure it is the
 * keypair the server has on record.
 */

import { InvalidMetadataError } from "../errors.js";
import type { EncryptionMetaSource } from "../interfaces/encryption-meta-source.js";
import type { Logger } from "../interfaces/logger.js";
import { encryptionMetaSchema } from "../types/encryption-meta.js";
import { decodeBase64 } from "../utils/crypto/base64.js";
import type { KeyPair, PersistedKeyPair } from "../utils/crypto/key-manager.js";
import {
  assertPublicKeyMatches,
  encodeKeyPair,
  fingerprintPublicKey,
} from "../utils/crypto/key-manager.js";
import { noopLogger } from "../utils/noop-logger.js";
import type { SessionKeyManager } from "./session-key-manager.js";

export type UnlockResult =
  | { status: "not-configured" }
  | { status: "unlocked"; keyPair: KeyPair; persisted: PersistedKeyPair };

export interface UnlockEncryptionOptions {
  metaSource: EncryptionMetaSource;
  manager: SessionKeyManager;
  logger?: Logger;
}

/**
 * @returns `not-configured` when the user has no public key on record yet,
 *   otherwise the verified keypair and its persisted form
 * @throws {InvalidMetadataError} when the metadata does not have the expected shape
 * @throws {KeyMismatchError} when the derived public key differs from the server's;
 *   the session cache is cleared first
 */
export async function unlockEncryption(options: UnlockEncryptionOptions): Promise<UnlockResult> {
  const { metaSource, manager, logger = noopLogger } = options;

  const parsed = encryptionMetaSchema.safeParse(await metaSource.getEncryptionMeta());
  if (!parsed.success) {
    throw new InvalidMetadataError(`Invalid encryption metadata: ${parsed.error.message}`);
  }
  const meta = parsed.data;

  if (meta.publicKey === "") {
    logger.info("Encryption not set up yet; PIN setup has not been completed");
    return { status: "not-configured" };
  }

  const expectedPublicKey = await decodeBase64(meta.publicKey, "public key");
  const keyPair = await manager.getOrPrompt(meta.salt, meta.verifier);

  try {
    await assertPublicKeyMatches(keyPair.publicKey, expectedPublicKey);
  } catch (err) {
    logger.error("Derived public key differs from server record", {
      derived: fingerprintPublicKey(keyPair.publicKey),
      expected: fingerprintPublicKey(expectedPublicKey),
    });
    manager.clear();
    throw err;
  }

  return { status: "unlocked", keyPair, persisted: await encodeKeyPair(keyPair) };
}
