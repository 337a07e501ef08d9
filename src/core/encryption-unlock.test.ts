import { beforeAll, describe, expect, it, vi } from "vitest";
import { DecodingError, InvalidMetadataError, KeyMismatchError } from "../errors.js";
import type { EncryptionFixture } from "../testing/fixtures.js";
import { createEncryptionFixture } from "../testing/fixtures.js";
import { MemoryEncryptionMetaSource } from "../testing/memory-encryption-meta-source.js";
import { ScriptedPinSource } from "../testing/scripted-pin-source.js";
import { encodeBase64 } from "../utils/crypto/base64.js";
import { generateKeyPair } from "../utils/crypto/key-manager.js";
import { unlockEncryption } from "./encryption-unlock.js";
import { SessionKeyManager } from "./session-key-manager.js";

const PIN = "246810";

describe("unlockEncryption", () => {
  let fixture: EncryptionFixture;

  beforeAll(async () => {
    fixture = await createEncryptionFixture(PIN, new Uint8Array(16).fill(9));
  });

  function setup(answers: string[] = [PIN]) {
    const pinSource = new ScriptedPinSource(answers);
    const manager = new SessionKeyManager({ pinSource, notify: vi.fn() });
    return { pinSource, manager };
  }

  it("reports not-configured when the server has no public key", async () => {
    const { pinSource, manager } = setup();
    const metaSource = new MemoryEncryptionMetaSource({ salt: "", verifier: "", publicKey: "" });

    const result = await unlockEncryption({ metaSource, manager });

    expect(result).toEqual({ status: "not-configured" });
    expect(pinSource.prompts).toHaveLength(0);
  });

  it("unlocks and returns the persisted form of the verified keypair", async () => {
    const { manager } = setup();
    const metaSource = new MemoryEncryptionMetaSource(fixture.meta);

    const result = await unlockEncryption({ metaSource, manager });

    expect(result.status).toBe("unlocked");
    if (result.status !== "unlocked") return;
    expect(result.keyPair.publicKey).toEqual(fixture.keyPair.publicKey);
    expect(result.persisted).toEqual({
      publicKey: fixture.meta.publicKey,
      privateKey: await encodeBase64(fixture.keyPair.privateKey),
    });
    expect(manager.isCached()).toBe(true);
  });

  it("reuses the cached keypair on a second unlock", async () => {
    const { pinSource, manager } = setup();
    const metaSource = new MemoryEncryptionMetaSource(fixture.meta);

    await unlockEncryption({ metaSource, manager });
    await unlockEncryption({ metaSource, manager });

    expect(metaSource.fetchCount).toBe(2);
    expect(pinSource.prompts).toHaveLength(1);
  });

  it("rejects a keypair that differs from the server record and clears the cache", async () => {
    const { manager } = setup();
    const stranger = await generateKeyPair();
    const metaSource = new MemoryEncryptionMetaSource({
      ...fixture.meta,
      publicKey: await encodeBase64(stranger.publicKey),
    });
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    await expect(unlockEncryption({ metaSource, manager, logger })).rejects.toBeInstanceOf(
      KeyMismatchError,
    );
    expect(manager.isCached()).toBe(false);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it("rejects a public key that is not base64 before prompting", async () => {
    const { pinSource, manager } = setup();
    const metaSource = new MemoryEncryptionMetaSource({ ...fixture.meta, publicKey: "%%%" });

    await expect(unlockEncryption({ metaSource, manager })).rejects.toBeInstanceOf(DecodingError);
    expect(pinSource.prompts).toHaveLength(0);
  });

  it("rejects metadata of the wrong shape", async () => {
    const { manager } = setup();
    const metaSource = {
      getEncryptionMeta: async () => JSON.parse('{"salt":"AAAA","verifier":7}'),
    };

    await expect(unlockEncryption({ metaSource, manager })).rejects.toBeInstanceOf(
      InvalidMetadataError,
    );
  });
});
