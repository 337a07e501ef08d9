import { beforeAll, describe, expect, it } from "vitest";
import { KeyDerivationError } from "../../errors.js";
import {
  ARGON2_MEM_LIMIT,
  ARGON2_OPS_LIMIT,
  clampScalar,
  deriveKeyPair,
  SEED_BYTES,
} from "./key-derivation.js";
import type { KeyPair } from "./key-manager.js";
import { getSodium } from "./sodium-loader.js";

const toHex = (bytes: Uint8Array) => Buffer.from(bytes).toString("hex");

describe("deriveKeyPair", () => {
  const zeroSalt = new Uint8Array(16);
  let reference: KeyPair;

  beforeAll(async () => {
    reference = await deriveKeyPair("123456", zeroSalt);
  });

  it("matches the known-answer vector for PIN 123456 and an all-zero salt", () => {
    // Any change to the Argon2id parameters or the seed → scalar pipeline breaks this.
    expect(toHex(reference.publicKey)).toBe(
      "584d44d2c4b7ebf636a528b1c18c42499d9590b4a9480759888c7d99a64c005d",
    );
  });

  it("produces 32-byte halves", () => {
    expect(reference.publicKey).toHaveLength(32);
    expect(reference.privateKey).toHaveLength(32);
  });

  it("is deterministic", async () => {
    const again = await deriveKeyPair("123456", zeroSalt);
    expect(again.publicKey).toEqual(reference.publicKey);
    expect(again.privateKey).toEqual(reference.privateKey);
  });

  it("changes both halves when the PIN changes", async () => {
    const other = await deriveKeyPair("654321", zeroSalt);
    expect(other.publicKey).not.toEqual(reference.publicKey);
    expect(other.privateKey).not.toEqual(reference.privateKey);
  });

  it("changes both halves when the salt changes", async () => {
    const salt = new Uint8Array(16);
    salt[0] = 1;
    const other = await deriveKeyPair("123456", salt);
    expect(other.publicKey).not.toEqual(reference.publicKey);
    expect(other.privateKey).not.toEqual(reference.privateKey);
  });

  it("returns a clamped private scalar", () => {
    const sk = reference.privateKey;
    expect(sk[0] & 0b111).toBe(0);
    expect(sk[31] & 0x80).toBe(0);
    expect(sk[31] & 0x40).toBe(0x40);
  });

  it("agrees with libsodium's crypto_box_seed_keypair on the Argon2id seed", async () => {
    const sodium = await getSodium();
    const seed = sodium.crypto_pwhash(
      SEED_BYTES,
      "123456",
      zeroSalt,
      ARGON2_OPS_LIMIT,
      ARGON2_MEM_LIMIT,
      sodium.crypto_pwhash_ALG_ARGON2ID13,
    );
    const expected = sodium.crypto_box_seed_keypair(seed);

    expect(reference.publicKey).toEqual(expected.publicKey);
    expect(reference.privateKey).toEqual(expected.privateKey);
  });

  it("public key is the basepoint multiple of the private key", async () => {
    const sodium = await getSodium();
    expect(sodium.crypto_scalarmult_base(reference.privateKey)).toEqual(reference.publicKey);
  });

  it("accepts an empty PIN", async () => {
    const kp = await deriveKeyPair("", zeroSalt);
    expect(kp.publicKey).toHaveLength(32);
    expect(kp.publicKey).not.toEqual(reference.publicKey);
  });

  it("accepts a long PIN", async () => {
    const kp = await deriveKeyPair("A".repeat(1000), zeroSalt);
    expect(kp.publicKey).toHaveLength(32);
  });

  it("wraps libsodium's refusal of a non-16-byte salt", async () => {
    await expect(deriveKeyPair("123456", new Uint8Array(0))).rejects.toBeInstanceOf(
      KeyDerivationError,
    );
  });
});

describe("clampScalar", () => {
  it("clears the low three bits and the top bit, sets bit 254", () => {
    const scalar = clampScalar(new Uint8Array(32).fill(0xff));
    expect(scalar[0]).toBe(0xf8);
    expect(scalar[31]).toBe(0x7f);
    expect(scalar.subarray(1, 31).every((b) => b === 0xff)).toBe(true);
  });

  it("sets bit 254 on an all-zero input", () => {
    const scalar = clampScalar(new Uint8Array(32));
    expect(scalar[0]).toBe(0);
    expect(scalar[31]).toBe(0x40);
  });

  it("takes the first 32 bytes of a longer input without mutating it", () => {
    const digest = new Uint8Array(64).fill(0xff);
    const scalar = clampScalar(digest);
    expect(scalar).toHaveLength(32);
    expect(digest.every((b) => b === 0xff)).toBe(true);
  });

  it("rejects inputs shorter than a scalar", () => {
    expect(() => clampScalar(new Uint8Array(31))).toThrow(KeyDerivationError);
  });
});
