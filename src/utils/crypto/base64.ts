/**
 * Standard-alphabet, padded base64 (RFC 4648 §4): the only encoding used
 * on the wire for salts, verifiers, public keys and field payloads.
 *
 * Decoding is strict: URL-safe characters, missing padding and embedded
 * whitespace are rejected rather than normalized.
 */

import { DecodingError } from "../../errors.js";
import { getSodium } from "./sodium-loader.js";

export async function encodeBase64(bytes: Uint8Array): Promise<string> {
  if (bytes.length === 0) return "";
  const sodium = await getSodium();
  return sodium.to_base64(bytes, sodium.base64_variants.ORIGINAL);
}

/** Decode `value`; `label` names the input in the error message. */
export async function decodeBase64(value: string, label = "input"): Promise<Uint8Array> {
  if (value.length === 0) return new Uint8Array(0);
  const sodium = await getSodium();
  try {
    return sodium.from_base64(value, sodium.base64_variants.ORIGINAL);
  } catch (err) {
    throw new DecodingError(`decoding base64 ${label}: invalid encoding`, { cause: err });
  }
}
