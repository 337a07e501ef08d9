import type { EncryptionMeta } from "../types/encryption-meta.js";

/** Fetches the user's encryption metadata (implemented by the API client). */
export interface EncryptionMetaSource {
  getEncryptionMeta(): Promise<EncryptionMeta>;
}
