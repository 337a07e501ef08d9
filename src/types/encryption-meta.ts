import { z } from "zod";

/**
 * Encryption metadata published by the server for the signed-in user.
 * All three fields are standard base64; an empty `publicKey` means the user
 * has not finished PIN setup.
 */
export const encryptionMetaSchema = z.object({
  salt: z.string(),
  verifier: z.string(),
  publicKey: z.string(),
});

export type EncryptionMeta = z.infer<typeof encryptionMetaSchema>;
