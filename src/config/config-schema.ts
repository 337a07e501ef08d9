import { z } from "zod";

export const sessionConfigSchema = z.object({
  // PIN entry
  pinPrompt: z.string().min(1).optional(),
  pinTimeoutMs: z.number().int().min(0).optional(),
});
