import { sessionConfigSchema } from "../config/config-schema.js";

/**
 * Session configuration. Derivation parameters and the PIN attempt budget are
 * fixed by the protocol and deliberately absent here.
 */
export interface SessionConfig {
  /** Text written to the terminal before reading the PIN */
  pinPrompt?: string; // default: "Enter your 6-digit encryption PIN: "
  /** Per-attempt limit on PIN entry; expiry counts as a failed attempt */
  pinTimeoutMs?: number; // default: 0 (wait indefinitely)
}

export type ResolvedSessionConfig = Required<SessionConfig>;

export const DEFAULT_SESSION_CONFIG: ResolvedSessionConfig = {
  pinPrompt: "Enter your 6-digit encryption PIN: ",
  pinTimeoutMs: 0,
};

export function resolveSessionConfig(config: SessionConfig = {}): ResolvedSessionConfig {
  const validation = sessionConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new Error(`Invalid configuration: ${validation.error.message}`);
  }

  return {
    pinPrompt: config.pinPrompt ?? DEFAULT_SESSION_CONFIG.pinPrompt,
    pinTimeoutMs: config.pinTimeoutMs ?? DEFAULT_SESSION_CONFIG.pinTimeoutMs,
  };
}
