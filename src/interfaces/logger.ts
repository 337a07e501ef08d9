/**
 * Minimal structured logger interface.
 * StructuredLogger implements it; hosts may pass their own.
 *
 * Callers never put PINs, private keys or decrypted plaintext in `ctx`;
 * keys are identified by public-key fingerprint.
 * @module
 */

/** Structured logger with optional debug level. */
export interface Logger {
  debug?(msg: string, ctx?: Record<string, unknown>): void;
  info(msg: string, ctx?: Record<string, unknown>): void;
  warn(msg: string, ctx?: Record<string, unknown>): void;
  error(msg: string, ctx?: Record<string, unknown>): void;
}
