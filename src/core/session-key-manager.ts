/**
 * SessionKeyManager: holds the PIN-derived keypair for one session.
 *
 * Empty ──getOrPrompt()──▶ Cached ──clear()──▶ Empty
 *
 * Each instance is one session; hosts serving several users create one per
 * user. A keypair is cached only after it opened the server's verifier.
 */

import { MaxAttemptsExceededError, PinEntryTimeoutError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { PinSource } from "../interfaces/pin-source.js";
import type { ResolvedSessionConfig, SessionConfig } from "../types/config.js";
import { resolveSessionConfig } from "../types/config.js";
import { decodeBase64 } from "../utils/crypto/base64.js";
import { deriveKeyPair } from "../utils/crypto/key-derivation.js";
import type { KeyPair } from "../utils/crypto/key-manager.js";
import { destroyKey, fingerprintPublicKey } from "../utils/crypto/key-manager.js";
import { verify } from "../utils/crypto/verifier.js";
import { noopLogger } from "../utils/noop-logger.js";

/** PIN entries allowed per getOrPrompt() before giving up. */
export const MAX_PIN_ATTEMPTS = 3;

export interface SessionKeyManagerOptions {
  pinSource: PinSource;
  config?: SessionConfig;
  logger?: Logger;
  /** User-facing messages such as "Incorrect PIN". Defaults to stderr. */
  notify?: (message: string) => void;
}

export class SessionKeyManager {
  private readonly pinSource: PinSource;
  private readonly config: ResolvedSessionConfig;
  private readonly logger: Logger;
  private readonly notify: (message: string) => void;

  private cached: KeyPair | null = null;
  private inFlight: Promise<KeyPair> | null = null;
  /** Bumped by clear() so an unlock that finishes afterwards does not repopulate the cache. */
  private generation = 0;

  constructor(options: SessionKeyManagerOptions) {
    this.pinSource = options.pinSource;
    this.config = resolveSessionConfig(options.config);
    this.logger = options.logger ?? noopLogger;
    this.notify = options.notify ?? ((message) => process.stderr.write(`${message}\n`));
  }

  /**
   * Return the cached keypair, or prompt for the PIN until one derives a
   * keypair that opens `verifierB64`.
   *
   * Concurrent callers share a single prompt until {@link clear} is called;
   * a call made after that starts its own.
   *
   * @param saltB64 - base64 16-byte Argon2id salt from the server
   * @param verifierB64 - base64 sealed verifier from the server
   * @throws {DecodingError} if the salt is not valid base64
   * @throws {MaxAttemptsExceededError} after {@link MAX_PIN_ATTEMPTS} wrong or timed-out PINs
   */
  async getOrPrompt(saltB64: string, verifierB64: string): Promise<KeyPair> {
    if (this.cached) return this.cached;
    if (this.inFlight) return this.inFlight;

    const pending = this.unlock(saltB64, verifierB64);
    this.inFlight = pending;
    try {
      return await pending;
    } finally {
      if (this.inFlight === pending) this.inFlight = null;
    }
  }

  /**
   * Drop the cached keypair (e.g. on logout). The private key is zero-filled,
   * so references obtained earlier stop working too.
   */
  clear(): void {
    this.generation++;
    this.inFlight = null;
    if (!this.cached) return;
    destroyKey(this.cached.privateKey);
    this.cached = null;
    this.logger.info("Session key cleared");
  }

  isCached(): boolean {
    return this.cached !== null;
  }

  /** The cached keypair, without prompting. */
  peek(): KeyPair | null {
    return this.cached;
  }

  private async unlock(saltB64: string, verifierB64: string): Promise<KeyPair> {
    const generation = this.generation;
    const salt = await decodeBase64(saltB64, "salt");

    for (let attempt = 1; attempt <= MAX_PIN_ATTEMPTS; attempt++) {
      const remaining = MAX_PIN_ATTEMPTS - attempt;

      let pin: string;
      try {
        pin = await this.readPin();
      } catch (err) {
        if (!(err instanceof PinEntryTimeoutError)) throw err;
        this.logger.warn("PIN entry timed out", { attempt });
        if (remaining > 0) this.notify(`PIN entry timed out. ${remaining} attempt(s) remaining.`);
        continue;
      }

      const keyPair = await deriveKeyPair(pin, salt);
      if (await verify(keyPair, verifierB64)) {
        if (generation === this.generation) this.cached = keyPair;
        this.logger.info("Session key unlocked", {
          attempt,
          fingerprint: fingerprintPublicKey(keyPair.publicKey),
        });
        return keyPair;
      }

      destroyKey(keyPair.privateKey);
      this.logger.warn("PIN did not open verifier", { attempt });
      if (remaining > 0) this.notify(`Incorrect PIN. ${remaining} attempt(s) remaining.`);
    }

    this.logger.error("PIN attempts exhausted", { attempts: MAX_PIN_ATTEMPTS });
    throw new MaxAttemptsExceededError();
  }

  private async readPin(): Promise<string> {
    const { pinPrompt, pinTimeoutMs } = this.config;
    if (pinTimeoutMs <= 0) return this.pinSource.readPin(pinPrompt);

    const controller = new AbortController();
    let timeoutHandle: ReturnType<typeof setTimeout> | null = null;
    const timeout = new Promise<never>((_, reject) => {
      timeoutHandle = setTimeout(() => {
        const err = new PinEntryTimeoutError(`PIN entry timed out after ${pinTimeoutMs}ms`);
        controller.abort(err);
        reject(err);
      }, pinTimeoutMs);
    });

    try {
      return await Promise.race([this.pinSource.readPin(pinPrompt, controller.signal), timeout]);
    } finally {
      if (timeoutHandle) clearTimeout(timeoutHandle);
    }
  }
}
