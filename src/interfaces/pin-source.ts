/**
 * Where PINs come from. The session key manager only ever sees this
 * interface; the terminal implementation lives in adapters/.
 * @module
 */

export interface PinSource {
  /**
   * Obtain one PIN. Implementations return exactly 6 ASCII digits or reject
   * with PinFormatError, and reject with NonInteractiveInputError rather than
   * read from a channel that is not confidential.
   *
   * `signal` aborts a pending read (used for per-attempt timeouts).
   */
  readPin(prompt: string, signal?: AbortSignal): Promise<string>;
}
