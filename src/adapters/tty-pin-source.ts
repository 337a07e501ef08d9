import { NonInteractiveInputError, PinEntryAbortedError } from "../errors.js";
import { parsePin } from "../core/pin-format.js";
import type { PinSource } from "../interfaces/pin-source.js";

const ENTER = new Set(["\r", "\n"]);
const BACKSPACE = new Set(["\u007f", "\b"]);
const CTRL_C = "\u0003";
const CTRL_D = "\u0004";

/** The subset of `tty.ReadStream` the PIN prompt relies on. */
export interface TtyInput {
  readonly isTTY?: boolean;
  readonly isRaw?: boolean;
  setRawMode(mode: boolean): unknown;
  on(event: "data", listener: (chunk: Buffer | string) => void): unknown;
  removeListener(event: "data", listener: (chunk: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TtyPinSourceOptions {
  input?: TtyInput;
  /** Receives the prompt; stderr so it shows even when stdout is redirected. */
  output?: { write(text: string): unknown };
}

/**
 * Reads the PIN from the controlling terminal with echo disabled.
 *
 * Refuses to run when stdin is not a TTY, so a PIN is never taken from a
 * pipe, a file, or a CI log.
 */
export class TtyPinSource implements PinSource {
  private readonly input: TtyInput;
  private readonly output: { write(text: string): unknown };

  constructor(options: TtyPinSourceOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stderr;
  }

  readPin(prompt: string, signal?: AbortSignal): Promise<string> {
    const input = this.input;
    if (!input.isTTY) {
      return Promise.reject(
        new NonInteractiveInputError(
          "PIN prompt requires an interactive terminal (stdin is not a TTY)",
        ),
      );
    }
    if (signal?.aborted) return Promise.reject(signal.reason);

    this.output.write(prompt);

    return new Promise<string>((resolve, reject) => {
      const wasRaw = input.isRaw === true;
      let buffer = "";

      const finish = (err?: unknown): void => {
        input.removeListener("data", onData);
        signal?.removeEventListener("abort", onAbort);
        input.setRawMode(wasRaw);
        input.pause();
        // hidden input leaves the cursor on the prompt line
        this.output.write("\n");

        const entered = buffer;
        buffer = "";
        if (err !== undefined) {
          reject(err);
          return;
        }
        try {
          resolve(parsePin(entered));
        } catch (formatErr) {
          reject(formatErr);
        }
      };

      const onAbort = (): void => finish(signal?.reason ?? new PinEntryAbortedError());

      const onData = (chunk: Buffer | string): void => {
        const text = typeof chunk === "string" ? chunk : chunk.toString("utf8");
        for (const ch of text) {
          if (ENTER.has(ch)) {
            finish();
            return;
          }
          if (ch === CTRL_C) {
            finish(new PinEntryAbortedError());
            return;
          }
          if (ch === CTRL_D) {
            if (buffer.length === 0) finish(new PinEntryAbortedError("PIN entry ended (EOF)"));
            else finish();
            return;
          }
          if (BACKSPACE.has(ch)) {
            buffer = buffer.slice(0, -1);
          } else {
            buffer += ch;
          }
        }
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      input.setRawMode(true);
      input.on("data", onData);
      input.resume();
    });
  }
}
