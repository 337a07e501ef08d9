import { PinFormatError } from "../errors.js";

export const PIN_LENGTH = 6;

// `\d` without the `u` flag is ASCII-only.
const PIN_PATTERN = /^\d{6}$/;

/** Trim surrounding whitespace and require exactly six ASCII digits. */
export function parsePin(raw: string): string {
  const pin = raw.trim();
  if (!PIN_PATTERN.test(pin)) {
    throw new PinFormatError(`PIN must be exactly ${PIN_LENGTH} digits`);
  }
  return pin;
}
