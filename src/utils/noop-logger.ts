import type { Logger } from "../interfaces/logger.js";

/** Logger that discards everything. The default when none is injected. */
export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
