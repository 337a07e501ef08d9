/**
 * Public test utilities: exported from the `"pinbox/testing"` entry point.
 * Hosts use these to exercise PIN flows without a terminal or a server.
 */
export type { EncryptionFixture } from "./testing/fixtures.js";
export { createEncryptionFixture } from "./testing/fixtures.js";
export { MemoryEncryptionMetaSource } from "./testing/memory-encryption-meta-source.js";
export { ScriptedPinSource } from "./testing/scripted-pin-source.js";
export { noopLogger } from "./utils/noop-logger.js";
