/**
 * @launchpass/passwords
 *
 * Search provider and activation handler backed by a password store.
 */

export type { PasswordStore, PasswordStoreBackend } from "./types.js";
export {
  createGopassStore,
  findGopass,
  type GopassStoreOptions,
  type FindGopassOptions,
} from "./gopass-store.js";
export { createMemoryStore, type MemoryPasswordStore } from "./memory-store.js";
export {
  PasswordIndex,
  createPasswordSearch,
  stripPrefix,
  DEFAULT_PREFIX,
  DEFAULT_MAX_RESULTS,
  DEFAULT_ICON,
  DEFAULT_DESCRIPTION,
  type PasswordSearchOptions,
} from "./password-search.js";
export { createCopyHandler, type CopyHandlerOptions } from "./copy-handler.js";
export { createPasteKey, KEY_PASTE, type PasteKey, type PasteKeyOptions } from "./paste-key.js";
export { exec, spawnDetached, type Exec, type ExecResult, type SpawnDetached } from "./shell.js";
