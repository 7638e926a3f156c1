import { Logger, type KernelLogger } from "@launchpass/kernel";
import type { ActivateHandler } from "@launchpass/shared";
import type { PasteKey } from "./paste-key.js";
import type { PasswordStore } from "./types.js";

export interface CopyHandlerOptions {
  /** Pressed after a successful copy */
  paste?: PasteKey;
  logger?: KernelLogger;
}

/**
 * Activation handler that copies the entry's secret to the clipboard and,
 * when configured, pastes it. Copy failures propagate to the session, which
 * logs them.
 */
export function createCopyHandler(
  store: PasswordStore,
  options?: CopyHandlerOptions,
): ActivateHandler {
  const log = options?.logger ?? Logger.for("CopyHandler");
  const paste = options?.paste;

  return async (entry) => {
    await store.copy(entry);
    log.info({ entry, backend: store.backend }, "Copied entry to clipboard");
    paste?.press();
  };
}
