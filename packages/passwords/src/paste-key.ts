/**
 * Paste Key
 *
 * Presses the keyboard's Paste key through ydotool so the copied secret
 * lands in the window that regains focus once the launcher closes. The press
 * is delayed to give the launcher time to close, and the ydotool process is
 * detached: `press()` returns immediately.
 */

import { Logger, type KernelLogger } from "@launchpass/kernel";
import { spawnDetached as defaultSpawn, type SpawnDetached } from "./shell.js";

/** Linux input event code for KEY_PASTE */
export const KEY_PASTE = 135;

export interface PasteKeyOptions {
  command?: string;
  args?: string[];
  /** Delay before the key press (default 200ms) */
  delayMs?: number;
  spawn?: SpawnDetached;
  logger?: KernelLogger;
}

export interface PasteKey {
  press(): void;
}

export function createPasteKey(options?: PasteKeyOptions): PasteKey {
  const command = options?.command ?? "ydotool";
  const args = options?.args ?? ["key", `${KEY_PASTE}:1`, `${KEY_PASTE}:0`];
  const delayMs = options?.delayMs ?? 200;
  const spawn = options?.spawn ?? defaultSpawn;
  const log = options?.logger ?? Logger.for("PasteKey");

  return {
    press() {
      setTimeout(() => {
        log.debug({ command, args }, "Pressing paste key");
        spawn(command, args, (error) => {
          log.error({ err: error, command }, "paste key failed");
        });
      }, delayMs);
    },
  };
}
