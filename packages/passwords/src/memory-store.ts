import type { PasswordStore } from "./types.js";

export interface MemoryPasswordStore extends PasswordStore {
  /** Entries passed to `copy`, in call order */
  readonly copied: readonly string[];
}

export function createMemoryStore(entries: readonly string[] = []): MemoryPasswordStore {
  const names = [...entries];
  const copied: string[] = [];

  return {
    backend: "memory",
    copied,

    async list() {
      return [...names];
    },

    async copy(entry) {
      if (!names.includes(entry)) {
        throw new Error(`No such entry: ${entry}`);
      }
      copied.push(entry);
    },
  };
}
