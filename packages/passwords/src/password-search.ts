/**
 * Password Search
 *
 * Case-insensitive substring search over the store's entry names. Entries
 * are loaded once; the lowercase form is computed at load time so the
 * per-keystroke search only compares.
 */

import { Logger, type KernelLogger } from "@launchpass/kernel";
import type { SearchHandler } from "@launchpass/shared";
import type { PasswordStore } from "./types.js";

export const DEFAULT_PREFIX = "gp ";
export const DEFAULT_MAX_RESULTS = 19;
export const DEFAULT_ICON = "dialog-password";
export const DEFAULT_DESCRIPTION = "Copy password to clipboard";

interface IndexedEntry {
  name: string;
  lower: string;
}

export class PasswordIndex {
  private readonly entries: readonly IndexedEntry[];

  private constructor(names: readonly string[]) {
    this.entries = names.map((name) => ({ name, lower: name.toLowerCase() }));
  }

  static fromEntries(names: readonly string[]): PasswordIndex {
    return new PasswordIndex(names);
  }

  /**
   * Load every entry from `store`. A failing store yields an empty index:
   * searches then answer with no results instead of failing.
   */
  static async load(store: PasswordStore, logger?: KernelLogger): Promise<PasswordIndex> {
    const log = logger ?? Logger.for("PasswordIndex");
    log.info({ backend: store.backend }, "Loading entries");
    try {
      const names = await store.list();
      log.info({ count: names.length }, "Loaded entries");
      return new PasswordIndex(names);
    } catch (error) {
      log.error({ err: error, backend: store.backend }, "failed to list entries");
      return new PasswordIndex([]);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Entry names containing `needle` (case-insensitive), in store order.
   * An empty needle matches everything. Stops as soon as `signal` aborts.
   */
  *match(needle: string, signal?: AbortSignal): Generator<string> {
    const lowerNeedle = needle.toLowerCase();
    for (const entry of this.entries) {
      if (signal?.aborted) return;
      if (lowerNeedle === "" || entry.lower.includes(lowerNeedle)) {
        yield entry.name;
      }
    }
  }
}

export interface PasswordSearchOptions {
  /** Stripped from the start of the query (default "gp ") */
  prefix?: string;
  maxResults?: number;
  iconName?: string;
  description?: string;
}

export function stripPrefix(query: string, prefix: string): string {
  return prefix && query.startsWith(prefix) ? query.slice(prefix.length) : query;
}

export function createPasswordSearch(
  index: PasswordIndex,
  options?: PasswordSearchOptions,
): SearchHandler {
  const prefix = options?.prefix ?? DEFAULT_PREFIX;
  const maxResults = options?.maxResults ?? DEFAULT_MAX_RESULTS;
  const iconName = options?.iconName ?? DEFAULT_ICON;
  const description = options?.description ?? DEFAULT_DESCRIPTION;

  return async (query, signal, append) => {
    let count = 0;
    for (const name of index.match(stripPrefix(query, prefix), signal)) {
      if (count >= maxResults) break;
      await append({ name, description, iconName });
      count++;
    }
  };
}
