/**
 * Password plugin
 *
 * Wires a password store into the session callbacks.
 */

import type { KernelLogger } from "@launchpass/kernel";
import type { ActivateHandler, SearchHandler, SearchResult } from "@launchpass/shared";
import {
  PasswordIndex,
  createCopyHandler,
  createPasswordSearch,
  type PasswordStore,
  type PasteKey,
} from "@launchpass/passwords";

export interface PasswordPluginOptions {
  maxResults?: number;
  prefix?: string;
  /** Pressed after every successful copy */
  paste?: PasteKey;
  logger?: KernelLogger;
}

export interface PasswordPlugin {
  index: PasswordIndex;
  onSearch: SearchHandler;
  onActivate: ActivateHandler;
}

/**
 * Load the store's entries and build the search and activation callbacks.
 */
export async function createPasswordPlugin(
  store: PasswordStore,
  options: PasswordPluginOptions = {},
): Promise<PasswordPlugin> {
  const index = await PasswordIndex.load(store, options.logger);
  return {
    index,
    onSearch: createPasswordSearch(index, {
      maxResults: options.maxResults,
      prefix: options.prefix,
    }),
    onActivate: createCopyHandler(store, { paste: options.paste, logger: options.logger }),
  };
}

/**
 * Run one search outside a session and collect what it appends.
 */
export async function collectResults(onSearch: SearchHandler, query: string): Promise<SearchResult[]> {
  const results: SearchResult[] = [];
  await onSearch(query, new AbortController().signal, async (result) => {
    results.push(result);
  });
  return results;
}
