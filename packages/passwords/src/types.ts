export type PasswordStoreBackend = "gopass" | "memory";

/**
 * A password store the plugin can search and copy from.
 */
export interface PasswordStore {
  readonly backend: PasswordStoreBackend;
  /** Every entry name, in store order */
  list(): Promise<string[]>;
  /** Put the entry's secret on the clipboard */
  copy(entry: string): Promise<void>;
}
