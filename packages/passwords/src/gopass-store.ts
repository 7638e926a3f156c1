import { existsSync } from "node:fs";
import { join } from "node:path";
import { StoreCommandError } from "@launchpass/shared";
import { exec as defaultExec, type Exec } from "./shell.js";
import type { PasswordStore } from "./types.js";

export interface GopassStoreOptions {
  /** Path to the gopass binary (default: "gopass" from PATH) */
  binary?: string;
  exec?: Exec;
}

export interface FindGopassOptions {
  env?: NodeJS.ProcessEnv;
  exec?: Exec;
  exists?: (path: string) => boolean;
}

/**
 * Locate gopass: PATH first, then the usual Go install locations. Launchers
 * often start plugins with a minimal PATH that misses `~/go/bin`.
 */
export async function findGopass(options: FindGopassOptions = {}): Promise<string> {
  const env = options.env ?? process.env;
  const run = options.exec ?? defaultExec;
  const exists = options.exists ?? existsSync;

  const which = await run("which", ["gopass"]);
  if (which.exitCode === 0 && which.stdout) {
    return which.stdout.split("\n")[0];
  }

  const candidates = [
    env.GOBIN ? join(env.GOBIN, "gopass") : null,
    env.GOPATH ? join(env.GOPATH, "bin", "gopass") : null,
    env.HOME ? join(env.HOME, "go", "bin", "gopass") : null,
  ];
  for (const candidate of candidates) {
    if (candidate && exists(candidate)) return candidate;
  }

  return "gopass";
}

export function createGopassStore(options?: GopassStoreOptions): PasswordStore {
  const binary = options?.binary ?? "gopass";
  const run = options?.exec ?? defaultExec;

  return {
    backend: "gopass",

    async list() {
      const result = await run(binary, ["--nosync", "ls", "-flat"]);
      if (result.exitCode !== 0) {
        throw new StoreCommandError(`${binary} ls`, result.exitCode, result.stderr);
      }
      return result.stdout.split("\n").filter((line) => line !== "");
    },

    async copy(entry) {
      // gopass clears the clipboard itself from a detached process
      const result = await run(binary, ["show", "-C", entry]);
      if (result.exitCode !== 0) {
        const output = [result.stderr, result.stdout].filter(Boolean).join("\n");
        throw new StoreCommandError(`${binary} show -C`, result.exitCode, output);
      }
    },
  };
}
