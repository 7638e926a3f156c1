import { execFile as execFileCb, spawn, type ExecFileException } from "node:child_process";

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type Exec = (cmd: string, args: string[]) => Promise<ExecResult>;

/**
 * Start a process without waiting for it. `onError` receives spawn failures
 * (e.g. the binary is missing).
 */
export type SpawnDetached = (cmd: string, args: string[], onError: (error: Error) => void) => void;

function extractExitCode(error: ExecFileException | null): number {
  if (!error) return 0;
  // ENOENT = command not found
  if (error.code === "ENOENT") return -1;
  // Non-zero exit: .code holds the exit status
  if (typeof error.code === "number") return error.code;
  // Killed by a signal or another spawn failure
  return 1;
}

export const exec: Exec = (cmd, args) => {
  return new Promise((resolve) => {
    execFileCb(cmd, args, { encoding: "utf-8" }, (error, stdout, stderr) => {
      resolve({
        stdout: (stdout ?? "").trim(),
        stderr: (stderr ?? "").trim(),
        exitCode: extractExitCode(error),
      });
    });
  });
};

export const spawnDetached: SpawnDetached = (cmd, args, onError) => {
  const child = spawn(cmd, args, { detached: true, stdio: "ignore" });
  child.on("error", onError);
  child.unref();
};
