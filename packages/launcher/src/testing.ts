/**
 * Testing utilities for plugin sessions.
 *
 * Import from `@launchpass/launcher/testing`. Everything runs over in-process
 * streams; nothing here touches stdin/stdout.
 */

import { PassThrough, Writable } from "node:stream";
import { pino } from "pino";
import type { KernelLogger } from "@launchpass/kernel";
import type { ActivateHandler, SearchHandler } from "@launchpass/shared";
import { PluginSession } from "./session.js";

export interface LogEntry {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export interface SessionHandlers {
  onSearch: SearchHandler;
  onActivate: ActivateHandler;
}

/**
 * A pino logger at `trace` level whose lines are parsed into `entries`.
 */
export function createCaptureLogger(): { logger: KernelLogger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = pino(
    { level: "trace", base: null },
    {
      write(line: string) {
        entries.push(JSON.parse(line) as LogEntry);
      },
    },
  );
  return { logger, entries };
}

/**
 * Writable that records every line written to it.
 */
export function createLineSink(): { stream: Writable; lines: () => string[] } {
  let text = "";
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      text += chunk.toString();
      callback();
    },
  });
  return {
    stream,
    lines: () => {
      const trimmed = text.replace(/\n$/, "");
      return trimmed === "" ? [] : trimmed.split("\n");
    },
  };
}

/**
 * Feed `input` lines into a fresh session, wait for it to stop, and return
 * the output lines and parsed log entries.
 */
export async function runTrace(
  input: string[],
  handlers: SessionHandlers,
): Promise<{ lines: string[]; logs: LogEntry[]; session: PluginSession }> {
  const stdin = new PassThrough();
  const stdout = createLineSink();
  const { logger, entries } = createCaptureLogger();

  const session = new PluginSession({
    input: stdin,
    output: stdout.stream,
    logger,
    ...handlers,
  });

  const done = session.run();
  stdin.end(input.join("\n") + "\n");
  await done;

  return { lines: stdout.lines(), logs: entries, session };
}

export interface PipeSession {
  session: PluginSession;
  /** Write one request line */
  write(line: string): void;
  /** Close the input */
  end(): void;
  /** Output lines so far */
  lines(): string[];
  logs: LogEntry[];
  /** Settles when `run()` does */
  done: Promise<void>;
}

/**
 * Session over a writable input pipe, for tests that interleave input with
 * callback progress.
 */
export function createPipeSession(handlers: SessionHandlers): PipeSession {
  const stdin = new PassThrough();
  const stdout = createLineSink();
  const { logger, entries } = createCaptureLogger();

  const session = new PluginSession({
    input: stdin,
    output: stdout.stream,
    logger,
    ...handlers,
  });

  return {
    session,
    write: (line) => {
      stdin.write(line + "\n");
    },
    end: () => {
      stdin.end();
    },
    lines: stdout.lines,
    logs: entries,
    done: session.run(),
  };
}

/**
 * Create a deferred promise (manually resolvable).
 */
export function createDeferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
} {
  let resolve!: (value: T) => void;
  let reject!: (error: Error) => void;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}

/**
 * Poll until `condition` holds.
 */
export async function waitFor(
  condition: () => boolean,
  options: { timeout?: number; interval?: number; message?: string } = {},
): Promise<void> {
  const { timeout = 5000, interval = 10, message = "Condition not met" } = options;
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    if (condition()) return;
    await new Promise((resolve) => setTimeout(resolve, interval));
  }

  throw new Error(`${message} after ${timeout}ms`);
}

/**
 * Resolves once `signal` is aborted.
 */
export function untilAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}
