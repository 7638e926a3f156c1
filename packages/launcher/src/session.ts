/**
 * Plugin Session
 *
 * Reads launcher requests from an input stream and writes responses to an
 * output stream, one JSON value per line.
 *
 * At most one search runs at a time. Every other request that touches the
 * result table (a new search, `Interrupt`, `Activate`, `Exit`) first aborts
 * the running search and waits for it to write its own `"Finished"`, so each
 * blocking request is answered by exactly one terminal reply.
 *
 * | Request      | Replies                                         |
 * |--------------|-------------------------------------------------|
 * | `Search`     | `"Clear"`, `Append`*, `"Finished"`              |
 * | `Interrupt`  | `"Finished"` (from the aborted search, or own)  |
 * | `Activate`   | `"Close"`                                       |
 * | `Exit`       | `"Finished"`, then the session stops reading    |
 */

import type { Readable, Writable } from "node:stream";
import { StringDecoder } from "node:string_decoder";
import { Logger, type KernelLogger } from "@launchpass/kernel";
import {
  PluginConfigError,
  appendResponse,
  decodeRequest,
  isPluginConfigError,
  type ActivateHandler,
  type AppendResult,
  type SearchHandler,
} from "@launchpass/shared";
import { LineBuffer } from "./ndjson.js";
import { OutputChannel } from "./output-channel.js";

// ============================================================================
// Configuration
// ============================================================================

export interface PluginSessionConfig {
  /** Request stream (default: process.stdin) */
  input?: Readable;
  /** Response stream (default: process.stdout) */
  output?: Writable;
  /** Default: `Logger.for("PluginSession")` */
  logger?: KernelLogger;
  /** Search provider, invoked once per accepted `Search` */
  onSearch: SearchHandler;
  /** Activation handler, invoked once per in-range `Activate` */
  onActivate: ActivateHandler;
}

export interface ResolvedSessionConfig {
  input: Readable;
  output: Writable;
  logger: KernelLogger;
  onSearch: SearchHandler;
  onActivate: ActivateHandler;
}

/**
 * Validate required callbacks and fill in stream and logger defaults.
 *
 * @throws PluginConfigError when the config or a callback is missing
 */
export function resolveSessionConfig(
  config: Partial<PluginSessionConfig> | null | undefined,
): ResolvedSessionConfig {
  if (!config) {
    throw new PluginConfigError("config", "config is required");
  }
  const { onSearch, onActivate } = config;
  if (typeof onSearch !== "function") {
    throw new PluginConfigError("onSearch", "config onSearch callback is required");
  }
  if (typeof onActivate !== "function") {
    throw new PluginConfigError("onActivate", "config onActivate callback is required");
  }

  return {
    input: config.input ?? process.stdin,
    output: config.output ?? process.stdout,
    logger: config.logger ?? Logger.for("PluginSession"),
    onSearch,
    onActivate,
  };
}

// ============================================================================
// Session
// ============================================================================

/** True when `error` is the cancellation itself, not a failure that happened after it */
function isAbortError(error: unknown, signal: AbortSignal): boolean {
  if (!signal.aborted) return false;
  return error === signal.reason || (error instanceof Error && error.name === "AbortError");
}

interface ActiveSearch {
  query: string;
  controller: AbortController;
  /** Settles after the search has published its results and written "Finished" */
  done: Promise<void>;
}

export class PluginSession {
  private readonly config: ResolvedSessionConfig;
  private readonly log: KernelLogger;
  private readonly output: OutputChannel;
  private results: readonly string[] = [];
  private active: ActiveSearch | null = null;
  private closed = false;

  constructor(config: PluginSessionConfig) {
    this.config = resolveSessionConfig(config);
    this.log = this.config.logger;
    this.output = new OutputChannel(this.config.output, this.log);
  }

  /** Names produced by the last completed or aborted search, by result id */
  get resultTable(): readonly string[] {
    return this.results;
  }

  get isSearching(): boolean {
    return this.active !== null;
  }

  /** True once `Exit` was handled or the input ended */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Process requests until `Exit` or end of input.
   *
   * Resolves once the last reply has been written. At end of input a running
   * search is aborted and joined; it still writes its own `"Finished"`.
   */
  run(): Promise<void> {
    const { input } = this.config;
    const lineBuffer = new LineBuffer();
    const decoder = new StringDecoder("utf8");

    // Serializes request handling: a request never starts before the
    // previous one (including any cancel-and-join) has finished.
    let queue = Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const detach = () => {
        input.off("data", onData);
        input.off("end", onEnd);
        input.off("error", onError);
        input.pause();
      };

      const settle = () => {
        if (settled) return;
        settled = true;
        detach();
        this.output.idle().then(resolve, reject);
      };

      const fail = (error: unknown) => {
        if (settled) return;
        settled = true;
        detach();
        reject(error);
      };

      const enqueue = (line: string) => {
        queue = queue
          .then(async () => {
            if (this.closed) return;
            await this.handleLine(line);
            if (this.closed) settle();
          })
          .catch(fail);
      };

      const finishInput = () => {
        for (const line of lineBuffer.feed(decoder.end())) enqueue(line);
        for (const line of lineBuffer.flush()) enqueue(line);
        queue = queue
          .then(async () => {
            if (!this.closed) {
              this.log.info("Input closed");
              await this.cancelSearch();
              this.closed = true;
            }
            settle();
          })
          .catch(fail);
      };

      const onData = (chunk: Buffer | string) => {
        const text = typeof chunk === "string" ? chunk : decoder.write(chunk);
        for (const line of lineBuffer.feed(text)) enqueue(line);
      };

      const onEnd = () => finishInput();

      const onError = (error: Error) => {
        this.log.error({ err: error }, "Input read error");
        finishInput();
      };

      input.on("data", onData);
      input.on("end", onEnd);
      input.on("error", onError);
    });
  }

  private async handleLine(line: string): Promise<void> {
    this.log.debug({ line }, "Received request");

    const decoded = decodeRequest(line);
    if (!decoded.ok) {
      this.log.warn({ line, error: decoded.error }, "failed to parse request");
      return;
    }

    const request = decoded.request;
    switch (request.type) {
      case "exit":
        return this.handleExit();
      case "interrupt":
        return this.handleInterrupt();
      case "search":
        return this.handleSearch(request.query);
      case "activate":
        return this.handleActivate(request.id);
      case "unrecognized":
        this.log.info({ line: request.raw }, "Unhandled request");
        return;
    }
  }

  // ============================================================================
  // Request Handlers
  // ============================================================================

  private async handleExit(): Promise<void> {
    this.log.info("Exiting");
    await this.cancelSearch();
    this.closed = true;
    await this.output.send("Finished");
  }

  private async handleInterrupt(): Promise<void> {
    this.log.info({ searching: this.active !== null }, "Interrupted");
    // An aborted search answers the interrupt with its own "Finished"
    const wasSearching = this.active !== null;
    await this.cancelSearch();
    if (!wasSearching) {
      await this.output.send("Finished");
    }
  }

  private async handleSearch(query: string): Promise<void> {
    await this.cancelSearch();
    this.active = this.startSearch(query);
  }

  private async handleActivate(id: number): Promise<void> {
    await this.cancelSearch();

    const results = this.results;
    if (id >= results.length) {
      this.log.warn(
        { id, available: results.length },
        `Activate id=${id} out of range (have ${results.length} results)`,
      );
    } else {
      const entry = results[id];
      try {
        await this.config.onActivate(entry);
      } catch (error) {
        this.log.error({ err: error, id }, "activate failed");
      }
    }

    await this.output.send("Close");
  }

  // ============================================================================
  // Search Task
  // ============================================================================

  private startSearch(query: string): ActiveSearch {
    const controller = new AbortController();
    const { signal } = controller;
    const matched: string[] = [];
    let returned = false;

    const append: AppendResult = (result) => {
      if (returned) {
        this.log.warn({ query, name: result.name }, "Result appended after search returned");
        return Promise.resolve();
      }
      const id = matched.length;
      matched.push(result.name);
      return this.output.send(
        appendResponse(id, result.name, result.description, result.iconName),
      );
    };

    const done = (async () => {
      await this.output.send("Clear");
      try {
        await this.config.onSearch(query, signal, append);
      } catch (error) {
        if (isAbortError(error, signal)) {
          this.log.debug({ query, err: error }, "search aborted");
        } else {
          this.log.error({ query, err: error }, "search failed");
        }
      } finally {
        returned = true;
        this.results = matched;
        this.log.debug({ query, results: matched.length, aborted: signal.aborted }, "Search done");
        await this.output.send("Finished");
      }
    })();

    return { query, controller, done };
  }

  /** Abort the running search, if any, and wait for its "Finished" */
  private async cancelSearch(): Promise<void> {
    const active = this.active;
    if (!active) return;
    active.controller.abort();
    await active.done;
    this.active = null;
  }
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Run a plugin session until `Exit` or end of input.
 *
 * An invalid configuration is logged and the function returns without
 * reading any input.
 */
export async function runPlugin(
  config: Partial<PluginSessionConfig> | null | undefined,
): Promise<void> {
  let resolved: ResolvedSessionConfig;
  try {
    resolved = resolveSessionConfig(config);
  } catch (error) {
    if (!isPluginConfigError(error)) throw error;
    const log = config?.logger ?? Logger.for("PluginSession");
    log.error({ err: error, field: error.field }, "invalid launcher config");
    return;
  }

  await new PluginSession(resolved).run();
}
