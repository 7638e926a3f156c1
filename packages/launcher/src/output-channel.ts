/**
 * Output Channel
 *
 * Serializes "encode + write one line" for every producer that shares the
 * outbound stream (the dispatch loop and the search task). Lines are written
 * in `send` order and never interleave. A write that hits back-pressure holds
 * the queue until `drain`.
 */

import type { Writable } from "node:stream";
import type { KernelLogger } from "@launchpass/kernel";
import { encodeResponse, type PluginResponse } from "@launchpass/shared";

export class OutputChannel {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly stream: Writable,
    private readonly log: KernelLogger,
  ) {}

  /**
   * Queue one response. Settles once the line has been handed to the stream.
   * Never rejects: write failures are logged.
   */
  send(response: PluginResponse): Promise<void> {
    const line = encodeResponse(response);
    const next = this.tail.then(() => this.write(line));
    this.tail = next;
    return next;
  }

  /** Resolves when every queued line has been written */
  idle(): Promise<void> {
    return this.tail;
  }

  private write(line: string): Promise<void> {
    const { stream, log } = this;

    if (stream.destroyed || !stream.writable) {
      log.warn({ line }, "Output closed, dropping response");
      return Promise.resolve();
    }

    log.debug({ line }, "Sent response");

    return new Promise<void>((resolve) => {
      const flushed = stream.write(line + "\n", (error) => {
        if (error) {
          log.error({ err: error, line }, "failed to write response");
        }
      });
      if (flushed) {
        resolve();
        return;
      }

      const release = () => {
        stream.off("drain", release);
        stream.off("close", release);
        resolve();
      };
      stream.on("drain", release);
      stream.on("close", release);
    });
  }
}
