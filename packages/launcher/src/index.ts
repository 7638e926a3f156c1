/**
 * @launchpass/launcher
 *
 * Session engine for the launcher plugin protocol: reads requests from a
 * stream, runs at most one search at a time, and writes replies.
 */

export {
  PluginSession,
  runPlugin,
  resolveSessionConfig,
  type PluginSessionConfig,
  type ResolvedSessionConfig,
} from "./session.js";
export { OutputChannel } from "./output-channel.js";
export { LineBuffer } from "./ndjson.js";

// Testing utilities: import from "@launchpass/launcher/testing", not
// re-exported here to keep pino's capture logger out of production code.
