/**
 * @launchpass/shared
 *
 * Wire protocol types, request/response codec and error classes shared by
 * the session engine, the password providers and the CLI.
 */

export * from "./protocol.js";
export * from "./codec.js";
export * from "./errors.js";
