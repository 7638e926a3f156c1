/**
 * # launchpass kernel
 *
 * Low-level primitives shared by every launchpass package. Today that is the
 * logger: pino underneath, `Logger.for(component)` on top.
 *
 * @module @launchpass/kernel
 */

export * from "./logger.js";
