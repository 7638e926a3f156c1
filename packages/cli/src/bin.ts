#!/usr/bin/env node
/**
 * launchpass - Entry point
 */

import { Logger } from "@launchpass/kernel";
import { createProgram } from "./program.js";

try {
  await createProgram().parseAsync();
} catch (error) {
  Logger.for("cli").fatal({ err: error }, "launchpass failed");
  process.exitCode = 1;
}
