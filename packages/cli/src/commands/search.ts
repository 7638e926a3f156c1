/**
 * Search command - print what the plugin would return for a query
 */

import type { Command } from "commander";
import { Logger } from "@launchpass/kernel";
import { createGopassStore, findGopass } from "@launchpass/passwords";
import { loadConfig, type CliOptions } from "../config.js";
import { collectResults, createPasswordPlugin } from "../plugin.js";

export async function searchCommand(
  query: string,
  _options: Record<string, unknown>,
  command: Command,
): Promise<void> {
  const options: CliOptions = command.optsWithGlobals();
  const config = loadConfig(options);
  Logger.configure({ level: config.logLevel, file: config.logFile });

  const gopass = config.gopass ?? (await findGopass());
  const plugin = await createPasswordPlugin(createGopassStore({ binary: gopass }), {
    maxResults: config.maxResults,
    prefix: config.prefix,
  });

  for (const result of await collectResults(plugin.onSearch, query)) {
    console.log(result.name);
  }
}
