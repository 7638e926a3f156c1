/**
 * Run command - serve the launcher over stdin/stdout
 */

import * as os from "os";
import { Logger } from "@launchpass/kernel";
import { runPlugin } from "@launchpass/launcher";
import { createGopassStore, createPasteKey, findGopass } from "@launchpass/passwords";
import { loadConfig, type CliOptions } from "../config.js";
import { createPasswordPlugin } from "../plugin.js";

const log = Logger.for("Plugin");

export async function runCommand(options: CliOptions): Promise<void> {
  const config = loadConfig(options);
  Logger.configure({ level: config.logLevel, file: config.logFile });

  const gopass = config.gopass ?? (await findGopass());
  log.info(
    { user: os.userInfo().username, home: os.homedir(), gopass },
    "plugin started",
  );

  const plugin = await createPasswordPlugin(createGopassStore({ binary: gopass }), {
    maxResults: config.maxResults,
    prefix: config.prefix,
    paste: config.paste ? createPasteKey() : undefined,
  });

  await runPlugin({ onSearch: plugin.onSearch, onActivate: plugin.onActivate });

  // The session only pauses stdin; release it so the process can exit
  process.stdin.destroy();
}
