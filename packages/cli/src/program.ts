/**
 * Command-line program
 */

import { Command, InvalidArgumentError } from "commander";
import { runCommand } from "./commands/run.js";
import { searchCommand } from "./commands/search.js";

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsed;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("launchpass")
    .description("Password search plugin for launcher front ends")
    .version("0.1.0")
    .option("--gopass <path>", "Path to the gopass binary")
    .option("-n, --max-results <n>", "Maximum results per search", parsePositiveInteger)
    .option("--prefix <text>", "Trigger prefix stripped from queries")
    .option("--paste", "Press the paste key after copying")
    .option("--log-level <level>", "Log level (fatal, error, warn, info, debug, trace, silent)")
    .option("--log-file <path>", "Write logs to this file instead of stderr")
    .option("-c, --config <path>", "Config file (default: ~/.config/launchpass/config.json)");

  // Launchers start plugins without arguments
  program.action(runCommand);

  program
    .command("search <query>")
    .description("Print the entries a search would return, one per line")
    .action(searchCommand);

  return program;
}
