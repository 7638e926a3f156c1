/**
 * Configuration loading
 */

import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { z } from "zod";
import { LOG_LEVELS, Logger, isLogLevel, type KernelLogger, type LogLevel } from "@launchpass/kernel";
import { DEFAULT_MAX_RESULTS, DEFAULT_PREFIX } from "@launchpass/passwords";

/**
 * Resolved plugin configuration
 */
export interface Config {
  /** gopass binary; located at startup when unset */
  gopass?: string;
  maxResults: number;
  /** Trigger prefix stripped from queries */
  prefix: string;
  /** Press the paste key after copying */
  paste: boolean;
  logLevel: LogLevel;
  logFile?: string;
}

/**
 * Options as parsed by commander
 */
export interface CliOptions {
  gopass?: string;
  maxResults?: number;
  prefix?: string;
  paste?: boolean;
  logLevel?: string;
  logFile?: string;
  config?: string;
}

const configFileSchema = z.object({
  gopass: z.string().min(1).optional(),
  maxResults: z.number().int().positive().optional(),
  prefix: z.string().optional(),
  paste: z.boolean().optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
  logFile: z.string().min(1).optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Get config file path
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const configHome = env.XDG_CONFIG_HOME || path.join(env.HOME || os.homedir(), ".config");
  return path.join(configHome, "launchpass", "config.json");
}

/**
 * Load config file. A missing file is not an error; an unreadable or invalid
 * one is logged and ignored.
 */
export function loadConfigFile(configPath: string, log: KernelLogger): ConfigFile | null {
  if (!fs.existsSync(configPath)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    log.warn({ err: error, configPath }, "Ignoring unreadable config file");
    return null;
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn({ configPath, issues: parsed.error.issues }, "Ignoring invalid config file");
    return null;
  }
  return parsed.data;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return value === "1" || value.toLowerCase() === "true";
}

function parsePositiveInt(value: string | undefined, name: string, log: KernelLogger): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    log.warn({ name, value }, "Ignoring invalid positive integer");
    return undefined;
  }
  return parsed;
}

function parseLevel(value: string | undefined, name: string, log: KernelLogger): LogLevel | undefined {
  if (value === undefined || value === "") return undefined;
  if (isLogLevel(value)) return value;
  log.warn({ name, value }, "Ignoring unknown log level");
  return undefined;
}

/**
 * Load configuration from CLI options, environment and config file
 */
export function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  log: KernelLogger = Logger.for("Config"),
): Config {
  const configFile = loadConfigFile(cliOptions.config ?? getConfigPath(env), log);

  // Priority: CLI > Environment > Config file > defaults
  const gopass = cliOptions.gopass ?? (env.LAUNCHPASS_GOPASS || undefined) ?? configFile?.gopass;

  const maxResults =
    cliOptions.maxResults ??
    parsePositiveInt(env.LAUNCHPASS_MAX_RESULTS, "LAUNCHPASS_MAX_RESULTS", log) ??
    configFile?.maxResults ??
    DEFAULT_MAX_RESULTS;

  const prefix = cliOptions.prefix ?? env.LAUNCHPASS_PREFIX ?? configFile?.prefix ?? DEFAULT_PREFIX;

  const paste =
    cliOptions.paste ?? parseBoolean(env.LAUNCHPASS_PASTE) ?? configFile?.paste ?? false;

  const logLevel =
    parseLevel(cliOptions.logLevel, "--log-level", log) ??
    parseLevel(env.LAUNCHPASS_LOG_LEVEL, "LAUNCHPASS_LOG_LEVEL", log) ??
    configFile?.logLevel ??
    "warn";

  const logFile = cliOptions.logFile ?? (env.LAUNCHPASS_LOG_FILE || undefined) ?? configFile?.logFile;

  return { gopass, maxResults, prefix, paste, logLevel, logFile };
}
