/**
 * @launchpass/cli - Password search plugin binary
 *
 * @module @launchpass/cli
 */

export { createProgram, parsePositiveInteger } from "./program.js";
export { loadConfig, loadConfigFile, getConfigPath, type Config, type CliOptions, type ConfigFile } from "./config.js";
export {
  createPasswordPlugin,
  collectResults,
  type PasswordPlugin,
  type PasswordPluginOptions,
} from "./plugin.js";
