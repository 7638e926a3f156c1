import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { createCaptureLogger } from "@launchpass/launcher/testing";
import { getConfigPath, loadConfig } from "../config.js";

describe("getConfigPath", () => {
  it("uses XDG_CONFIG_HOME when set", () => {
    expect(getConfigPath({ XDG_CONFIG_HOME: "/xdg", HOME: "/home/pat" })).toBe(
      "/xdg/launchpass/config.json",
    );
  });

  it("falls back to ~/.config", () => {
    expect(getConfigPath({ HOME: "/home/pat" })).toBe("/home/pat/.config/launchpass/config.json");
  });
});

describe("loadConfig", () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "launchpass-config-"));
    configPath = path.join(dir, "config.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const writeConfig = (content: unknown) => {
    fs.writeFileSync(configPath, typeof content === "string" ? content : JSON.stringify(content));
  };

  it("returns defaults without a config file", () => {
    const { logger, entries } = createCaptureLogger();

    const config = loadConfig({ config: configPath }, {}, logger);

    expect(config).toEqual({
      gopass: undefined,
      maxResults: 19,
      prefix: "gp ",
      paste: false,
      logLevel: "warn",
      logFile: undefined,
    });
    expect(entries).toEqual([]);
  });

  it("reads the config file", () => {
    writeConfig({
      gopass: "/opt/gopass/bin/gopass",
      maxResults: 5,
      prefix: "pw ",
      paste: true,
      logLevel: "debug",
      logFile: "/tmp/launchpass.log",
    });
    const { logger } = createCaptureLogger();

    expect(loadConfig({ config: configPath }, {}, logger)).toEqual({
      gopass: "/opt/gopass/bin/gopass",
      maxResults: 5,
      prefix: "pw ",
      paste: true,
      logLevel: "debug",
      logFile: "/tmp/launchpass.log",
    });
  });

  it("reads the file from the XDG location by default", () => {
    fs.mkdirSync(path.join(dir, "launchpass"));
    fs.writeFileSync(path.join(dir, "launchpass", "config.json"), JSON.stringify({ maxResults: 3 }));
    const { logger } = createCaptureLogger();

    expect(loadConfig({}, { XDG_CONFIG_HOME: dir }, logger).maxResults).toBe(3);
  });

  it("prefers environment over the config file", () => {
    writeConfig({ maxResults: 5, prefix: "pw ", paste: true, logLevel: "debug" });
    const { logger } = createCaptureLogger();

    const config = loadConfig(
      { config: configPath },
      {
        LAUNCHPASS_GOPASS: "/usr/local/bin/gopass",
        LAUNCHPASS_MAX_RESULTS: "7",
        LAUNCHPASS_PREFIX: "pass ",
        LAUNCHPASS_PASTE: "false",
        LAUNCHPASS_LOG_LEVEL: "error",
        LAUNCHPASS_LOG_FILE: "/var/log/launchpass.log",
      },
      logger,
    );

    expect(config).toEqual({
      gopass: "/usr/local/bin/gopass",
      maxResults: 7,
      prefix: "pass ",
      paste: false,
      logLevel: "error",
      logFile: "/var/log/launchpass.log",
    });
  });

  it("prefers CLI options over environment", () => {
    const { logger } = createCaptureLogger();

    const config = loadConfig(
      {
        config: configPath,
        gopass: "/cli/gopass",
        maxResults: 2,
        prefix: "",
        paste: true,
        logLevel: "trace",
        logFile: "/cli.log",
      },
      {
        LAUNCHPASS_GOPASS: "/env/gopass",
        LAUNCHPASS_MAX_RESULTS: "7",
        LAUNCHPASS_PREFIX: "pass ",
        LAUNCHPASS_PASTE: "0",
        LAUNCHPASS_LOG_LEVEL: "error",
        LAUNCHPASS_LOG_FILE: "/env.log",
      },
      logger,
    );

    expect(config).toEqual({
      gopass: "/cli/gopass",
      maxResults: 2,
      prefix: "",
      paste: true,
      logLevel: "trace",
      logFile: "/cli.log",
    });
  });

  it("accepts 1 and true for LAUNCHPASS_PASTE", () => {
    const { logger } = createCaptureLogger();

    expect(loadConfig({ config: configPath }, { LAUNCHPASS_PASTE: "1" }, logger).paste).toBe(true);
    expect(loadConfig({ config: configPath }, { LAUNCHPASS_PASTE: "TRUE" }, logger).paste).toBe(true);
    expect(loadConfig({ config: configPath }, { LAUNCHPASS_PASTE: "yes" }, logger).paste).toBe(false);
  });

  it("ignores an invalid environment value and falls through", () => {
    writeConfig({ maxResults: 5 });
    const { logger, entries } = createCaptureLogger();

    const config = loadConfig(
      { config: configPath },
      { LAUNCHPASS_MAX_RESULTS: "lots", LAUNCHPASS_LOG_LEVEL: "loud" },
      logger,
    );

    expect(config.maxResults).toBe(5);
    expect(config.logLevel).toBe("warn");
    expect(entries.map((entry) => [entry.msg, entry.name, entry.value])).toEqual([
      ["Ignoring invalid positive integer", "LAUNCHPASS_MAX_RESULTS", "lots"],
      ["Ignoring unknown log level", "LAUNCHPASS_LOG_LEVEL", "loud"],
    ]);
  });

  it("ignores a config file that is not JSON", () => {
    writeConfig("{ maxResults: 5");
    const { logger, entries } = createCaptureLogger();

    expect(loadConfig({ config: configPath }, {}, logger).maxResults).toBe(19);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 40, msg: "Ignoring unreadable config file", configPath });
  });

  it("ignores a config file that fails validation", () => {
    writeConfig({ maxResults: -1, prefix: "pw " });
    const { logger, entries } = createCaptureLogger();

    const config = loadConfig({ config: configPath }, {}, logger);

    expect(config.maxResults).toBe(19);
    expect(config.prefix).toBe("gp ");
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 40, msg: "Ignoring invalid config file", configPath });
  });
});
