/**
 * Logger
 *
 * Structured logging on top of pino. Stdout belongs to the plugin protocol,
 * so the default destination is stderr.
 *
 * ```typescript
 * const log = Logger.for("PluginSession");
 * log.debug({ line }, "Received request");
 *
 * Logger.configure({ level: "debug", file: "/tmp/launchpass.log" });
 * ```
 *
 * Component loggers created with `Logger.for` follow later `configure` calls,
 * so they can be created at module load.
 */

import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type LogMethod = {
  (obj: object, msg?: string): void;
  (msg: string): void;
};

/**
 * The logging surface used across packages. Any pino logger satisfies it.
 */
export interface KernelLogger {
  fatal: LogMethod;
  error: LogMethod;
  warn: LogMethod;
  info: LogMethod;
  debug: LogMethod;
  trace: LogMethod;
  child(bindings: Record<string, unknown>): KernelLogger;
}

export interface LoggerConfig {
  level?: LogLevel;
  /** Write to this file instead of stderr. Parent directories are created. */
  file?: string;
  /** Explicit destination; takes precedence over `file` */
  destination?: DestinationStream;
  /** Base bindings added to every line */
  base?: Record<string, unknown>;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LAUNCHPASS_LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : "warn";
}

function createRoot(config: LoggerConfig): PinoLogger {
  const destination =
    config.destination ??
    (config.file
      ? pino.destination({ dest: config.file, mkdir: true, sync: true })
      : pino.destination({ dest: 2, sync: true }));

  return pino(
    {
      name: "launchpass",
      level: config.level ?? defaultLevel(),
      base: { pid: process.pid, ...config.base },
    },
    destination,
  );
}

let root: PinoLogger = createRoot({});
let generation = 0;

function forward(current: () => KernelLogger, level: keyof Omit<KernelLogger, "child">): LogMethod {
  return (objOrMsg: object | string, msg?: string) => {
    const target = current();
    if (typeof objOrMsg === "string") {
      target[level](objOrMsg);
    } else {
      target[level](objOrMsg, msg);
    }
  };
}

function componentLogger(bindings: Record<string, unknown>): KernelLogger {
  let cached: { generation: number; logger: PinoLogger } | null = null;
  const current = (): PinoLogger => {
    if (!cached || cached.generation !== generation) {
      cached = { generation, logger: root.child(bindings) };
    }
    return cached.logger;
  };

  return {
    fatal: forward(current, "fatal"),
    error: forward(current, "error"),
    warn: forward(current, "warn"),
    info: forward(current, "info"),
    debug: forward(current, "debug"),
    trace: forward(current, "trace"),
    child: (more) => componentLogger({ ...bindings, ...more }),
  };
}

export const Logger = {
  /** Replace the root logger. Existing component loggers pick up the change. */
  configure(config: LoggerConfig): void {
    root = createRoot(config);
    generation++;
  },

  /** Logger bound to `{ component }` */
  for(component: string): KernelLogger {
    return componentLogger({ component });
  },

  get level(): string {
    return root.level;
  },
};
