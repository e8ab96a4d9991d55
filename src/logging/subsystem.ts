import { pino, transport, type Logger } from "pino";
import { loadLoggingSettings, type LogLevel } from "../config/env.js";

type LogMethod = (message: string, meta?: Record<string, unknown>) => void;

export type SubsystemLogger = {
  subsystem: string;
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child: (name: string) => SubsystemLogger;
  isEnabled: (level: Exclude<LogLevel, "silent">) => boolean;
};

let root: Logger | undefined;

// Built on first use so LOG_LEVEL / LOG_PRETTY loaded from .env are honoured.
function rootLogger(): Logger {
  if (root) {
    return root;
  }
  const { level, pretty } = loadLoggingSettings();
  const options = {
    level,
    formatters: { level: (label: string) => ({ level: label }) },
  };
  root = pretty
    ? pino(
        options,
        transport({
          target: "pino-pretty",
          options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
        }),
      )
    : pino(options);
  return root;
}

function wrap(subsystem: string, logger: Logger): SubsystemLogger {
  const method =
    (level: Exclude<LogLevel, "silent">): LogMethod =>
    (message, meta) => {
      if (meta) {
        logger[level](meta, message);
      } else {
        logger[level](message);
      }
    };

  return {
    subsystem,
    trace: method("trace"),
    debug: method("debug"),
    info: method("info"),
    warn: method("warn"),
    error: method("error"),
    fatal: method("fatal"),
    child: (name) => {
      const nested = `${subsystem}:${name}`;
      return wrap(nested, logger.child({ subsystem: nested }));
    },
    isEnabled: (level) => logger.isLevelEnabled(level),
  };
}

/** Logger tagged with `{ subsystem }`, e.g. `createSubsystemLogger("ingest:pipeline")`. */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let bound: SubsystemLogger | undefined;
  const get = (): SubsystemLogger => {
    if (!bound) {
      bound = wrap(subsystem, rootLogger().child({ subsystem }));
    }
    return bound;
  };

  return {
    subsystem,
    trace: (message, meta) => get().trace(message, meta),
    debug: (message, meta) => get().debug(message, meta),
    info: (message, meta) => get().info(message, meta),
    warn: (message, meta) => get().warn(message, meta),
    error: (message, meta) => get().error(message, meta),
    fatal: (message, meta) => get().fatal(message, meta),
    child: (name) => get().child(name),
    isEnabled: (level) => get().isEnabled(level),
  };
}
