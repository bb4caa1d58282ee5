import pino, { type Logger, type LoggerOptions } from "pino";

/**
 * Module: Logger
 * Purpose: Root pino logger with ISO timestamps, error serializers and secret redaction.
 * `pino-pretty` is only loaded when pretty output is requested.
 */
export interface LoggerSettings {
  level?: string;
  pretty?: boolean;
}

export function createLogger(settings: LoggerSettings = {}): Logger {
  const options: LoggerOptions = {
    level: settings.level ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ["credentials", "*.private_key", "*.client_secret", "*.token"],
      remove: true,
    },
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    transport: settings.pretty
      ? {
          target: "pino-pretty",
          options: { translateTime: "SYS:standard", ignore: "pid,hostname", colorize: true },
        }
      : undefined,
  };
  return pino(options);
}

let rootLogger: Logger | undefined;

export function configureLogger(settings: LoggerSettings): Logger {
  rootLogger = createLogger(settings);
  return rootLogger;
}

/** Named child of the root logger. */
export function getLogger(name: string): Logger {
  rootLogger ??= createLogger({ level: process.env.LOG_LEVEL ?? "info" });
  return rootLogger.child({ name });
}
