import pino, { type Logger } from "pino";

export interface LoggerConfig {
  level?: string;
  pretty?: boolean;
  redact?: string[];
}

function createBaseLogger(config: LoggerConfig = {}): Logger {
  const {
    level = process.env.LOG_LEVEL || "warn",
    pretty = process.env.LOG_PRETTY === "true",
    redact = ["password", "token", "authorization", "settings.password", "settings.token"],
  } = config;

  // stdout belongs to command output; logs go to stderr
  const destination = pretty
    ? pino.transport({
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      })
    : pino.destination(2);

  return pino(
    {
      level,
      redact,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    destination,
  );
}

export const logger = createBaseLogger();

export function setLogLevel(level: string): void {
  logger.level = level;
}

export function createChildLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

export function createTransportLogger() {
  return createChildLogger({ component: "transport" });
}

export function createResourceLogger() {
  return createChildLogger({ component: "resources" });
}

export function createSelectorLogger() {
  return createChildLogger({ component: "selector" });
}

export function createApplyLogger() {
  return createChildLogger({ component: "apply" });
}

export function createConfigLogger() {
  return createChildLogger({ component: "config" });
}

export function createCliLogger() {
  return createChildLogger({ component: "cli" });
}
