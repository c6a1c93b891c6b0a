import pino, { type Logger } from "pino";
import * as fs from "fs";
import * as path from "path";

export type { Logger };

const PRETTY_OPTIONS = {
  colorize: true,
  translateTime: "SYS:standard",
  ignore: "pid,hostname",
};

/**
 * Create and configure a Pino logger instance
 */
export function createLogger(level: string = "info", pretty: boolean = true): Logger {
  if (pretty) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: PRETTY_OPTIONS,
      },
    });
  }

  // Production logger (JSON format)
  return pino({
    level,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Create a logger that writes to both console and file using pino transports
 */
export function createFileLogger(
  logFile?: string,
  level: string = "info",
  pretty: boolean = true
): Logger {
  if (!logFile) {
    return createLogger(level, pretty);
  }

  const logDir = path.dirname(logFile);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  return pino({
    level,
    transport: {
      targets: [
        {
          target: pretty ? "pino-pretty" : "pino/file",
          options: pretty ? { destination: 1, ...PRETTY_OPTIONS } : { destination: 1 },
          level,
        },
        // File output is always JSON
        {
          target: "pino/file",
          options: { destination: logFile },
          level,
        },
      ],
    },
  });
}

// Default logger instance
export const logger = createLogger(
  process.env.LOG_LEVEL || "info",
  process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test"
);

/**
 * Child logger tagged with the scan component that writes through it
 */
export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
