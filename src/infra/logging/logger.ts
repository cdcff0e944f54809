import pino, { type Logger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  // vitest sets NODE_ENV=test; keep test output clean
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

export function isPrettyEnabled(): boolean {
  return process.env.LOG_PRETTY === "true";
}

let rootLogger: Logger | null = null;

/**
 * Root logger. Always writes to stderr: stdout belongs to the stdio MCP
 * transport.
 */
function getRootLogger(): Logger {
  if (!rootLogger) {
    const options: pino.LoggerOptions = {
      level: getLogLevel(),
      base: {
        service: "portfolio-assistant-mcp",
        version: process.env.npm_package_version ?? "unknown",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    };

    if (isPrettyEnabled()) {
      rootLogger = pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
            destination: 2,
          },
        },
      });
    } else {
      rootLogger = pino(options, pino.destination(2));
    }
  }

  return rootLogger;
}

/**
 * @example
 * const log = createLogger("engine");
 * log.info({ documents: 12 }, "index rebuilt");
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();
  return moduleName ? root.child({ module: moduleName }) : root;
}
