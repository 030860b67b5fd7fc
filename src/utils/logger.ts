import type { LogLevel } from "../types.js";

interface LogEntry extends Record<string, unknown> {
  level: LogLevel;
  event: string;
  timestamp: string;
}

export interface Logger {
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
  now?: () => Date;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  info: 0,
  warn: 1,
  error: 2,
};

export function serializeLogEntry(entry: LogEntry): string {
  return JSON.stringify(entry, (_key, value: unknown) => {
    if (typeof value === "bigint") {
      return value.toString();
    }

    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    }

    return value;
  });
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const writeLine = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const now = options.now ?? (() => new Date());

  const write = (level: LogLevel, event: string, data: Record<string, unknown> = {}): void => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }
    const entry: LogEntry = {
      level,
      event,
      timestamp: now().toISOString(),
      ...data,
    };
    writeLine(serializeLogEntry(entry));
  };

  return {
    info(event, data) {
      write("info", event, data);
    },
    warn(event, data) {
      write("warn", event, data);
    },
    error(event, data) {
      write("error", event, data);
    },
  };
}

export const silentLogger: Logger = createLogger({ level: "error", write: () => undefined });
