import fs from "node:fs";
import path from "node:path";
import type { LogLevel } from "./config.js";
import type { DebugEvent } from "./chat-types.js";

export type LogRecord = DebugEvent & {
  level: LogLevel;
  at: string;
};

export type Logger = {
  debug(stage: string, data?: unknown): void;
  info(stage: string, data?: unknown): void;
  warn(stage: string, data?: unknown): void;
  error(stage: string, data?: unknown): void;
};

export type MemoryLogger = Logger & {
  records: LogRecord[];
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function createLogger(options: { level: LogLevel; filePath?: string | null }): Logger {
  const threshold = LEVEL_RANK[options.level];
  const filePath = options.filePath ?? null;
  let sinkBroken = false;

  if (filePath) {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
    } catch {
      sinkBroken = true;
    }
  }

  const write = (level: LogLevel, stage: string, data: unknown) => {
    if (LEVEL_RANK[level] < threshold || !filePath || sinkBroken) {
      return;
    }
    const record: LogRecord = {
      level,
      at: new Date().toISOString(),
      stage,
      data: data ?? null,
    };
    try {
      fs.appendFileSync(filePath, `${JSON.stringify(record)}\n`, "utf8");
    } catch {
      // the renderer owns the terminal; a broken log file disables the sink
      sinkBroken = true;
    }
  };

  return {
    debug: (stage, data) => write("debug", stage, data),
    info: (stage, data) => write("info", stage, data),
    warn: (stage, data) => write("warn", stage, data),
    error: (stage, data) => write("error", stage, data),
  };
}

export function createMemoryLogger(): MemoryLogger {
  const records: LogRecord[] = [];
  const write = (level: LogLevel, stage: string, data: unknown) => {
    records.push({ level, at: new Date().toISOString(), stage, data: data ?? null });
  };
  return {
    records,
    debug: (stage, data) => write("debug", stage, data),
    info: (stage, data) => write("info", stage, data),
    warn: (stage, data) => write("warn", stage, data),
    error: (stage, data) => write("error", stage, data),
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
