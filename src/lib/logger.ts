import { createWriteStream } from "node:fs";
import type { LogLevel } from "../types/app.js";

type LogWriter = (line: string) => void;
type LogFields = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const LEVEL_LABEL: Record<Exclude<LogLevel, "silent">, string> = {
  debug: "DEBU",
  info: "INFO",
  warn: "WARN",
  error: "ERRO"
};

let activeLevel: LogLevel = "silent";
let writeLine: LogWriter | null = null;

const formatValue = (value: unknown): string => {
  if (value instanceof Error) {
    return formatValue(value.message);
  }
  const text = typeof value === "string" ? value : JSON.stringify(value) ?? String(value);
  return /[\s="]/u.test(text) || text.length === 0 ? JSON.stringify(text) : text;
};

export const formatLogLine = (
  level: Exclude<LogLevel, "silent">,
  message: string,
  fields: LogFields = {},
  time: Date = new Date()
): string => {
  const pairs = Object.entries(fields).map(([key, value]) => `${key}=${formatValue(value)}`);
  return [time.toISOString(), LEVEL_LABEL[level], message, ...pairs].join(" ");
};

const emit = (level: Exclude<LogLevel, "silent">, message: string, fields?: LogFields): void => {
  if (!writeLine || LEVEL_RANK[level] < LEVEL_RANK[activeLevel]) {
    return;
  }
  writeLine(formatLogLine(level, message, fields));
};

export interface LoggerOptions {
  level: LogLevel;
  file?: string | null;
  write?: LogWriter;
}

export const configureLogger = ({ level, file, write }: LoggerOptions): void => {
  activeLevel = level;
  if (write) {
    writeLine = write;
    return;
  }
  if (file) {
    const stream = createWriteStream(file, { flags: "a" });
    stream.on("error", () => {
      writeLine = null;
    });
    writeLine = (line) => {
      stream.write(`${line}\n`);
    };
    return;
  }
  writeLine = null;
};

export const resetLogger = (): void => {
  activeLevel = "silent";
  writeLine = null;
};

export const logger = {
  debug: (message: string, fields?: LogFields): void => emit("debug", message, fields),
  info: (message: string, fields?: LogFields): void => emit("info", message, fields),
  warn: (message: string, fields?: LogFields): void => emit("warn", message, fields),
  error: (message: string, fields?: LogFields): void => emit("error", message, fields)
};
