// Line logger shared by the interactive CLI and the background worker.
// Both write to the same log file so it stays one chronological record.

import { appendFileSync } from "fs";
import { dirname } from "path";
import { config } from "./config.ts";
import { ensureDirSync } from "./fs-utils.ts";

export type LogLevel = "INFO" | "WARNING" | "ERROR";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Log file path, or false to skip the file sink. */
  file?: string | false;
  console?: boolean;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatLogLine(level: LogLevel, name: string, message: string, date = new Date()): string {
  return `${formatTimestamp(date)} | ${level} | ${name} | ${message}`;
}

export function createLogger(name: string, opts: LoggerOptions = {}): Logger {
  const file = opts.file === undefined ? config.logFile : opts.file;
  const toConsole = opts.console ?? true;
  let dirReady = false;

  const write = (level: LogLevel, message: string): void => {
    const line = formatLogLine(level, name, message);

    if (file) {
      if (!dirReady) {
        ensureDirSync(dirname(file));
        dirReady = true;
      }
      appendFileSync(file, line + "\n");
    }

    if (toConsole) {
      if (level === "INFO") {
        console.log(line);
      } else {
        console.error(line);
      }
    }
  };

  return {
    info: (message) => write("INFO", message),
    warn: (message) => write("WARNING", message),
    error: (message) => write("ERROR", message),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
