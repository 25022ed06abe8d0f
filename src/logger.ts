import chalk from "chalk";
import type { WriteStream } from "fs";
import fs from "fs-extra";

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const tags: Record<LogLevel, string> = {
  debug: "[DEBUG]",
  info: "[INFO]",
  warn: "[WARN]",
  error: "[ERROR]"
};

const formatters: Record<LogLevel, (line: string) => string> = {
  debug: line => chalk.gray(line),
  info: line => chalk.blue(line),
  warn: line => chalk.yellow(line),
  error: line => chalk.red(line)
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelWeight, value);
}

let activeLevel: LogLevel = "info";
let fileStream: WriteStream | undefined;

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[activeLevel];
}

function emit(level: LogLevel, message: string): void {
  if (!shouldLog(level)) {
    return;
  }
  const line = `${tags[level]} ${message}`;
  const coloured = formatters[level](line);
  if (level === "error") {
    console.error(coloured);
  } else if (level === "warn") {
    console.warn(coloured);
  } else {
    console.log(coloured);
  }
  fileStream?.write(`${new Date().toISOString()} ${line}\n`);
}

/**
 * Set log level for runtime diagnostics.
 *
 * @param level - Desired logging level.
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: string): void {
  const normalised = level.toLowerCase();
  if (!isLogLevel(normalised)) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = normalised;
}

/**
 * Mirror every emitted line into an append-mode log file, uncoloured and timestamped.
 *
 * @param path - Log file location; parent directories are created.
 */
export async function attachLogFile(path: string): Promise<void> {
  await detachLogFile();
  await fs.ensureFile(path);
  fileStream = fs.createWriteStream(path, { flags: "a", encoding: "utf8" });
}

/**
 * Flush and close the log file, if one is attached.
 */
export function detachLogFile(): Promise<void> {
  const stream = fileStream;
  fileStream = undefined;
  if (!stream) {
    return Promise.resolve();
  }
  return new Promise((resolve, reject) => {
    stream.once("error", reject);
    stream.end(() => resolve());
  });
}

/**
 * Emit debug-level log entry.
 *
 * @param message - Detailed diagnostic message.
 */
export function debug(message: string): void {
  emit("debug", message);
}

/**
 * Emit information-level log entry.
 *
 * @param message - Human-readable progress or summary line.
 */
export function info(message: string): void {
  emit("info", message);
}

/**
 * Emit warning-level log entry for recoverable conditions (retries, skipped pages).
 */
export function warn(message: string): void {
  emit("warn", message);
}

/**
 * Emit error-level log entry.
 *
 * @param message - Description of encountered error.
 */
export function error(message: string): void {
  emit("error", message);
}
