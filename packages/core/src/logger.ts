/**
 * Leveled console logger
 */

import chalk from "chalk";
import figures from "figures";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  debug: (message: string) => void;
  info: (message: string) => void;
  success: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type LoggerOptions = {
  /** Minimum level that is written (default: STEPWISE_LOG_LEVEL or "info") */
  level?: LogLevel;
  /** Output sink; stderr is used for warnings and errors by default */
  write?: (line: string, level: Exclude<LogLevel, "silent">) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.STEPWISE_LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : "info";
}

function defaultWrite(line: string, level: Exclude<LogLevel, "silent">): void {
  if (level === "warn" || level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? defaultLevel()];
  const write = options.write ?? defaultWrite;

  const emit = (level: Exclude<LogLevel, "silent">, line: string) => {
    if (LEVEL_ORDER[level] >= threshold) {
      write(line, level);
    }
  };

  return {
    debug: (message) => emit("debug", chalk.dim(`${figures.bullet} ${message}`)),
    info: (message) => emit("info", `${chalk.blue(figures.info)} ${message}`),
    success: (message) => emit("info", `${chalk.green(figures.tick)} ${message}`),
    warn: (message) => emit("warn", `${chalk.yellow(figures.warning)} ${message}`),
    error: (message) => emit("error", `${chalk.red(figures.cross)} ${message}`),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
