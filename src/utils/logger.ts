/**
 * Logger Utility
 * Handles console output with different log levels
 */

import chalk from "chalk";
import type { LogLevel } from "../types";

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = (line: string) => void;

export class Logger {
  constructor(
    private readonly level: LogLevel = "info",
    private readonly sink: LogSink = (line) => console.error(line),
  ) {}

  private enabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      this.sink(`${chalk.dim("[DEBUG]")} ${chalk.dim(message)}`);
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      this.sink(`${chalk.cyan("[INFO]")} ${message}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      this.sink(`${chalk.yellow("[WARN]")} ${message}`);
    }
  }

  error(message: string, error?: unknown): void {
    this.sink(`${chalk.red("[ERROR]")} ${message}`);
    if (error instanceof Error) {
      this.sink(chalk.dim(error.stack ?? error.message));
    } else if (error !== undefined) {
      this.sink(chalk.dim(String(error)));
    }
  }
}
