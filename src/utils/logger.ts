/**
 * Logger Utility
 * Handles console output with different log levels
 */

import chalk from "chalk";
import type { LogLevel } from "../types";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger {
  constructor(private readonly level: LogLevel = "info") {}

  isEnabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  debug(message: string): void {
    if (this.isEnabled("debug")) {
      console.log(`${chalk.dim("[DEBUG]")} ${chalk.dim(message)}`);
    }
  }

  info(message: string): void {
    if (this.isEnabled("info")) {
      console.log(`${chalk.cyan("[INFO]")} ${message}`);
    }
  }

  warn(message: string): void {
    if (this.isEnabled("warn")) {
      console.warn(`${chalk.yellow("[WARN]")} ${message}`);
    }
  }

  error(message: string, error?: unknown): void {
    console.error(`${chalk.red("[ERROR]")} ${message}`);
    if (error) {
      console.error(error);
    }
  }
}
