/**
 * Logger Utility
 * Handles console output with different log levels
 */

import chalk from "chalk";
import type { Ora } from "ora";
import type { LogLevel } from "../types";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger {
  private spinner: Ora | null = null;

  constructor(private level: LogLevel = "info") {}

  /**
   * Route output around a running spinner so lines are not garbled
   */
  attach(spinner: Ora | null): void {
    this.spinner = spinner;
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      this.write(() => console.log(chalk.dim(`[DEBUG] ${message}`)));
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      this.write(() => console.log(`${chalk.cyan("[INFO]")} ${message}`));
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      this.write(() => console.warn(chalk.yellow(`[WARN] ${message}`)));
    }
  }

  error(message: string, error?: Error): void {
    this.write(() => {
      console.error(chalk.red(`[ERROR] ${message}`));
      if (error) {
        console.error(error);
      }
    });
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private write(print: () => void): void {
    const spinner = this.spinner;
    if (spinner?.isSpinning) {
      spinner.clear();
      print();
      spinner.render();
    } else {
      print();
    }
  }
}
