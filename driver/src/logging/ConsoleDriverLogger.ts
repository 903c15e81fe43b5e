import chalk from "chalk";
import type { DriverLogger } from "./DriverLogger.js";

const PREFIX = chalk.dim("[pkgdriver]");

/**
 * Terminal logger with coloured status markers, writing to stderr.
 */
export const createConsoleDriverLogger = (): DriverLogger => {
  const writeLine = (text: string): void => {
    console.error(text);
  };

  return {
    success(message: string): void {
      writeLine(`${PREFIX} ${chalk.green("✓")} ${message}`);
    },

    info(message: string): void {
      writeLine(`${PREFIX} ${message}`);
    },

    warn(message: string): void {
      writeLine(`${PREFIX} ${chalk.yellow("⚠")} ${message}`);
    },

    error(message: string): void {
      writeLine(`${PREFIX} ${chalk.red("✗")} ${message}`);
    },
  };
};

/**
 * Default console logger instance.
 */
export const consoleLogger = createConsoleDriverLogger();
