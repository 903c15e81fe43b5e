import type { DriverLogger } from "./DriverLogger.js";

/**
 * Silent logger that discards all output.
 * Used in tests to suppress console noise.
 */
export const silentLogger: DriverLogger = {
  success(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
};
