/**
 * Logging interface for the driver.
 *
 * All output goes to stderr: stdout carries the driver response.
 *
 * @example
 * ```typescript
 * logger.info("Loaded 412 packages from 37 files");
 * logger.warn("package ID not found: example.com/missing");
 * ```
 */
export interface DriverLogger {
  /**
   * Log a success message (green ✓).
   */
  success(message: string): void;

  /**
   * Log an info message (neutral).
   */
  info(message: string): void;

  /**
   * Log a warning message (yellow ⚠).
   */
  warn(message: string): void;

  /**
   * Log an error message (red ✗).
   */
  error(message: string): void;
}
