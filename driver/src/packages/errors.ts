/**
 * Malformed Go source or build constraint.
 */
export class GoSyntaxError extends Error {
  constructor(
    message: string,
    /** Character offset in the scanned text */
    readonly offset: number,
  ) {
    super(`${message} (at offset ${offset})`);
    this.name = "GoSyntaxError";
  }
}

/**
 * A package's imports could not be discovered from its sources.
 */
export class ImportResolutionError extends Error {
  constructor(
    readonly pkgPath: string,
    readonly file: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot resolve imports of ${pkgPath} (${file}): ${reason}`, {
      cause,
    });
    this.name = "ImportResolutionError";
  }
}
