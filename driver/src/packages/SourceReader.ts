import { readFileSync } from "node:fs";

/**
 * Synchronous access to source files.
 */
export interface SourceReader {
  /**
   * @throws when the file cannot be read
   */
  readFile(path: string): string;
}

export const fileSystemReader: SourceReader = {
  readFile: (path) => readFileSync(path, "utf-8"),
};
