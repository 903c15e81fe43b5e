import type { SourceReader } from "./SourceReader.js";

/**
 * In-memory reader over a path -> content record.
 * Used in tests in place of the filesystem.
 */
export const createMemorySourceReader = (
  files: Record<string, string>,
): SourceReader => {
  const contents = new Map(Object.entries(files));
  return {
    readFile(path: string): string {
      const content = contents.get(path);
      if (content === undefined) {
        throw new Error(`File not found: ${path}`);
      }
      return content;
    },
  };
};
