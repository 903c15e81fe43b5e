import type { PathResolver } from "../registry/PackageOperations.js";

/**
 * Directories the build tool's path placeholders stand for.
 */
export interface BuildRoots {
  execRoot: string;
  outputBase: string;
  workspaceRoot: string;
}

const EXEC_ROOT_PLACEHOLDER = "__BAZEL_EXECROOT__";
const OUTPUT_BASE_PLACEHOLDER = "__BAZEL_OUTPUT_BASE__";
const WORKSPACE_PLACEHOLDER = "__BAZEL_WORKSPACE__";

/**
 * Create a resolver that replaces the first occurrence of each placeholder.
 *
 * @example
 * const resolve = createPathResolver({ execRoot: "/exec", outputBase: "/out", workspaceRoot: "/ws" });
 * resolve("__BAZEL_WORKSPACE__/foo/foo.go") // "/ws/foo/foo.go"
 */
export const createPathResolver =
  (roots: BuildRoots): PathResolver =>
  (path) =>
    path
      .replace(EXEC_ROOT_PLACEHOLDER, () => roots.execRoot)
      .replace(OUTPUT_BASE_PLACEHOLDER, () => roots.outputBase)
      .replace(WORKSPACE_PLACEHOLDER, () => roots.workspaceRoot);
