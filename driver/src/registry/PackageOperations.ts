import type { PackageId } from "@pkgdriver/shared";
import type { PackageNode } from "./PackageNode.js";

/** Maps a build-relative path to a filesystem path. */
export type PathResolver = (path: string) => string;

/** Resolves an import path to a package ID, or `null` when unknown. */
export type ImportResolver = (importPath: string) => PackageId | null;

/**
 * A package with its external test files moved into a package of their own.
 */
export interface SplitResult {
  /** The original package without the external test files */
  parent: PackageNode;
  /** The synthesized external test package */
  xtest: PackageNode;
}

/**
 * Per-package steps the registry delegates.
 * Each step returns the new record for the package; none mutates its input.
 */
export interface PackageOperations {
  resolvePaths(node: PackageNode, resolve: PathResolver): PackageNode;
  /** Drop files that do not apply to the active build configuration. */
  filterFiles(node: PackageNode): PackageNode;
  /**
   * Discover and resolve import edges.
   * @throws when the package sources cannot be read or parsed
   */
  resolveImports(node: PackageNode, resolve: ImportResolver): PackageNode;
  /** Returns `null` when the package has no external test files. */
  splitExternalTests(node: PackageNode): SplitResult | null;
}
