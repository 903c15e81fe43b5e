import type { PackageId, PackagePath } from "@pkgdriver/shared";
import type { DriverLogger } from "../logging/DriverLogger.js";
import { silentLogger } from "../logging/SilentDriverLogger.js";
import { rewriteNode } from "./canonicalizeId.js";
import { isSuperset } from "./isSuperset.js";
import { collectMatchRoots } from "./matchRoots.js";
import type {
  ImportResolver,
  PackageOperations,
  PathResolver,
} from "./PackageOperations.js";
import type { PackageNode } from "./PackageNode.js";
import { type WalkDiagnostic, walkPackages } from "./walkPackages.js";

/**
 * Result of a `query` or `match` call.
 */
export interface QueryResult {
  /** Root IDs the walk started from */
  roots: PackageId[];
  /** Every package reachable from the roots, each exactly once */
  packages: PackageNode[];
  /** Roots and edge targets that were not found */
  warnings: WalkDiagnostic[];
}

/**
 * In-memory package graph for one driver invocation.
 *
 * @example
 * const registry = createPackageRegistry({ operations }, ...nodes);
 * registry.resolvePaths(resolver);
 * registry.resolveImports();
 * const { roots, packages } = registry.match(["//foo:go_default_library"]);
 */
export interface PackageRegistry {
  /**
   * Canonicalize and store nodes by logical path. Last write wins.
   */
  add(...nodes: PackageNode[]): PackageRegistry;

  /**
   * Register a node, reconciling it with an existing node at the same path.
   * The existing file list is replaced only when the incoming list is a
   * superset of it; nothing else is merged.
   */
  update(node: PackageNode): void;

  get(pkgPath: PackagePath): PackageNode | undefined;

  has(pkgPath: PackagePath): boolean;

  nodes(): PackageNode[];

  /**
   * Resolve file paths then filter files, for every package.
   * @throws whatever the delegated steps throw; the pass stops there
   */
  resolvePaths(resolve: PathResolver): void;

  /**
   * Backfill stdlib import edges and split external test packages.
   * @throws whatever the delegated import resolution throws; the pass stops there
   */
  resolveImports(): void;

  /** Walk from the given IDs, used verbatim. */
  query(roots: readonly string[]): QueryResult;

  /** Walk from build labels (see {@link collectMatchRoots}). */
  match(labels: readonly string[]): QueryResult;
}

export interface PackageRegistryOptions {
  operations: PackageOperations;
  logger?: DriverLogger;
}

export const createPackageRegistry = (
  options: PackageRegistryOptions,
  ...initial: PackageNode[]
): PackageRegistry => {
  const { operations, logger = silentLogger } = options;
  const packages = new Map<PackagePath, PackageNode>();
  const stdlib = new Map<PackagePath, PackageId>();

  const insert = (raw: PackageNode): void => {
    const node = rewriteNode(raw);
    packages.set(node.pkgPath, node);
    if (node.standard) {
      stdlib.set(node.pkgPath, node.id);
    }
  };

  const resolveImport: ImportResolver = (importPath) =>
    stdlib.get(importPath) ?? null;

  const walkAll = (roots: PackageId[]): QueryResult => {
    const visited = new Map<PackageId, PackageNode>();
    const warnings: WalkDiagnostic[] = [];
    const report = (diagnostic: WalkDiagnostic): void => {
      warnings.push(diagnostic);
      logger.warn(`${diagnostic.message}: ${diagnostic.root}`);
    };

    for (const root of roots) {
      walkPackages((id) => packages.get(id), visited, root, report);
    }

    return { roots, packages: [...visited.values()], warnings };
  };

  const registry: PackageRegistry = {
    add(...nodes) {
      for (const node of nodes) {
        insert(node);
      }
      return registry;
    },

    update(node) {
      const existing = packages.get(node.pkgPath);
      if (!existing) {
        insert(node);
        return;
      }
      if (isSuperset(node.files, existing.files)) {
        packages.set(existing.pkgPath, { ...existing, files: node.files });
      }
    },

    get(pkgPath) {
      return packages.get(pkgPath);
    },

    has(pkgPath) {
      return packages.has(pkgPath);
    },

    nodes() {
      return [...packages.values()];
    },

    resolvePaths(resolve) {
      for (const [pkgPath, node] of [...packages]) {
        const resolved = operations.resolvePaths(node, resolve);
        packages.set(pkgPath, operations.filterFiles(resolved));
      }
    },

    resolveImports() {
      for (const [pkgPath, node] of [...packages]) {
        const resolved = operations.resolveImports(node, resolveImport);
        const split = operations.splitExternalTests(resolved);
        if (split) {
          packages.set(pkgPath, split.parent);
          packages.set(split.xtest.id, split.xtest);
        } else {
          packages.set(pkgPath, resolved);
        }
      }
    },

    query(roots) {
      return walkAll([...roots]);
    },

    match(labels) {
      return walkAll(collectMatchRoots(labels, registry));
    },
  };

  registry.add(...initial);
  return registry;
};
