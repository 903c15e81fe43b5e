import type { PackageId } from "@pkgdriver/shared";
import type { PackageNode } from "./PackageNode.js";

/**
 * Non-fatal condition found while walking the graph.
 */
export interface WalkDiagnostic {
  level: "warn";
  message: string;
  /** The package ID that was looked up */
  root: PackageId;
}

export type DiagnosticSink = (diagnostic: WalkDiagnostic) => void;

export type PackageLookup = (id: PackageId) => PackageNode | undefined;

/**
 * Depth-first walk from `root`, adding every reachable package to `visited`
 * (keyed by ID).
 *
 * IDs that are not in the registry are reported to `report` and skipped.
 * Unresolved edges (`null`) are skipped silently. Already-visited IDs are
 * never expanded twice, so cycles terminate.
 */
export const walkPackages = (
  lookup: PackageLookup,
  visited: Map<PackageId, PackageNode>,
  root: PackageId,
  report: DiagnosticSink,
): void => {
  const pending: PackageId[] = [root];

  for (let id = pending.pop(); id !== undefined; id = pending.pop()) {
    if (visited.has(id)) {
      continue;
    }

    const node = lookup(id);
    if (!node) {
      report({ level: "warn", message: "package ID not found", root: id });
      continue;
    }

    visited.set(node.id, node);
    for (const target of node.imports.values()) {
      if (target !== null && !visited.has(target)) {
        pending.push(target);
      }
    }
  }
};
