import type { PackageId } from "@pkgdriver/shared";
import { STDLIB_ID_PREFIX } from "./constants.js";
import type { PackageNode } from "./PackageNode.js";

/**
 * Compute the canonical edge target for one import of `node`.
 *
 * - Stdlib-decorated IDs are unwrapped: "@@io_bazel_rules_go//stdlib:fmt" -> "fmt"
 * - Imports of stdlib packages keep the build tool's ID
 * - Every other import is keyed by its import path
 *
 * @example
 * canonicalizeId("example.com/foo", "//foo:go_default_library", node) // "example.com/foo"
 */
export const canonicalizeId = (
  path: string,
  id: PackageId | null,
  node: Pick<PackageNode, "standard">,
): PackageId | null => {
  if (id?.startsWith(STDLIB_ID_PREFIX)) {
    return id.slice(STDLIB_ID_PREFIX.length);
  }
  if (node.standard) {
    return id;
  }
  return path;
};

/**
 * Rewrite a node to path-based identity: `id` becomes `pkgPath` and every
 * import target goes through {@link canonicalizeId}.
 */
export const rewriteNode = (node: PackageNode): PackageNode => {
  const imports = new Map<string, PackageId | null>();
  for (const [importPath, target] of node.imports) {
    imports.set(importPath, canonicalizeId(importPath, target, node));
  }
  return { ...node, id: node.pkgPath, imports };
};
