import type { PackageId } from "@pkgdriver/shared";
import { LABEL_ANCHOR, STDLIB_ROOT_LABEL, XTEST_SUFFIX } from "./constants.js";
import type { PackageNode } from "./PackageNode.js";

/**
 * Prefix a label with the repository anchor when it has none.
 * Legacy labels ("//pkg:lib") and canonical labels ("@//pkg:lib") end up identical.
 */
export const normalizeLabel = (label: string): string =>
  label.startsWith(LABEL_ANCHOR) ? label : `${LABEL_ANCHOR}${label}`;

/**
 * Read-only view of the registry needed to expand labels into roots.
 */
export interface RootSource {
  has(id: PackageId): boolean;
  nodes(): Iterable<PackageNode>;
}

/**
 * Expand build labels into the de-duplicated set of walk roots.
 *
 * - The stdlib root label expands to every standard-library package
 * - Any other label is a root, followed by its `_xtest` companion when registered
 */
export const collectMatchRoots = (
  labels: readonly string[],
  source: RootSource,
): PackageId[] => {
  const roots = new Set<PackageId>();

  for (const rawLabel of labels) {
    const label = normalizeLabel(rawLabel);

    if (label === STDLIB_ROOT_LABEL) {
      for (const node of source.nodes()) {
        if (node.standard) {
          roots.add(node.id);
        }
      }
      continue;
    }

    roots.add(label);
    const xtest = `${label}${XTEST_SUFFIX}`;
    if (source.has(xtest)) {
      roots.add(xtest);
    }
  }

  return [...roots];
};
