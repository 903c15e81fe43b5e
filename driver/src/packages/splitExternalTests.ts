import type { PackageId } from "@pkgdriver/shared";
import { XTEST_SUFFIX } from "../registry/constants.js";
import type { SplitResult } from "../registry/PackageOperations.js";
import { createPackageNode, type PackageNode } from "../registry/PackageNode.js";
import type { GoFileScan } from "./scanGoFile.js";

const TEST_FILE_SUFFIX = "_test.go";
const TEST_PACKAGE_SUFFIX = "_test";

/**
 * Move the external test files of a package (`*_test.go` files declaring
 * `package <name>_test`) into a package of their own.
 *
 * Only compiled files with a known scan are considered; the split never reads
 * files itself.
 *
 * @returns null when the package has no external test files
 */
export const splitExternalTests = (
  node: PackageNode,
  scanOf: (file: string) => GoFileScan | undefined,
): SplitResult | null => {
  const xtestScans = new Map<string, GoFileScan>();
  for (const file of node.compiledFiles) {
    const scan = scanOf(file);
    if (
      file.endsWith(TEST_FILE_SUFFIX) &&
      scan?.packageName.endsWith(TEST_PACKAGE_SUFFIX)
    ) {
      xtestScans.set(file, scan);
    }
  }
  if (xtestScans.size === 0) {
    return null;
  }

  const imports = new Map<string, PackageId | null>([[node.pkgPath, node.id]]);
  for (const scan of xtestScans.values()) {
    for (const importPath of scan.imports) {
      if (!imports.has(importPath)) {
        imports.set(importPath, node.imports.get(importPath) ?? null);
      }
    }
  }

  const isKept = (file: string): boolean => !xtestScans.has(file);
  const xtestFiles = [...xtestScans.keys()];
  const [firstScan] = xtestScans.values();
  const xtestId = `${node.id}${XTEST_SUFFIX}`;

  return {
    parent: {
      ...node,
      files: node.files.filter(isKept),
      compiledFiles: node.compiledFiles.filter(isKept),
    },
    xtest: createPackageNode({
      id: xtestId,
      pkgPath: xtestId,
      name: firstScan?.packageName ?? `${node.name}${TEST_PACKAGE_SUFFIX}`,
      files: xtestFiles,
      compiledFiles: xtestFiles,
      imports,
    }),
  };
};
