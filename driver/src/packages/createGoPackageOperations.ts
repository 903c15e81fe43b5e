import type { PackageId } from "@pkgdriver/shared";
import type { PackageOperations } from "../registry/PackageOperations.js";
import type { PackageNode } from "../registry/PackageNode.js";
import type { BuildContext } from "./buildConstraints.js";
import { ImportResolutionError } from "./errors.js";
import { filterFilesForBuildTags } from "./filterFilesForBuildTags.js";
import { type GoFileScan, scanGoFile } from "./scanGoFile.js";
import type { SourceReader } from "./SourceReader.js";
import { splitExternalTests } from "./splitExternalTests.js";

// cgo pseudo-package, never a real dependency
const CGO_IMPORT = "C";

export interface GoPackageOperationsOptions {
  reader: SourceReader;
  buildContext: BuildContext;
}

/**
 * Package operations backed by Go sources.
 *
 * Import discovery scans every compiled file; the scans are kept so the
 * external test split can classify files without reading them again.
 */
export const createGoPackageOperations = ({
  reader,
  buildContext,
}: GoPackageOperationsOptions): PackageOperations => {
  const scans = new Map<string, GoFileScan>();

  const scanFile = (node: PackageNode, file: string): GoFileScan => {
    const cached = scans.get(file);
    if (cached) {
      return cached;
    }
    try {
      const scan = scanGoFile(reader.readFile(file));
      scans.set(file, scan);
      return scan;
    } catch (error) {
      throw new ImportResolutionError(node.pkgPath, file, error);
    }
  };

  return {
    resolvePaths(node, resolve) {
      return {
        ...node,
        files: node.files.map(resolve),
        compiledFiles: node.compiledFiles.map(resolve),
        otherFiles: node.otherFiles.map(resolve),
        exportFile: node.exportFile === "" ? "" : resolve(node.exportFile),
      };
    },

    filterFiles(node) {
      return filterFilesForBuildTags(node, buildContext, reader);
    },

    resolveImports(node, resolve) {
      // Stdlib packages come with complete imports
      if (node.standard) {
        return node;
      }

      const imports = new Map<string, PackageId | null>();
      for (const [importPath, target] of node.imports) {
        imports.set(importPath, target ?? resolve(importPath));
      }

      let name = node.name;
      for (const file of node.compiledFiles) {
        const scan = scanFile(node, file);
        if (name === "" && !scan.packageName.endsWith("_test")) {
          name = scan.packageName;
        }
        for (const importPath of scan.imports) {
          if (
            importPath === CGO_IMPORT ||
            importPath === node.pkgPath ||
            imports.has(importPath)
          ) {
            continue;
          }
          imports.set(importPath, resolve(importPath));
        }
      }

      return { ...node, name, imports };
    },

    splitExternalTests(node) {
      return splitExternalTests(node, (file) => scans.get(file));
    },
  };
};
