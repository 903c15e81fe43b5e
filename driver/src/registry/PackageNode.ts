import type {
  FlatPackage,
  FlatPackageError,
  PackageId,
  PackagePath,
} from "@pkgdriver/shared";

/**
 * Import edges of a package: import path -> target package ID.
 * `null` marks an unresolved edge (dependency outside the known universe).
 */
export type ImportEdges = ReadonlyMap<string, PackageId | null>;

/**
 * One compilation unit inside the registry.
 *
 * Records are never mutated: every pass that changes a package stores a new
 * record in the registry slot for its `pkgPath`.
 */
export interface PackageNode {
  /** Canonical identity, equal to `pkgPath` once registered */
  readonly id: PackageId;
  /** Logical path, the registry key */
  readonly pkgPath: PackagePath;
  /** Package name ("" until discovered from sources) */
  readonly name: string;
  /** Source files, in the producer's order */
  readonly files: readonly string[];
  /** Files actually compiled (scanned for imports) */
  readonly compiledFiles: readonly string[];
  readonly otherFiles: readonly string[];
  readonly exportFile: string;
  readonly imports: ImportEdges;
  /** Standard-library flag */
  readonly standard: boolean;
  readonly errors: readonly FlatPackageError[];
}

/**
 * Build a node from its wire form.
 * Empty import targets are read as unresolved; a missing PkgPath falls back to the ID.
 */
export const fromFlatPackage = (pkg: FlatPackage): PackageNode => {
  const imports = new Map<string, PackageId | null>();
  for (const [importPath, target] of Object.entries(pkg.Imports ?? {})) {
    imports.set(importPath, target === "" ? null : target);
  }

  return {
    id: pkg.ID,
    pkgPath: pkg.PkgPath ?? pkg.ID,
    name: pkg.Name ?? "",
    files: pkg.GoFiles ?? [],
    compiledFiles: pkg.CompiledGoFiles ?? [],
    otherFiles: pkg.OtherFiles ?? [],
    exportFile: pkg.ExportFile ?? "",
    imports,
    standard: pkg.Standard ?? false,
    errors: pkg.Errors ?? [],
  };
};

/**
 * Wire form of a node. Unresolved edges are omitted, empty lists are dropped.
 */
export const toFlatPackage = (node: PackageNode): FlatPackage => {
  const imports: Record<string, PackageId> = {};
  for (const [importPath, target] of node.imports) {
    if (target !== null) {
      imports[importPath] = target;
    }
  }

  const pkg: FlatPackage = { ID: node.id, PkgPath: node.pkgPath };
  if (node.name !== "") {
    pkg.Name = node.name;
  }
  if (node.files.length > 0) {
    pkg.GoFiles = [...node.files];
  }
  if (node.compiledFiles.length > 0) {
    pkg.CompiledGoFiles = [...node.compiledFiles];
  }
  if (node.otherFiles.length > 0) {
    pkg.OtherFiles = [...node.otherFiles];
  }
  if (node.exportFile !== "") {
    pkg.ExportFile = node.exportFile;
  }
  if (Object.keys(imports).length > 0) {
    pkg.Imports = imports;
  }
  if (node.standard) {
    pkg.Standard = true;
  }
  if (node.errors.length > 0) {
    pkg.Errors = [...node.errors];
  }
  return pkg;
};

/**
 * Create a node with defaults for every field not given.
 * Used by tests and by the driver when synthesizing packages.
 */
export const createPackageNode = (
  fields: Pick<PackageNode, "id"> & Partial<PackageNode>,
): PackageNode => ({
  pkgPath: fields.id,
  name: "",
  files: [],
  compiledFiles: [],
  otherFiles: [],
  exportFile: "",
  imports: new Map(),
  standard: false,
  errors: [],
  ...fields,
});
