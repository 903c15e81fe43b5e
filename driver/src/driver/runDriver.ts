import type {
  DriverRequest,
  DriverResponse,
  PackageId,
} from "@pkgdriver/shared";
import type { DriverConfig } from "../config/Config.schemas.js";
import {
  parseEnvEntries,
  resolveBuildContext,
} from "../config/configLoader.utils.js";
import type { DriverLogger } from "../logging/DriverLogger.js";
import { silentLogger } from "../logging/SilentDriverLogger.js";
import { createGoPackageOperations } from "../packages/createGoPackageOperations.js";
import { createPathResolver } from "../packages/createPathResolver.js";
import { fileSystemReader, type SourceReader } from "../packages/SourceReader.js";
import {
  createPackageRegistry,
  type PackageRegistry,
  type QueryResult,
} from "../registry/PackageRegistry.js";
import { type PackageNode, toFlatPackage } from "../registry/PackageNode.js";
import { LABEL_ANCHOR } from "../registry/constants.js";
import { loadPackageFiles } from "./loadPackageFiles.js";

/** Pattern prefix selecting the packages that contain a file */
export const FILE_PATTERN_PREFIX = "file=";

const isLabel = (pattern: string): boolean =>
  pattern.startsWith(LABEL_ANCHOR) || pattern.startsWith("//");

export interface DriverOptions {
  config: DriverConfig;
  request: DriverRequest;
  /** Labels, `file=<path>` patterns, or package paths */
  patterns: readonly string[];
  reader?: SourceReader;
  logger?: DriverLogger;
  /** Process environment; entries of `request.Env` take precedence */
  env?: Record<string, string | undefined>;
}

/**
 * IDs of the packages listing `file` among their source files.
 */
export const findPackagesContainingFile = (
  registry: PackageRegistry,
  file: string,
): PackageId[] =>
  registry
    .nodes()
    .filter(
      (node) => node.files.includes(file) || node.compiledFiles.includes(file),
    )
    .map((node) => node.id);

const mergeResults = (results: QueryResult[]): QueryResult => {
  const roots = new Set<PackageId>();
  const packages = new Map<PackageId, PackageNode>();
  for (const result of results) {
    for (const root of result.roots) {
      roots.add(root);
    }
    for (const node of result.packages) {
      packages.set(node.id, node);
    }
  }
  return {
    roots: [...roots],
    packages: [...packages.values()],
    warnings: results.flatMap((result) => result.warnings),
  };
};

/**
 * Build the package graph from the configured package files and answer one
 * driver request.
 *
 * @throws when a package file, a source file, or the configuration is invalid
 */
export const runDriver = ({
  config,
  request,
  patterns,
  reader = fileSystemReader,
  logger = silentLogger,
  env = {},
}: DriverOptions): DriverResponse => {
  const buildContext = resolveBuildContext(config.build, {
    ...env,
    ...parseEnvEntries(request.Env ?? []),
  });

  const nodes = loadPackageFiles(config.packageFiles, reader);
  const registry = createPackageRegistry({
    operations: createGoPackageOperations({ reader, buildContext }),
    logger,
  });
  for (const node of nodes) {
    registry.update(node);
  }
  logger.info(
    `Loaded ${registry.nodes().length} packages from ${config.packageFiles.length} files`,
  );

  registry.resolvePaths(createPathResolver(config.roots));
  registry.resolveImports();

  const labels: string[] = [];
  const pathRoots: PackageId[] = [];
  for (const pattern of patterns) {
    if (pattern.startsWith(FILE_PATTERN_PREFIX)) {
      const file = pattern.slice(FILE_PATTERN_PREFIX.length);
      pathRoots.push(...findPackagesContainingFile(registry, file));
    } else if (isLabel(pattern)) {
      labels.push(pattern);
    } else {
      pathRoots.push(pattern);
    }
  }

  const results: QueryResult[] = [];
  if (labels.length > 0) {
    results.push(registry.match(labels));
  }
  if (pathRoots.length > 0) {
    results.push(registry.query(pathRoots));
  }
  const result = mergeResults(results);

  logger.success(
    `Resolved ${result.packages.length} packages from ${result.roots.length} roots`,
  );

  return {
    NotHandled: false,
    Compiler: "gc",
    Arch: buildContext.goarch,
    Roots: result.roots,
    Packages: result.packages
      .map(toFlatPackage)
      .sort((a, b) => a.ID.localeCompare(b.ID)),
  };
};
