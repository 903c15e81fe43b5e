import type { DriverRequest, FlatPackage } from "@pkgdriver/shared";
import type { SourceReader } from "../packages/SourceReader.js";
import { fromFlatPackage, type PackageNode } from "../registry/PackageNode.js";
import { DriverRequestSchema, PackageFileSchema } from "./Protocol.schemas.js";

const parseJson = (content: string): unknown => {
  try {
    return JSON.parse(content);
  } catch {
    throw new Error("Invalid JSON");
  }
};

/**
 * Parse the content of one package file.
 *
 * @throws Error if JSON is invalid or a package does not match the schema
 */
export const parsePackageFile = (content: string): FlatPackage[] => {
  const parsed = PackageFileSchema.parse(parseJson(content));
  return Array.isArray(parsed) ? parsed : [parsed];
};

/**
 * Parse a driver request. Empty input is an empty request.
 */
export const parseRequest = (content: string): DriverRequest => {
  if (content.trim() === "") {
    return {};
  }
  return DriverRequestSchema.parse(parseJson(content));
};

/**
 * Read every package file, in order, and convert its packages to nodes.
 *
 * @throws Error naming the file when it cannot be read or is invalid
 */
export const loadPackageFiles = (
  paths: readonly string[],
  reader: SourceReader,
): PackageNode[] => {
  const nodes: PackageNode[] = [];
  for (const path of paths) {
    let packages: FlatPackage[];
    try {
      packages = parsePackageFile(reader.readFile(path));
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new Error(`Cannot load package file ${path}: ${reason}`, {
        cause: e,
      });
    }
    nodes.push(...packages.map(fromFlatPackage));
  }
  return nodes;
};
