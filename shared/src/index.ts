// Wire types of the packages-driver protocol.
// Field names follow the JSON written by the build tool's package aspect and
// read by the tooling that invokes the driver.

/** Type alias for package IDs (the canonical edge target). */
export type PackageId = string;

/** Type alias for logical package paths (e.g., "example.com/foo/bar"). */
export type PackagePath = string;

/** Error attached to a package by the producer. */
export interface FlatPackageError {
  Pos?: string;
  Msg: string;
  Kind?: number;
}

/**
 * One compilation unit as written by the producer.
 *
 * `Imports` maps an import path to the target package ID. A missing key and
 * an empty value both mean the import is unresolved.
 */
export interface FlatPackage {
  ID: PackageId;
  Name?: string;
  PkgPath?: PackagePath;
  Errors?: FlatPackageError[];
  GoFiles?: string[];
  CompiledGoFiles?: string[];
  OtherFiles?: string[];
  ExportFile?: string;
  Imports?: Record<string, PackageId>;
  Standard?: boolean;
}

/** Request written to the driver's stdin by the invoking tool. */
export interface DriverRequest {
  Mode?: number;
  Env?: string[];
  BuildFlags?: string[];
  Tests?: boolean;
  Overlay?: Record<string, string>;
}

/** Response written to the driver's stdout. */
export interface DriverResponse {
  /** When true, the invoking tool falls back to its own package loading. */
  NotHandled: boolean;
  Compiler?: string;
  Arch?: string;
  Roots?: PackageId[];
  Packages?: FlatPackage[];
}
