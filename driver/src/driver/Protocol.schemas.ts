import type {
  DriverRequest,
  FlatPackage,
  FlatPackageError,
} from "@pkgdriver/shared";
import { z } from "zod";

export const FlatPackageErrorSchema: z.ZodType<FlatPackageError> = z.object({
  Pos: z.string().optional(),
  Msg: z.string(),
  Kind: z.number().int().optional(),
});

export const FlatPackageSchema: z.ZodType<FlatPackage> = z.object({
  ID: z.string().min(1),
  Name: z.string().optional(),
  PkgPath: z.string().optional(),
  Errors: z.array(FlatPackageErrorSchema).optional(),
  GoFiles: z.array(z.string()).optional(),
  CompiledGoFiles: z.array(z.string()).optional(),
  OtherFiles: z.array(z.string()).optional(),
  ExportFile: z.string().optional(),
  Imports: z.record(z.string()).optional(),
  Standard: z.boolean().optional(),
});

/** A package file holds one package or a list of packages */
export const PackageFileSchema = z.union([
  FlatPackageSchema,
  z.array(FlatPackageSchema),
]);

export const DriverRequestSchema: z.ZodType<DriverRequest> = z.object({
  Mode: z.number().int().optional(),
  Env: z.array(z.string()).optional(),
  BuildFlags: z.array(z.string()).optional(),
  Tests: z.boolean().optional(),
  Overlay: z.record(z.string()).optional(),
});
