import { z } from "zod";

// --- Schemas ---

export const BuildRootsSchema = z.object({
  /** Replaces __BAZEL_EXECROOT__ */
  execRoot: z.string().min(1),
  /** Replaces __BAZEL_OUTPUT_BASE__ */
  outputBase: z.string().min(1),
  /** Replaces __BAZEL_WORKSPACE__ */
  workspaceRoot: z.string().min(1),
});

export const BuildConfigSchema = z.object({
  /** Target OS (default: 'linux', overridden by GOOS) */
  goos: z.string().min(1).optional(),
  /** Target architecture (default: 'amd64', overridden by GOARCH) */
  goarch: z.string().min(1).optional(),
  /** Extra build tags */
  tags: z.array(z.string().min(1)).optional(),
  /** Whether the cgo tag is satisfied (default: true, overridden by CGO_ENABLED) */
  cgoEnabled: z.boolean().optional(),
  /** Go minor version for release tags (default: 21) */
  goVersion: z.number().int().nonnegative().optional(),
});

/** Driver configuration schema */
export const DriverConfigSchema = z.object({
  /** Package JSON files written by the build tool (relative to the config file) */
  packageFiles: z.array(z.string().min(1)).min(1),
  /** Directories behind the build tool's path placeholders */
  roots: BuildRootsSchema,
  /** Build configuration files are filtered against */
  build: BuildConfigSchema.optional(),
});

// --- Inferred Types ---

export type DriverConfig = z.infer<typeof DriverConfigSchema>;
export type BuildConfig = z.infer<typeof BuildConfigSchema>;
