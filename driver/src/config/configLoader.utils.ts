import { existsSync, readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import type { BuildContext } from "../packages/buildConstraints.js";
import {
  type BuildConfig,
  type DriverConfig,
  DriverConfigSchema,
} from "./Config.schemas.js";

/**
 * Supported config file name.
 */
export const CONFIG_FILE_NAME = "pkgdriver.config.json" as const;

export const DEFAULT_BUILD_CONTEXT: BuildContext = {
  goos: "linux",
  goarch: "amd64",
  tags: [],
  cgoEnabled: true,
  goVersion: 21,
};

/**
 * Find a config file in the given directory.
 *
 * @returns Path to config file, or null if not found
 */
export const findConfigFile = (directory: string): string | null => {
  const configPath = join(directory, CONFIG_FILE_NAME);
  return existsSync(configPath) ? configPath : null;
};

/**
 * Parse and validate config content.
 *
 * @throws Error if JSON is invalid or config structure is invalid
 */
export const parseConfig = (content: string): DriverConfig => {
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error("Invalid JSON");
  }

  return DriverConfigSchema.parse(rawConfig);
};

/**
 * Load and validate a JSON config file.
 * Package file paths are made absolute against the config file's directory.
 */
export const loadConfig = (configPath: string): DriverConfig => {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  let config: DriverConfig;
  try {
    config = parseConfig(readFileSync(configPath, "utf-8"));
  } catch (e) {
    if (e instanceof Error && e.message === "Invalid JSON") {
      throw new Error(`Failed to parse JSON config: ${configPath}`);
    }
    throw e;
  }

  const directory = dirname(configPath);
  return {
    ...config,
    packageFiles: config.packageFiles.map((file) => resolve(directory, file)),
  };
};

/**
 * Parse `KEY=VALUE` entries (as sent in a driver request) into a record.
 * Later entries win.
 */
export const parseEnvEntries = (
  entries: readonly string[],
): Record<string, string> => {
  const env: Record<string, string> = {};
  for (const entry of entries) {
    const separator = entry.indexOf("=");
    if (separator > 0) {
      env[entry.slice(0, separator)] = entry.slice(separator + 1);
    }
  }
  return env;
};

/**
 * Build context from config, with GOOS, GOARCH and CGO_ENABLED taking precedence.
 *
 * @example
 * resolveBuildContext({ goos: "darwin" }, { GOARCH: "arm64" })
 * // { goos: "darwin", goarch: "arm64", tags: [], cgoEnabled: true, goVersion: 21 }
 */
export const resolveBuildContext = (
  build: BuildConfig | undefined,
  env: Record<string, string | undefined>,
): BuildContext => {
  const cgoFromEnv =
    env.CGO_ENABLED === undefined ? undefined : env.CGO_ENABLED === "1";

  return {
    goos: env.GOOS || build?.goos || DEFAULT_BUILD_CONTEXT.goos,
    goarch: env.GOARCH || build?.goarch || DEFAULT_BUILD_CONTEXT.goarch,
    tags: build?.tags ?? DEFAULT_BUILD_CONTEXT.tags,
    cgoEnabled:
      cgoFromEnv ?? build?.cgoEnabled ?? DEFAULT_BUILD_CONTEXT.cgoEnabled,
    goVersion: build?.goVersion ?? DEFAULT_BUILD_CONTEXT.goVersion,
  };
};
