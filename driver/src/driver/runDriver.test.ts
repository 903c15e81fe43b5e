import { describe, expect, it } from "vitest";
import type { DriverConfig } from "../config/Config.schemas.js";
import type { DriverLogger } from "../logging/DriverLogger.js";
import { createMemorySourceReader } from "../packages/createMemorySourceReader.js";
import { createPackageRegistry } from "../registry/PackageRegistry.js";
import { createPackageNode } from "../registry/PackageNode.js";
import { findPackagesContainingFile, runDriver } from "./runDriver.js";

const config: DriverConfig = {
  packageFiles: [
    "/bazel/app.pkg.json",
    "/bazel/lib.pkg.json",
    "/bazel/lib_proto.pkg.json",
    "/bazel/stdlib.pkg.json",
  ],
  roots: { execRoot: "/exec", outputBase: "/out", workspaceRoot: "/ws" },
};

const STDLIB = "@@io_bazel_rules_go//stdlib:";

const files: Record<string, string> = {
  "/bazel/app.pkg.json": JSON.stringify([
    {
      ID: "//app:go_default_library",
      PkgPath: "example.com/app",
      Name: "app",
      GoFiles: [
        "__BAZEL_WORKSPACE__/app/app.go",
        "__BAZEL_WORKSPACE__/app/app_windows.go",
        "__BAZEL_WORKSPACE__/app/app_ext_test.go",
      ],
      CompiledGoFiles: [
        "__BAZEL_WORKSPACE__/app/app.go",
        "__BAZEL_WORKSPACE__/app/app_windows.go",
        "__BAZEL_WORKSPACE__/app/app_ext_test.go",
      ],
      Imports: { "example.com/lib": "//lib:go_default_library" },
    },
  ]),
  "/bazel/lib.pkg.json": JSON.stringify({
    ID: "//lib:go_default_library",
    PkgPath: "example.com/lib",
    GoFiles: ["__BAZEL_WORKSPACE__/lib/lib.go"],
    CompiledGoFiles: ["__BAZEL_WORKSPACE__/lib/lib.go"],
  }),
  "/bazel/lib_proto.pkg.json": JSON.stringify({
    ID: "//lib:go_proto",
    PkgPath: "example.com/lib",
    GoFiles: [
      "__BAZEL_WORKSPACE__/lib/lib.go",
      "__BAZEL_EXECROOT__/bazel-out/lib/lib.pb.go",
    ],
  }),
  "/bazel/stdlib.pkg.json": JSON.stringify([
    {
      ID: `${STDLIB}fmt`,
      PkgPath: "fmt",
      Name: "fmt",
      GoFiles: ["__BAZEL_OUTPUT_BASE__/go/src/fmt/print.go"],
      Imports: { strings: `${STDLIB}strings` },
      Standard: true,
    },
    { ID: `${STDLIB}strings`, PkgPath: "strings", Name: "strings", Standard: true },
    { ID: `${STDLIB}testing`, PkgPath: "testing", Name: "testing", Standard: true },
  ]),
  "/ws/app/app.go":
    'package app\n\nimport (\n\t"fmt"\n\t"example.com/lib"\n)\n\nfunc Run() {}\n',
  "/ws/app/app_ext_test.go":
    'package app_test\n\nimport (\n\t"testing"\n\t"example.com/app"\n)\n',
  "/ws/lib/lib.go": 'package lib\n\nimport "strings"\n',
  "/exec/bazel-out/lib/lib.pb.go": "package lib\n",
  "/out/go/src/fmt/print.go": "package fmt\n",
};

const createRecordingLogger = () => {
  const lines: string[] = [];
  const logger: DriverLogger = {
    success(message) {
      lines.push(`success: ${message}`);
    },
    info(message) {
      lines.push(`info: ${message}`);
    },
    warn(message) {
      lines.push(`warn: ${message}`);
    },
    error(message) {
      lines.push(`error: ${message}`);
    },
  };
  return { logger, lines };
};

const drive = (patterns: string[]) =>
  runDriver({
    config,
    request: {},
    patterns,
    reader: createMemorySourceReader(files),
  });

describe(runDriver.name, () => {
  it("answers a package path with its resolved dependency closure", () => {
    const response = drive(["example.com/app"]);

    expect(response.NotHandled).toBe(false);
    expect(response.Compiler).toBe("gc");
    expect(response.Arch).toBe("amd64");
    expect(response.Roots).toEqual(["example.com/app"]);
    expect(response.Packages?.map((pkg) => pkg.ID)).toEqual([
      "example.com/app",
      "example.com/lib",
      "fmt",
      "strings",
      "testing",
    ]);
  });

  it("resolves paths, filters files and discovers imports", () => {
    const response = drive(["example.com/app"]);
    const app = response.Packages?.find((pkg) => pkg.ID === "example.com/app");

    expect(app).toEqual({
      ID: "example.com/app",
      PkgPath: "example.com/app",
      Name: "app",
      GoFiles: ["/ws/app/app.go"],
      CompiledGoFiles: ["/ws/app/app.go"],
      Imports: {
        "example.com/lib": "example.com/lib",
        fmt: "fmt",
        testing: "testing",
      },
    });
  });

  it("merges duplicate registrations of a package", () => {
    const response = drive(["example.com/lib"]);
    const lib = response.Packages?.find((pkg) => pkg.ID === "example.com/lib");

    expect(lib).toEqual({
      ID: "example.com/lib",
      PkgPath: "example.com/lib",
      Name: "lib",
      GoFiles: ["/ws/lib/lib.go", "/exec/bazel-out/lib/lib.pb.go"],
      CompiledGoFiles: ["/ws/lib/lib.go"],
      Imports: { strings: "strings" },
    });
  });

  it("keeps stdlib packages in their canonical form", () => {
    const response = drive(["fmt"]);

    expect(response.Packages).toEqual([
      {
        ID: "fmt",
        PkgPath: "fmt",
        Name: "fmt",
        GoFiles: ["/out/go/src/fmt/print.go"],
        Imports: { strings: "strings" },
        Standard: true,
      },
      { ID: "strings", PkgPath: "strings", Name: "strings", Standard: true },
    ]);
  });

  it("selects the external test package of a test file", () => {
    const response = drive(["file=/ws/app/app_ext_test.go"]);

    expect(response.Roots).toEqual(["example.com/app_xtest"]);
    expect(response.Packages?.map((pkg) => pkg.ID)).toEqual([
      "example.com/app",
      "example.com/app_xtest",
      "example.com/lib",
      "fmt",
      "strings",
      "testing",
    ]);
    expect(
      response.Packages?.find((pkg) => pkg.ID === "example.com/app_xtest"),
    ).toEqual({
      ID: "example.com/app_xtest",
      PkgPath: "example.com/app_xtest",
      Name: "app_test",
      GoFiles: ["/ws/app/app_ext_test.go"],
      CompiledGoFiles: ["/ws/app/app_ext_test.go"],
      Imports: { "example.com/app": "example.com/app", testing: "testing" },
    });
  });

  it("expands the stdlib label to every stdlib package", () => {
    const response = drive(["@io_bazel_rules_go//:stdlib"]);

    expect(response.Roots).toEqual(["fmt", "strings", "testing"]);
    expect(response.Packages?.map((pkg) => pkg.ID)).toEqual([
      "fmt",
      "strings",
      "testing",
    ]);
  });

  it("merges the roots of labels and package paths", () => {
    const response = drive(["@io_bazel_rules_go//:stdlib", "example.com/lib"]);

    expect(response.Roots).toEqual([
      "fmt",
      "strings",
      "testing",
      "example.com/lib",
    ]);
    expect(response.Packages?.map((pkg) => pkg.ID)).toEqual([
      "example.com/lib",
      "fmt",
      "strings",
      "testing",
    ]);
  });

  it("warns about labels that match no package", () => {
    const { logger, lines } = createRecordingLogger();

    const response = runDriver({
      config,
      request: {},
      patterns: ["//missing:lib"],
      reader: createMemorySourceReader(files),
      logger,
    });

    expect(response.Roots).toEqual(["@//missing:lib"]);
    expect(response.Packages).toEqual([]);
    expect(lines).toEqual([
      "info: Loaded 5 packages from 4 files",
      "warn: package ID not found: @//missing:lib",
      "success: Resolved 0 packages from 1 roots",
    ]);
  });

  it("takes the target architecture from the request environment", () => {
    const response = runDriver({
      config,
      request: { Env: ["GOARCH=arm64"] },
      patterns: [],
      reader: createMemorySourceReader(files),
      env: { GOARCH: "386" },
    });

    expect(response.Arch).toBe("arm64");
    expect(response.Roots).toEqual([]);
    expect(response.Packages).toEqual([]);
  });

  it("keeps files for the target OS of the request", () => {
    const response = runDriver({
      config,
      request: { Env: ["GOOS=windows"] },
      patterns: ["example.com/app"],
      reader: createMemorySourceReader({
        ...files,
        "/ws/app/app_windows.go": "package app\n",
      }),
    });

    expect(
      response.Packages?.find((pkg) => pkg.ID === "example.com/app")?.GoFiles,
    ).toEqual(["/ws/app/app.go", "/ws/app/app_windows.go"]);
  });

  it("fails when a package file is invalid", () => {
    expect(() =>
      runDriver({
        config: { ...config, packageFiles: ["/bazel/broken.pkg.json"] },
        request: {},
        patterns: [],
        reader: createMemorySourceReader({ "/bazel/broken.pkg.json": "[{" }),
      }),
    ).toThrow("Cannot load package file /bazel/broken.pkg.json: Invalid JSON");
  });

  it("fails when a source file is missing", () => {
    const withoutLib = Object.fromEntries(
      Object.entries(files).filter(([path]) => path !== "/ws/lib/lib.go"),
    );

    expect(() =>
      runDriver({
        config,
        request: {},
        patterns: [],
        reader: createMemorySourceReader(withoutLib),
      }),
    ).toThrow("File not found: /ws/lib/lib.go");
  });
});

describe(findPackagesContainingFile.name, () => {
  it("finds packages by source or compiled file", () => {
    const registry = createPackageRegistry(
      {
        operations: {
          resolvePaths: (node) => node,
          filterFiles: (node) => node,
          resolveImports: (node) => node,
          splitExternalTests: () => null,
        },
      },
      createPackageNode({ id: "example.com/a", files: ["/ws/a/a.go"] }),
      createPackageNode({ id: "example.com/b", compiledFiles: ["/ws/a/a.go"] }),
      createPackageNode({ id: "example.com/c", files: ["/ws/c/c.go"] }),
    );

    expect(findPackagesContainingFile(registry, "/ws/a/a.go")).toEqual([
      "example.com/a",
      "example.com/b",
    ]);
  });
});
