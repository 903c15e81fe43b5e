#!/usr/bin/env node

/**
 * pkgdriver entry point
 *
 * Usage:
 *   pkgdriver example.com/foo               # Packages reachable from a package path
 *   pkgdriver //foo:go_default_library      # Packages for a label (request JSON on stdin)
 *   pkgdriver file=/abs/path/foo.go         # Packages containing a file
 *   pkgdriver @io_bazel_rules_go//:stdlib   # Every standard-library package
 */

const args = process.argv.slice(2);

import("./driver/src/driver/startDriver.js")
  .then(({ startDriver }) => startDriver(args))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((err) => {
    console.error("pkgdriver failed:", err);
    process.exit(1);
  });
