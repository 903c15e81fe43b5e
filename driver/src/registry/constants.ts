/**
 * Prefix the build tool puts in front of standard-library package IDs.
 * Stripped during canonicalization.
 */
export const STDLIB_ID_PREFIX = "@@io_bazel_rules_go//stdlib:";

/**
 * Label that stands for the whole standard library.
 * It never appears as a package itself; `match` expands it to every stdlib node.
 */
export const STDLIB_ROOT_LABEL = "@io_bazel_rules_go//:stdlib";

/** Repository anchor every canonical label starts with. */
export const LABEL_ANCHOR = "@";

/** Suffix of the synthesized external test package of a label. */
export const XTEST_SUFFIX = "_xtest";
