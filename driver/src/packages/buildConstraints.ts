import { basename } from "node:path";
import { GoSyntaxError } from "./errors.js";

/**
 * Active build configuration files are filtered against.
 */
export interface BuildContext {
  goos: string;
  goarch: string;
  /** Extra tags passed with -tags */
  tags: readonly string[];
  cgoEnabled: boolean;
  /** Minor version of the Go release (21 for go1.21) */
  goVersion: number;
}

export type BuildExpr =
  | { kind: "tag"; name: string }
  | { kind: "not"; operand: BuildExpr }
  | { kind: "and"; left: BuildExpr; right: BuildExpr }
  | { kind: "or"; left: BuildExpr; right: BuildExpr };

export const KNOWN_OS = new Set([
  "aix",
  "android",
  "darwin",
  "dragonfly",
  "freebsd",
  "hurd",
  "illumos",
  "ios",
  "js",
  "linux",
  "nacl",
  "netbsd",
  "openbsd",
  "plan9",
  "solaris",
  "wasip1",
  "windows",
  "zos",
]);

export const UNIX_OS = new Set([
  "aix",
  "android",
  "darwin",
  "dragonfly",
  "freebsd",
  "hurd",
  "illumos",
  "ios",
  "linux",
  "netbsd",
  "openbsd",
  "solaris",
]);

export const KNOWN_ARCH = new Set([
  "386",
  "amd64",
  "amd64p32",
  "arm",
  "armbe",
  "arm64",
  "arm64be",
  "loong64",
  "mips",
  "mipsle",
  "mips64",
  "mips64le",
  "mips64p32",
  "mips64p32le",
  "ppc",
  "ppc64",
  "ppc64le",
  "riscv",
  "riscv64",
  "s390",
  "s390x",
  "sparc",
  "sparc64",
  "wasm",
]);

// GOOS values that also satisfy another OS tag
const IMPLIED_OS: Record<string, string> = {
  android: "linux",
  illumos: "solaris",
  ios: "darwin",
};

const RELEASE_TAG = /^go1\.(\d+)$/;

const TOKEN = /\s*(\|\||&&|!|\(|\)|[\p{L}\p{N}_.]+)/uy;

/**
 * Parse a `//go:build` expression.
 * Precedence: `!` binds tighter than `&&`, which binds tighter than `||`.
 *
 * @example
 * parseBuildConstraint("linux && !cgo")
 * // { kind: "and", left: { kind: "tag", name: "linux" }, right: { kind: "not", operand: { kind: "tag", name: "cgo" } } }
 */
export const parseBuildConstraint = (text: string): BuildExpr => {
  const tokens: { value: string; offset: number }[] = [];
  TOKEN.lastIndex = 0;
  while (TOKEN.lastIndex < text.length) {
    const start = TOKEN.lastIndex;
    const match = TOKEN.exec(text);
    if (!match?.[1]) {
      if (text.slice(start).trim() === "") {
        break;
      }
      throw new GoSyntaxError("invalid build constraint", start);
    }
    tokens.push({
      value: match[1],
      offset: match.index + match[0].length - match[1].length,
    });
  }

  let index = 0;
  const peek = (): string | undefined => tokens[index]?.value;
  const offset = (): number => tokens[index]?.offset ?? text.length;

  const parseOr = (): BuildExpr => {
    let left = parseAnd();
    while (peek() === "||") {
      index++;
      left = { kind: "or", left, right: parseAnd() };
    }
    return left;
  };

  const parseAnd = (): BuildExpr => {
    let left = parseNot();
    while (peek() === "&&") {
      index++;
      left = { kind: "and", left, right: parseNot() };
    }
    return left;
  };

  const parseNot = (): BuildExpr => {
    const token = peek();
    if (token === "!") {
      index++;
      return { kind: "not", operand: parseNot() };
    }
    if (token === "(") {
      index++;
      const inner = parseOr();
      if (peek() !== ")") {
        throw new GoSyntaxError("missing ) in build constraint", offset());
      }
      index++;
      return inner;
    }
    if (
      token === undefined ||
      token === ")" ||
      token === "&&" ||
      token === "||"
    ) {
      throw new GoSyntaxError("expected build tag", offset());
    }
    index++;
    return { kind: "tag", name: token };
  };

  const expr = parseOr();
  if (index < tokens.length) {
    throw new GoSyntaxError("unexpected token in build constraint", offset());
  }
  return expr;
};

export const evaluateBuildConstraint = (
  expr: BuildExpr,
  matchTag: (tag: string) => boolean,
): boolean => {
  switch (expr.kind) {
    case "tag":
      return matchTag(expr.name);
    case "not":
      return !evaluateBuildConstraint(expr.operand, matchTag);
    case "and":
      return (
        evaluateBuildConstraint(expr.left, matchTag) &&
        evaluateBuildConstraint(expr.right, matchTag)
      );
    case "or":
      return (
        evaluateBuildConstraint(expr.left, matchTag) ||
        evaluateBuildConstraint(expr.right, matchTag)
      );
  }
};

/**
 * Whether a single build tag is satisfied by the context.
 */
export const matchTag = (tag: string, context: BuildContext): boolean => {
  if (tag === context.goos || tag === context.goarch || tag === "gc") {
    return true;
  }
  if (IMPLIED_OS[context.goos] === tag) {
    return true;
  }
  if (tag === "unix") {
    return UNIX_OS.has(context.goos);
  }
  if (tag === "cgo") {
    return context.cgoEnabled;
  }
  const release = RELEASE_TAG.exec(tag);
  if (release?.[1]) {
    return Number(release[1]) <= context.goVersion;
  }
  return context.tags.includes(tag);
};

/**
 * Whether the `_GOOS`, `_GOARCH` or `_GOOS_GOARCH` suffix of a file name
 * (before the extension, ignoring a trailing `_test`) matches the context.
 * Files without such a suffix always match.
 *
 * @example
 * matchFileName("dir/poll_linux_amd64_test.go", { goos: "linux", goarch: "arm64", ... }) // false
 */
export const matchFileName = (file: string, context: BuildContext): boolean => {
  const stem = basename(file).split(".")[0] ?? "";
  const underscore = stem.indexOf("_");
  if (underscore < 0) {
    return true;
  }

  const parts = stem.slice(underscore).split("_");
  if (parts[parts.length - 1] === "test") {
    parts.pop();
  }

  const last = parts[parts.length - 1];
  const beforeLast = parts[parts.length - 2];
  if (
    beforeLast !== undefined &&
    last !== undefined &&
    KNOWN_OS.has(beforeLast) &&
    KNOWN_ARCH.has(last)
  ) {
    return matchTag(beforeLast, context) && matchTag(last, context);
  }
  if (last !== undefined && (KNOWN_OS.has(last) || KNOWN_ARCH.has(last))) {
    return matchTag(last, context);
  }
  return true;
};
