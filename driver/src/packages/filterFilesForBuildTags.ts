import type { PackageNode } from "../registry/PackageNode.js";
import {
  type BuildContext,
  evaluateBuildConstraint,
  matchFileName,
  matchTag,
  parseBuildConstraint,
} from "./buildConstraints.js";
import { scanBuildConstraint } from "./scanGoFile.js";
import type { SourceReader } from "./SourceReader.js";

/**
 * Whether a Go file applies to the build context, by name and `//go:build` line.
 * Files that are not `.go` files always apply.
 */
export const matchGoFile = (
  file: string,
  context: BuildContext,
  reader: SourceReader,
): boolean => {
  if (!file.endsWith(".go")) {
    return true;
  }
  if (!matchFileName(file, context)) {
    return false;
  }
  const constraint = scanBuildConstraint(reader.readFile(file));
  if (constraint === null) {
    return true;
  }
  return evaluateBuildConstraint(parseBuildConstraint(constraint), (tag) =>
    matchTag(tag, context),
  );
};

/**
 * Drop the source and compiled files that do not apply to the build context.
 * Each file is read at most once.
 */
export const filterFilesForBuildTags = (
  node: PackageNode,
  context: BuildContext,
  reader: SourceReader,
): PackageNode => {
  const verdicts = new Map<string, boolean>();
  const applies = (file: string): boolean => {
    let verdict = verdicts.get(file);
    if (verdict === undefined) {
      verdict = matchGoFile(file, context, reader);
      verdicts.set(file, verdict);
    }
    return verdict;
  };

  return {
    ...node,
    files: node.files.filter(applies),
    compiledFiles: node.compiledFiles.filter(applies),
  };
};
