import { GoSyntaxError } from "./errors.js";

/**
 * Header of a Go source file: everything up to the last import declaration.
 */
export interface GoFileScan {
  packageName: string;
  /** Import paths in declaration order */
  imports: string[];
  /** Expression of the `//go:build` line, or null when there is none */
  buildConstraint: string | null;
}

type TokenKind = "ident" | "string" | "punct" | "eof";

interface Token {
  kind: TokenKind;
  value: string;
  offset: number;
}

const BUILD_DIRECTIVE = "go:build";
const BYTE_ORDER_MARK = "\uFEFF";
const IDENT_START = /[\p{L}_]/u;
const IDENT_PART = /[\p{L}\p{N}_]/u;

/**
 * On-demand tokenizer. Only knows what an import block needs: identifiers,
 * string literals and single-character punctuation. Comments are skipped;
 * the `//go:build` line seen before any token is recorded, and a second one
 * there is an error. A leading byte order mark is ignored.
 */
const createLexer = (source: string) => {
  let pos = source.startsWith(BYTE_ORDER_MARK) ? BYTE_ORDER_MARK.length : 0;
  let sawToken = false;
  let buildConstraint: string | null = null;

  const skipTrivia = (): void => {
    while (pos < source.length) {
      const ch = source[pos];
      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
        pos++;
      } else if (source.startsWith("//", pos)) {
        const end = source.indexOf("\n", pos);
        const lineEnd = end === -1 ? source.length : end;
        const text = source.slice(pos + 2, lineEnd).trim();
        if (
          !sawToken &&
          text.startsWith(BUILD_DIRECTIVE) &&
          /\s/.test(text.charAt(BUILD_DIRECTIVE.length))
        ) {
          if (buildConstraint !== null) {
            throw new GoSyntaxError("multiple //go:build comments", pos);
          }
          buildConstraint = text.slice(BUILD_DIRECTIVE.length).trim();
        }
        pos = lineEnd;
      } else if (source.startsWith("/*", pos)) {
        const end = source.indexOf("*/", pos + 2);
        if (end === -1) {
          throw new GoSyntaxError("unterminated comment", pos);
        }
        pos = end + 2;
      } else {
        return;
      }
    }
  };

  const readInterpreted = (start: number): Token => {
    let value = "";
    pos++;
    while (pos < source.length) {
      const ch = source.charAt(pos);
      if (ch === '"') {
        pos++;
        return { kind: "string", value, offset: start };
      }
      if (ch === "\n") {
        break;
      }
      if (ch === "\\" && pos + 1 < source.length) {
        value += source.charAt(pos + 1);
        pos += 2;
        continue;
      }
      value += ch;
      pos++;
    }
    throw new GoSyntaxError("unterminated string literal", start);
  };

  const readRaw = (start: number): Token => {
    const end = source.indexOf("`", start + 1);
    if (end === -1) {
      throw new GoSyntaxError("unterminated raw string literal", start);
    }
    pos = end + 1;
    return {
      kind: "string",
      value: source.slice(start + 1, end),
      offset: start,
    };
  };

  const next = (): Token => {
    skipTrivia();
    const start = pos;
    if (pos >= source.length) {
      return { kind: "eof", value: "", offset: start };
    }
    sawToken = true;

    const ch = source.charAt(pos);
    if (ch === '"') {
      return readInterpreted(start);
    }
    if (ch === "`") {
      return readRaw(start);
    }
    if (IDENT_START.test(ch)) {
      pos++;
      while (pos < source.length && IDENT_PART.test(source.charAt(pos))) {
        pos++;
      }
      return { kind: "ident", value: source.slice(start, pos), offset: start };
    }
    pos++;
    return { kind: "punct", value: ch, offset: start };
  };

  let lookahead: Token | null = null;

  return {
    peek(): Token {
      lookahead ??= next();
      return lookahead;
    },
    take(): Token {
      const token = lookahead ?? next();
      lookahead = null;
      return token;
    },
    buildConstraint(): string | null {
      return buildConstraint;
    },
  };
};

type Lexer = ReturnType<typeof createLexer>;

const isPunct = (token: Token, value: string): boolean =>
  token.kind === "punct" && token.value === value;

const skipSemicolons = (lexer: Lexer): void => {
  while (isPunct(lexer.peek(), ";")) {
    lexer.take();
  }
};

/**
 * ImportSpec = [ "." | "_" | identifier ] ImportPath
 */
const readImportSpec = (lexer: Lexer): string => {
  const first = lexer.peek();
  if (first.kind === "ident" || isPunct(first, ".")) {
    lexer.take();
  }
  const path = lexer.take();
  if (path.kind !== "string") {
    throw new GoSyntaxError("expected import path", path.offset);
  }
  return path.value;
};

/**
 * Read the package clause, the import declarations and the `//go:build`
 * constraint of a Go source file. Stops at the first declaration that is
 * not an import.
 *
 * @example
 * scanGoFile('package foo\n\nimport (\n\t"fmt"\n\tx "example.com/x"\n)\n')
 * // { packageName: "foo", imports: ["fmt", "example.com/x"], buildConstraint: null }
 */
export const scanGoFile = (source: string): GoFileScan => {
  const lexer = createLexer(source);

  const keyword = lexer.take();
  if (keyword.kind !== "ident" || keyword.value !== "package") {
    throw new GoSyntaxError("expected package clause", keyword.offset);
  }
  const name = lexer.take();
  if (name.kind !== "ident") {
    throw new GoSyntaxError("expected package name", name.offset);
  }
  skipSemicolons(lexer);

  const imports: string[] = [];
  for (
    let token = lexer.peek();
    token.kind === "ident" && token.value === "import";
    token = lexer.peek()
  ) {
    lexer.take();
    if (isPunct(lexer.peek(), "(")) {
      lexer.take();
      skipSemicolons(lexer);
      while (!isPunct(lexer.peek(), ")")) {
        if (lexer.peek().kind === "eof") {
          throw new GoSyntaxError("unterminated import group", token.offset);
        }
        imports.push(readImportSpec(lexer));
        skipSemicolons(lexer);
      }
      lexer.take();
    } else {
      imports.push(readImportSpec(lexer));
    }
    skipSemicolons(lexer);
  }

  return {
    packageName: name.value,
    imports,
    buildConstraint: lexer.buildConstraint(),
  };
};

/**
 * Read only the `//go:build` constraint of a file header.
 * Never looks past the first token, so the rest of the file may be anything.
 */
export const scanBuildConstraint = (source: string): string | null => {
  const lexer = createLexer(source);
  lexer.peek();
  return lexer.buildConstraint();
};
