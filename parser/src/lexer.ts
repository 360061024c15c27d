import { ScanError, createDiagnostic, type Diagnostic } from "./diagnostics.ts";
import type { SourcePosition, SourceRange } from "./structural-model.ts";

export type TokenKind =
  | "Name"
  | "Keyword"
  | "Number"
  | "String"
  | "Operator"
  | "Newline"
  | "Indent"
  | "Dedent"
  | "EOF";

export interface Token {
  kind: TokenKind;
  lexeme: string;
  range: SourceRange;
  /** First real token of its physical line. Synthetic tokens are never line starts. */
  lineStart: boolean;
  /** Indentation width of the physical line the token starts on. */
  indent: number;
}

export interface LexResult {
  tokens: Token[];
  diagnostics: Diagnostic[];
}

export const KEYWORDS: ReadonlySet<string> = new Set([
  "False",
  "None",
  "True",
  "and",
  "as",
  "assert",
  "async",
  "await",
  "break",
  "class",
  "continue",
  "def",
  "del",
  "elif",
  "else",
  "except",
  "finally",
  "for",
  "from",
  "global",
  "if",
  "import",
  "in",
  "is",
  "lambda",
  "nonlocal",
  "not",
  "or",
  "pass",
  "raise",
  "return",
  "try",
  "while",
  "with",
  "yield"
]);

// Longest first so that prefix operators never shadow compound ones.
const OPERATORS = [
  "**=",
  "//=",
  ">>=",
  "<<=",
  "...",
  "->",
  ":=",
  "**",
  "//",
  "<<",
  ">>",
  "<=",
  ">=",
  "==",
  "!=",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "&=",
  "|=",
  "^=",
  "@=",
  "+",
  "-",
  "*",
  "/",
  "%",
  "@",
  "&",
  "|",
  "^",
  "~",
  "<",
  ">",
  "(",
  ")",
  "[",
  "]",
  "{",
  "}",
  ",",
  ":",
  ".",
  ";",
  "="
] as const;

const CLOSING_BY_OPENING: Record<string, string> = {
  "(": ")",
  "[": "]",
  "{": "}"
};

const CLOSING_BRACKETS = new Set([")", "]", "}"]);

const NAME_PATTERN = /[\p{L}_][\p{L}\p{N}_]*/uy;
const NUMBER_PATTERN =
  /(?:0[xXoObB][0-9a-fA-F_]+|(?:\d[\d_]*(?:\.[\d_]*)?|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?[jJ]?)/y;
const STRING_START_PATTERN = /([rRbBuUfF]{0,2})('''|"""|'|")/y;

const TAB_WIDTH = 8;

function createPosition(offset: number, line: number, column: number): SourcePosition {
  return { offset, line, column };
}

function clonePosition(position: SourcePosition): SourcePosition {
  return createPosition(position.offset, position.line, position.column);
}

function createRange(start: SourcePosition, end: SourcePosition): SourceRange {
  return {
    start: clonePosition(start),
    end: clonePosition(end)
  };
}

function matchSticky(pattern: RegExp, source: string, index: number): RegExpExecArray | null {
  pattern.lastIndex = index;
  return pattern.exec(source);
}

function isDigit(value: string | undefined): boolean {
  return value !== undefined && value >= "0" && value <= "9";
}

/**
 * Tokenizes indentation-structured source. Recoverable problems are reported as
 * diagnostics; an unterminated string literal throws a {@link ScanError}, since
 * nothing after it can be positioned reliably.
 */
export function lex(input: string): LexResult {
  const diagnostics: Diagnostic[] = [];
  const tokens: Token[] = [];
  const source = input;
  const indentStack: number[] = [0];
  const openBrackets: Array<{ char: string; position: SourcePosition }> = [];

  let index = 0;
  let line = 1;
  let column = 1;
  let atLogicalLineStart = true;
  let lineHasToken = false;
  let physicalIndent = measureIndent(0);

  function measureIndent(from: number): number {
    let width = 0;
    for (let cursor = from; cursor < source.length; cursor += 1) {
      const char = source[cursor];
      if (char === " ") {
        width += 1;
      } else if (char === "\t") {
        width += TAB_WIDTH - (width % TAB_WIDTH);
      } else if (char === "\f") {
        width = 0;
      } else {
        break;
      }
    }
    return width;
  }

  function currentPosition(): SourcePosition {
    return createPosition(index, line, column);
  }

  function currentChar(): string | undefined {
    return source[index];
  }

  function nextChar(): string | undefined {
    return source[index + 1];
  }

  function advance(): string {
    const value = source[index] ?? "";
    index += 1;
    if (value === "\n" || (value === "\r" && source[index] !== "\n")) {
      line += 1;
      column = 1;
    } else {
      column += 1;
    }
    return value;
  }

  function advanceBy(count: number): string {
    let consumed = "";
    for (let step = 0; step < count; step += 1) {
      consumed += advance();
    }
    return consumed;
  }

  function addToken(kind: TokenKind, start: SourcePosition, lexeme: string): void {
    tokens.push({
      kind,
      lexeme,
      range: createRange(start, currentPosition()),
      lineStart: !lineHasToken,
      indent: physicalIndent
    });
    lineHasToken = true;
  }

  function addSyntheticToken(kind: TokenKind, position: SourcePosition, lexeme = ""): void {
    tokens.push({
      kind,
      lexeme,
      range: createRange(position, position),
      lineStart: false,
      indent: physicalIndent
    });
  }

  function addDiagnostic(code: Diagnostic["code"], message: string, position: SourcePosition): void {
    diagnostics.push(createDiagnostic(code, message, position));
  }

  function processIndentation(): void {
    const width = physicalIndent;
    const position = currentPosition();
    const top = indentStack[indentStack.length - 1] ?? 0;

    if (width > top) {
      indentStack.push(width);
      addSyntheticToken("Indent", position);
      return;
    }

    while (indentStack.length > 1 && (indentStack[indentStack.length - 1] ?? 0) > width) {
      indentStack.pop();
      addSyntheticToken("Dedent", position);
    }

    if ((indentStack[indentStack.length - 1] ?? 0) !== width) {
      addDiagnostic(
        "SCAN_INCONSISTENT_DEDENT",
        "Dedent does not match any outer indentation level",
        position
      );
    }
  }

  function consumeLineBreak(): void {
    const start = currentPosition();
    let lexeme = advance();
    if (lexeme === "\r" && currentChar() === "\n") {
      lexeme += advance();
    }

    if (openBrackets.length === 0 && !atLogicalLineStart) {
      addSyntheticToken("Newline", start, lexeme);
      atLogicalLineStart = true;
    }

    lineHasToken = false;
    physicalIndent = measureIndent(index);
  }

  function consumeString(prefix: string, quote: string): void {
    const start = currentPosition();
    let lexeme = advanceBy(prefix.length + quote.length);
    let terminated = false;

    while (index < source.length) {
      const char = currentChar();
      if (char === undefined) {
        break;
      }

      if (quote.length === 3) {
        if (source.startsWith(quote, index)) {
          lexeme += advanceBy(3);
          terminated = true;
          break;
        }
      } else {
        if (char === quote) {
          lexeme += advance();
          terminated = true;
          break;
        }

        if (char === "\n" || char === "\r") {
          break;
        }
      }

      if (char === "\\") {
        lexeme += advance();
        if (currentChar() === "\r" && nextChar() === "\n") {
          lexeme += advanceBy(2);
        } else if (index < source.length) {
          lexeme += advance();
        }
        continue;
      }

      lexeme += advance();
    }

    if (!terminated) {
      throw new ScanError(
        quote.length === 3 ? "Unterminated triple-quoted string literal" : "Unterminated string literal",
        start
      );
    }

    addToken("String", start, lexeme);
  }

  function consumeOperator(operator: string): void {
    const start = currentPosition();
    advanceBy(operator.length);
    addToken("Operator", start, operator);

    if (CLOSING_BY_OPENING[operator] !== undefined) {
      openBrackets.push({ char: operator, position: start });
      return;
    }

    if (!CLOSING_BRACKETS.has(operator)) {
      return;
    }

    const open = openBrackets[openBrackets.length - 1];
    if (open === undefined) {
      addDiagnostic("SCAN_UNBALANCED_BRACKET", `Unmatched closing "${operator}"`, start);
      return;
    }

    if (CLOSING_BY_OPENING[open.char] !== operator) {
      addDiagnostic(
        "SCAN_UNBALANCED_BRACKET",
        `Closing "${operator}" does not match opening "${open.char}" on line ${open.position.line}`,
        start
      );
    }
    openBrackets.pop();
  }

  while (index < source.length) {
    const value = currentChar();
    if (value === undefined) {
      break;
    }

    if (value === " " || value === "\t" || value === "\f") {
      advance();
      continue;
    }

    if (value === "#") {
      while (index < source.length && currentChar() !== "\n" && currentChar() !== "\r") {
        advance();
      }
      continue;
    }

    if (value === "\n" || value === "\r") {
      consumeLineBreak();
      continue;
    }

    if (value === "\\" && (nextChar() === "\n" || nextChar() === "\r")) {
      advance();
      const lineBreak = advance();
      if (lineBreak === "\r" && currentChar() === "\n") {
        advance();
      }
      lineHasToken = false;
      physicalIndent = measureIndent(index);
      continue;
    }

    if (atLogicalLineStart) {
      processIndentation();
      atLogicalLineStart = false;
    }

    const stringStart = matchSticky(STRING_START_PATTERN, source, index);
    if (stringStart !== null) {
      consumeString(stringStart[1] ?? "", stringStart[2] ?? "\"");
      continue;
    }

    if (isDigit(value) || (value === "." && isDigit(nextChar()))) {
      const numberMatch = matchSticky(NUMBER_PATTERN, source, index);
      if (numberMatch !== null) {
        const start = currentPosition();
        const lexeme = advanceBy(numberMatch[0].length);
        addToken("Number", start, lexeme);
        continue;
      }
    }

    const nameMatch = matchSticky(NAME_PATTERN, source, index);
    if (nameMatch !== null) {
      const start = currentPosition();
      const lexeme = advanceBy(nameMatch[0].length);
      addToken(KEYWORDS.has(lexeme) ? "Keyword" : "Name", start, lexeme);
      continue;
    }

    const operator = OPERATORS.find((candidate) => source.startsWith(candidate, index));
    if (operator !== undefined) {
      consumeOperator(operator);
      continue;
    }

    const start = currentPosition();
    const unexpected = advance();
    addDiagnostic("SCAN_UNEXPECTED_CHARACTER", `Unexpected character "${unexpected}"`, start);
  }

  for (const open of openBrackets) {
    addDiagnostic("SCAN_UNBALANCED_BRACKET", `Unclosed "${open.char}"`, open.position);
  }

  const eofPosition = currentPosition();
  if (!atLogicalLineStart) {
    addSyntheticToken("Newline", eofPosition);
  }
  while (indentStack.length > 1) {
    indentStack.pop();
    addSyntheticToken("Dedent", eofPosition);
  }
  addSyntheticToken("EOF", eofPosition);

  return {
    tokens,
    diagnostics
  };
}
