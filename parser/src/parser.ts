import { createDiagnostic, type Diagnostic, type DiagnosticCode } from "./diagnostics.ts";
import { lex, type Token } from "./lexer.ts";
import {
  createEmptyElements,
  type FunctionElement,
  type StructuralElements,
  type TypeElement
} from "./structural-model.ts";

export interface StrictParseResult {
  elements: StructuralElements | null;
  diagnostics: Diagnostic[];
}

const CLAUSE_OPENERS = ["if", "for", "while", "try", "with"] as const;

type ClauseOpener = (typeof CLAUSE_OPENERS)[number];

interface ClauseState {
  opener: ClauseOpener;
  stage: "body" | "elif" | "else" | "except" | "finally";
  token: Token;
}

interface Scope {
  kind: "function" | "type";
  qualifiedName: string;
  members: string[];
}

const COMPOUND_KEYWORDS = new Set([
  "def",
  "class",
  "if",
  "elif",
  "else",
  "for",
  "while",
  "try",
  "except",
  "finally",
  "with",
  "async"
]);

// Keywords that can only begin a statement.
const STATEMENT_ONLY_KEYWORDS = new Set([
  "def",
  "class",
  "import",
  "try",
  "except",
  "finally",
  "while",
  "elif",
  "return",
  "pass",
  "break",
  "continue",
  "global",
  "nonlocal",
  "del",
  "assert",
  "with",
  "as"
]);

const TRAILING_KEYWORDS = new Set(["and", "or", "not", "in", "is", "if", "else", "await"]);

const NON_TRAILING_OPERATORS = new Set([")", "]", "}", ",", ";", "..."]);

const EXPRESSION_HEADERS = new Set(["if", "elif", "while", "for", "with", "match", "case", "return annotation"]);

const OPENING_BRACKETS = new Set(["(", "[", "{"]);
const CLOSING_BRACKETS = new Set([")", "]", "}"]);

const BINARY_OPERATORS = new Set([
  "+", "-", "*", "/", "//", "%", "**", "@", "&", "|", "^", "<<", ">>", "<", ">", "<=", ">=", "==", "!="
]);

// Operators that may begin the right operand of a binary operator.
const OPERAND_START_OPERATORS = new Set(["(", "[", "{", "-", "+", "~", "..."]);

const ASSIGNMENT_OPERATORS = new Set([
  "=", "+=", "-=", "*=", "/=", "//=", "%=", "**=", ">>=", "<<=", "&=", "|=", "^=", "@="
]);

const CONSTANT_KEYWORDS = new Set(["None", "True", "False"]);

function asClauseOpener(lexeme: string): ClauseOpener | undefined {
  return CLAUSE_OPENERS.find((opener) => opener === lexeme);
}

function describeToken(token: Token): string {
  switch (token.kind) {
    case "EOF":
      return "end of input";
    case "Newline":
      return "end of line";
    case "Indent":
      return "indentation";
    case "Dedent":
      return "dedent";
    default:
      return `"${token.lexeme}"`;
  }
}

function isOperand(token: Token): boolean {
  return token.kind === "Name" || token.kind === "Number" || token.kind === "String";
}

function isOperandEnd(token: Token): boolean {
  return (
    isOperand(token) ||
    (token.kind === "Keyword" && CONSTANT_KEYWORDS.has(token.lexeme)) ||
    (token.kind === "Operator" && CLOSING_BRACKETS.has(token.lexeme))
  );
}

function isOperatorToken(token: Token | undefined, lexeme: string): boolean {
  return token !== undefined && token.kind === "Operator" && token.lexeme === lexeme;
}

/** Returns a message when `token` cannot follow `previous` inside an expression. */
function adjacencyProblem(beforePrevious: Token | undefined, previous: Token, token: Token): string | null {
  if (isOperandEnd(previous) && isOperand(token)) {
    if (previous.kind === "String" && token.kind === "String") {
      return null;
    }
    return `Unexpected ${describeToken(token)} after ${describeToken(previous)}; expected an operator`;
  }

  if (isOperatorToken(previous, ".") && token.kind !== "Name") {
    return `Unexpected ${describeToken(token)} after "."; expected an attribute name`;
  }

  if (
    isOperatorToken(token, ",") &&
    previous.kind === "Operator" &&
    (previous.lexeme === "," || OPENING_BRACKETS.has(previous.lexeme))
  ) {
    return `Unexpected "," after ${describeToken(previous)}; expected an expression`;
  }

  if (
    previous.kind === "Operator" &&
    BINARY_OPERATORS.has(previous.lexeme) &&
    beforePrevious !== undefined &&
    isOperandEnd(beforePrevious) &&
    token.kind === "Operator" &&
    !OPERAND_START_OPERATORS.has(token.lexeme)
  ) {
    return `Unexpected ${describeToken(token)} after ${describeToken(previous)}; expected an operand`;
  }

  return null;
}

/** True when the tokens before `end` close a call such as `f(x)` rather than a parenthesized group. */
function endsInCall(tokens: Token[], end: number): boolean {
  if (!isOperatorToken(tokens[end - 1], ")")) {
    return false;
  }

  let depth = 0;
  for (let position = end - 1; position >= 0; position -= 1) {
    const token = tokens[position];
    if (token === undefined || token.kind !== "Operator") {
      continue;
    }
    if (CLOSING_BRACKETS.has(token.lexeme)) {
      depth += 1;
    } else if (OPENING_BRACKETS.has(token.lexeme)) {
      depth -= 1;
      if (depth === 0) {
        const callee = tokens[position - 1];
        return callee !== undefined && isOperandEnd(callee);
      }
    }
  }
  return false;
}

function splitAtDepthZero(tokens: Token[], separator: string): Token[][] {
  const parts: Token[][] = [[]];
  let depth = 0;
  for (const token of tokens) {
    if (token.kind === "Operator" && OPENING_BRACKETS.has(token.lexeme)) {
      depth += 1;
    } else if (token.kind === "Operator" && CLOSING_BRACKETS.has(token.lexeme)) {
      depth -= 1;
    }

    if (depth === 0 && token.kind === "Operator" && token.lexeme === separator) {
      parts.push([]);
      continue;
    }
    parts[parts.length - 1]?.push(token);
  }
  return parts;
}

class Parser {
  private readonly tokens: Token[];
  private readonly diagnostics: Diagnostic[] = [];
  private readonly elements: StructuralElements = createEmptyElements();
  private readonly scopes: Scope[] = [];
  private index = 0;
  private lastLine = 0;
  private insideMatch = false;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): StrictParseResult {
    this.parseStatements("module");

    if (this.diagnostics.length > 0) {
      return {
        elements: null,
        diagnostics: this.diagnostics
      };
    }

    return {
      elements: this.elements,
      diagnostics: []
    };
  }

  private parseStatements(level: "module" | "block"): void {
    let clause: ClauseState | null = null;

    while (!this.isAt("EOF")) {
      if (level === "block" && this.isAt("Dedent")) {
        break;
      }

      const startIndex = this.index;
      const token = this.current();

      if (token.kind === "Newline" || token.kind === "Dedent") {
        this.advance();
        continue;
      }

      if (token.kind === "Indent") {
        this.addDiagnostic("PARSE_UNEXPECTED_INDENT", "Unexpected indent", token);
        this.skipIndentedBlock();
        continue;
      }

      clause = this.closeTryIfIncomplete(clause, token);
      clause = this.parseStatement(clause);

      if (this.index === startIndex) {
        this.advance();
      }
    }

    this.closeTryIfIncomplete(clause, this.current());
  }

  private closeTryIfIncomplete(clause: ClauseState | null, next: Token): ClauseState | null {
    if (clause === null || clause.opener !== "try" || clause.stage !== "body") {
      return clause;
    }

    if (next.kind === "Keyword" && (next.lexeme === "except" || next.lexeme === "finally")) {
      return clause;
    }

    this.addDiagnostic("PARSE_EXPECTED_TOKEN", "Expected 'except' or 'finally' after 'try' block", clause.token);
    return null;
  }

  private parseStatement(clause: ClauseState | null): ClauseState | null {
    const token = this.current();

    if (token.kind === "Operator" && token.lexeme === "@") {
      this.parseDecorated();
      return null;
    }

    if (token.kind === "Name" && (token.lexeme === "match" || token.lexeme === "case") && this.atBlockHeader()) {
      this.parseSoftKeywordBlock(token);
      return null;
    }

    if (token.kind !== "Keyword") {
      this.parseSimpleStatementLine();
      return null;
    }

    const opener = asClauseOpener(token.lexeme);
    if (opener !== undefined) {
      this.parseCompound(opener);
      return { opener, stage: "body", token };
    }

    switch (token.lexeme) {
      case "def":
        this.parseFunction(null, null);
        return null;
      case "class":
        this.parseClass(null);
        return null;
      case "async":
        return this.parseAsync();
      case "elif":
      case "else":
      case "except":
      case "finally":
        return this.parseClause(clause, token);
      default:
        this.parseSimpleStatementLine();
        return null;
    }
  }

  private parseClause(clause: ClauseState | null, token: Token): ClauseState | null {
    const next = this.nextClauseState(clause, token);
    if (next === null) {
      this.addDiagnostic(
        "PARSE_ORPHAN_CLAUSE",
        `'${token.lexeme}' clause does not follow a matching block`,
        token
      );
    }

    this.parseCompound(token.lexeme);
    return next;
  }

  private nextClauseState(clause: ClauseState | null, token: Token): ClauseState | null {
    if (clause === null) {
      return null;
    }

    const { opener, stage } = clause;
    switch (token.lexeme) {
      case "elif":
        return opener === "if" && (stage === "body" || stage === "elif") ? { ...clause, stage: "elif" } : null;
      case "else":
        if (opener === "if" && (stage === "body" || stage === "elif")) {
          return { ...clause, stage: "else" };
        }
        if ((opener === "for" || opener === "while") && stage === "body") {
          return { ...clause, stage: "else" };
        }
        return opener === "try" && stage === "except" ? { ...clause, stage: "else" } : null;
      case "except":
        return opener === "try" && (stage === "body" || stage === "except") ? { ...clause, stage: "except" } : null;
      case "finally":
        return opener === "try" && stage !== "finally" && stage !== "elif" ? { ...clause, stage: "finally" } : null;
      default:
        return null;
    }
  }

  private parseSoftKeywordBlock(token: Token): void {
    if (token.lexeme === "case" && !this.insideMatch) {
      this.addDiagnostic("PARSE_ORPHAN_CLAUSE", "'case' block outside of a 'match' statement", token);
    }

    const previous = this.insideMatch;
    this.advance();
    this.consumeHeader(token.lexeme);
    this.insideMatch = token.lexeme === "match";
    this.parseSuite(`'${token.lexeme}' statement`);
    this.insideMatch = previous;
  }

  /** True when the current logical line is `<tokens> :` followed by an indented block. */
  private atBlockHeader(): boolean {
    let depth = 0;
    let colonIndex = -1;
    let cursor = this.index;

    while (cursor < this.tokens.length) {
      const token = this.tokens[cursor];
      if (token === undefined || token.kind === "Newline" || token.kind === "EOF") {
        break;
      }
      if (token.kind === "Operator" && OPENING_BRACKETS.has(token.lexeme)) {
        depth += 1;
      } else if (token.kind === "Operator" && CLOSING_BRACKETS.has(token.lexeme)) {
        depth -= 1;
      } else if (depth === 0 && colonIndex < 0 && token.kind === "Operator" && token.lexeme === ":") {
        colonIndex = cursor;
      }
      cursor += 1;
    }

    return (
      colonIndex === cursor - 1 &&
      colonIndex > this.index + 1 &&
      this.tokens[cursor]?.kind === "Newline" &&
      this.tokens[cursor + 1]?.kind === "Indent"
    );
  }

  private parseAsync(): ClauseState | null {
    const asyncToken = this.advance();
    const next = this.current();

    if (next.kind === "Keyword" && next.lexeme === "def") {
      this.parseFunction(null, asyncToken);
      return null;
    }

    const opener = asClauseOpener(next.lexeme);
    if (next.kind === "Keyword" && (opener === "for" || opener === "with")) {
      this.parseCompound(opener);
      return { opener, stage: "body", token: next };
    }

    this.addDiagnostic(
      "PARSE_EXPECTED_TOKEN",
      `Expected 'def', 'for' or 'with' after 'async', found ${describeToken(next)}`,
      next
    );
    this.skipLogicalLine();
    return null;
  }

  private parseDecorated(): void {
    const startLine = this.current().range.start.line;

    while (this.isOperator("@")) {
      const atToken = this.advance();
      const expression = this.collectUntilLineEnd();
      if (expression.length === 0) {
        this.addDiagnostic("PARSE_EXPECTED_TOKEN", "Expected a decorator expression after '@'", atToken);
      }
      this.checkExpressionTokens(expression);
      this.expectLineEnd("decorator");
    }

    const token = this.current();
    if (token.kind === "Keyword" && token.lexeme === "def") {
      this.parseFunction(startLine, null);
      return;
    }

    if (token.kind === "Keyword" && token.lexeme === "class") {
      this.parseClass(startLine);
      return;
    }

    if (token.kind === "Keyword" && token.lexeme === "async" && this.peek(1).lexeme === "def") {
      const asyncToken = this.advance();
      this.parseFunction(startLine, asyncToken);
      return;
    }

    this.addDiagnostic(
      "PARSE_EXPECTED_TOKEN",
      `Expected a function or class definition after decorator, found ${describeToken(token)}`,
      token
    );
  }

  private parseFunction(decoratorLine: number | null, asyncToken: Token | null): void {
    const defToken = this.advance();
    const nameToken = this.current();

    if (nameToken.kind !== "Name") {
      this.addDiagnostic("PARSE_EXPECTED_TOKEN", "Expected function name after 'def'", nameToken);
      this.skipLogicalLine();
      return;
    }
    this.advance();

    if (!this.isOperator("(")) {
      this.addDiagnostic("PARSE_EXPECTED_TOKEN", "Expected '(' after function name", this.current());
      this.skipLogicalLine();
      return;
    }

    const parameters = this.parseParameters();
    if (parameters === null) {
      this.skipLogicalLine();
      return;
    }

    if (this.isOperator("->")) {
      const arrow = this.advance();
      if (!this.consumeHeader("return annotation", arrow)) {
        return;
      }
    } else if (!this.expectColon("function definition")) {
      return;
    }

    const name = nameToken.lexeme;
    const startLine = decoratorLine ?? (asyncToken ?? defToken).range.start.line;
    const record: FunctionElement = {
      name,
      qualifiedName: this.qualify(name),
      parameters,
      range: { startLine, endLine: startLine },
      headerLine: defToken.range.start.line,
      nestingDepth: this.scopes.length,
      isAsync: asyncToken !== null
    };

    const slot = this.elements.functions.push(record) - 1;
    this.enclosingType()?.members.push(name);

    this.scopes.push({ kind: "function", qualifiedName: record.qualifiedName, members: [] });
    this.parseSuite("function definition");
    this.scopes.pop();

    this.elements.functions[slot] = {
      ...record,
      range: { startLine, endLine: this.lastLine }
    };
  }

  private parseParameters(): string[] | null {
    this.advance();
    const names: string[] = [];
    let expectParameter = true;
    let depth = 0;

    while (true) {
      const token = this.current();
      if (token.kind === "EOF" || token.kind === "Newline") {
        this.addDiagnostic("PARSE_EXPECTED_TOKEN", "Expected ')' to close parameter list", token);
        return null;
      }

      if (depth === 0 && token.kind === "Operator" && token.lexeme === ")") {
        this.advance();
        return names;
      }

      if (depth === 0 && expectParameter) {
        if (token.kind === "Operator" && (token.lexeme === "*" || token.lexeme === "**")) {
          this.advance();
          const nameToken = this.current();
          if (nameToken.kind === "Name") {
            names.push(`${token.lexeme}${nameToken.lexeme}`);
            this.advance();
            if (!this.checkAfterParameter()) {
              return null;
            }
          } else if (token.lexeme === "**") {
            this.addDiagnostic("PARSE_EXPECTED_TOKEN", "Expected parameter name after '**'", nameToken);
            return null;
          }
          expectParameter = false;
          continue;
        }

        if (token.kind === "Operator" && token.lexeme === "/") {
          this.advance();
          expectParameter = false;
          continue;
        }

        if (token.kind === "Name") {
          names.push(token.lexeme);
          this.advance();
          if (!this.checkAfterParameter()) {
            return null;
          }
          expectParameter = false;
          continue;
        }

        this.addDiagnostic(
          "PARSE_UNEXPECTED_TOKEN",
          `Unexpected ${describeToken(token)} in parameter list`,
          token
        );
        return null;
      }

      if (depth === 0 && token.kind === "Operator" && token.lexeme === ",") {
        this.advance();
        expectParameter = true;
        continue;
      }

      if (token.kind === "Operator" && OPENING_BRACKETS.has(token.lexeme)) {
        depth += 1;
      } else if (token.kind === "Operator" && CLOSING_BRACKETS.has(token.lexeme)) {
        depth -= 1;
      }
      this.advance();
    }
  }

  private checkAfterParameter(): boolean {
    const token = this.current();
    if (token.kind === "Operator" && [":", "=", ",", ")"].includes(token.lexeme)) {
      return true;
    }

    this.addDiagnostic(
      "PARSE_UNEXPECTED_TOKEN",
      `Unexpected ${describeToken(token)} after parameter name`,
      token
    );
    return false;
  }

  private parseClass(decoratorLine: number | null): void {
    const classToken = this.advance();
    const nameToken = this.current();

    if (nameToken.kind !== "Name") {
      this.addDiagnostic("PARSE_EXPECTED_TOKEN", "Expected class name after 'class'", nameToken);
      this.skipLogicalLine();
      return;
    }
    this.advance();

    if (this.isOperator("(")) {
      this.skipBalanced();
    }

    if (!this.expectColon("class definition")) {
      return;
    }

    const name = nameToken.lexeme;
    const startLine = decoratorLine ?? classToken.range.start.line;
    const qualifiedName = this.qualify(name);
    const record: TypeElement = {
      name,
      qualifiedName,
      memberFunctions: [],
      range: { startLine, endLine: startLine },
      headerLine: classToken.range.start.line,
      nestingDepth: this.scopes.length
    };

    const slot = this.elements.types.push(record) - 1;
    const scope: Scope = { kind: "type", qualifiedName, members: [] };

    this.scopes.push(scope);
    this.parseSuite("class definition");
    this.scopes.pop();

    this.elements.types[slot] = {
      ...record,
      memberFunctions: scope.members,
      range: { startLine, endLine: this.lastLine }
    };
  }

  private parseCompound(keyword: string): void {
    const keywordToken = this.advance();

    if (keyword === "else" || keyword === "try" || keyword === "finally") {
      if (!this.expectColon(`'${keyword}'`)) {
        return;
      }
    } else if (!this.consumeHeader(keyword, keywordToken)) {
      return;
    }

    this.parseSuite(`'${keyword}' statement`);
  }

  /** Consumes header tokens up to and including the ':' that ends the header. */
  private consumeHeader(context: string, anchor: Token = this.current()): boolean {
    const header: Token[] = [];
    let depth = 0;

    while (true) {
      const token = this.current();
      if (token.kind === "Newline" || token.kind === "EOF") {
        this.addDiagnostic("PARSE_EXPECTED_TOKEN", `Expected ':' to end ${context} header`, token);
        this.skipLogicalLine();
        return false;
      }

      if (depth === 0 && token.kind === "Operator" && token.lexeme === ":") {
        this.advance();
        break;
      }

      if (token.kind === "Operator" && OPENING_BRACKETS.has(token.lexeme)) {
        depth += 1;
      } else if (token.kind === "Operator" && CLOSING_BRACKETS.has(token.lexeme)) {
        depth -= 1;
      }
      header.push(this.advance());
    }

    if (EXPRESSION_HEADERS.has(context) && header.length === 0) {
      this.addDiagnostic("PARSE_EXPECTED_TOKEN", `Expected an expression in ${context} header`, anchor);
    }

    if (context === "for" && !header.some((token) => token.kind === "Keyword" && token.lexeme === "in")) {
      this.addDiagnostic("PARSE_EXPECTED_TOKEN", "Expected 'in' in 'for' header", anchor);
    }

    this.checkExpressionTokens(header);
    this.checkTrailingToken(header);
    return true;
  }

  private expectColon(context: string): boolean {
    const token = this.current();
    if (token.kind === "Operator" && token.lexeme === ":") {
      this.advance();
      return true;
    }

    this.addDiagnostic("PARSE_EXPECTED_TOKEN", `Expected ':' after ${context}, found ${describeToken(token)}`, token);
    this.skipLogicalLine();
    return false;
  }

  private parseSuite(context: string): void {
    if (this.isAt("Newline")) {
      this.advance();
      if (!this.isAt("Indent")) {
        this.addDiagnostic("PARSE_EXPECTED_BLOCK", `Expected an indented block after ${context}`, this.current());
        return;
      }

      this.advance();
      this.parseStatements("block");
      if (this.isAt("Dedent")) {
        this.advance();
      }
      return;
    }

    if (this.isAt("EOF")) {
      this.addDiagnostic("PARSE_EXPECTED_BLOCK", `Expected an indented block after ${context}`, this.current());
      return;
    }

    const first = this.current();
    if (first.kind === "Keyword" && COMPOUND_KEYWORDS.has(first.lexeme)) {
      this.addDiagnostic(
        "PARSE_UNEXPECTED_TOKEN",
        `Compound statement ${describeToken(first)} cannot follow ':' on the same line`,
        first
      );
      this.skipLogicalLine();
      return;
    }

    this.parseSimpleStatementLine();
  }

  private parseSimpleStatementLine(): void {
    while (true) {
      const token = this.current();
      if (token.kind === "Keyword" && token.lexeme === "import") {
        this.parseImport();
      } else if (token.kind === "Keyword" && token.lexeme === "from") {
        this.parseFromImport();
      } else {
        this.parseSimpleStatement();
      }

      if (!this.isOperator(";")) {
        break;
      }

      this.advance();
      if (this.isAt("Newline") || this.isAt("EOF")) {
        break;
      }
    }

    this.expectLineEnd("statement");
  }

  private parseSimpleStatement(): void {
    const statement: Token[] = [];
    while (!this.isAt("Newline") && !this.isAt("EOF") && !this.isOperator(";")) {
      statement.push(this.advance());
    }

    const first = statement[0];
    if (first === undefined) {
      this.addDiagnostic("PARSE_UNEXPECTED_TOKEN", `Unexpected ${describeToken(this.current())}`, this.current());
      return;
    }

    if (first.kind === "Keyword" && COMPOUND_KEYWORDS.has(first.lexeme)) {
      this.addDiagnostic("PARSE_UNEXPECTED_TOKEN", `Unexpected ${describeToken(first)}`, first);
      return;
    }

    for (const token of statement.slice(1)) {
      if (token.kind === "Keyword" && STATEMENT_ONLY_KEYWORDS.has(token.lexeme)) {
        this.addDiagnostic(
          "PARSE_UNEXPECTED_TOKEN",
          `Unexpected ${describeToken(token)} in the middle of a statement`,
          token
        );
        return;
      }
    }

    const aliasName = statement[1];
    if (
      first.kind === "Name" &&
      first.lexeme === "type" &&
      aliasName?.kind === "Name" &&
      (isOperatorToken(statement[2], "=") || isOperatorToken(statement[2], "["))
    ) {
      this.parseTypeAlias(statement, aliasName);
      return;
    }

    this.checkExpressionTokens(statement);
    this.checkAssignmentTargets(statement);
    this.checkTrailingToken(statement);

    if (this.scopes.length === 0) {
      this.recordModuleBindings(statement);
    }
  }

  private checkExpressionTokens(tokens: Token[]): void {
    for (let position = 1; position < tokens.length; position += 1) {
      const previous = tokens[position - 1];
      const token = tokens[position];
      if (previous === undefined || token === undefined) {
        continue;
      }

      const problem = adjacencyProblem(tokens[position - 2], previous, token);
      if (problem !== null) {
        this.addDiagnostic("PARSE_UNEXPECTED_TOKEN", problem, token);
        return;
      }
    }
  }

  /** Rejects `f() = 1` and `f() += 1`; annotations and lambda bodies after a ':' are left alone. */
  private checkAssignmentTargets(tokens: Token[]): void {
    let depth = 0;
    for (let position = 0; position < tokens.length; position += 1) {
      const token = tokens[position];
      if (token === undefined || token.kind !== "Operator") {
        continue;
      }
      if (OPENING_BRACKETS.has(token.lexeme)) {
        depth += 1;
        continue;
      }
      if (CLOSING_BRACKETS.has(token.lexeme)) {
        depth -= 1;
        continue;
      }
      if (depth !== 0) {
        continue;
      }
      if (token.lexeme === ":") {
        return;
      }
      if (ASSIGNMENT_OPERATORS.has(token.lexeme) && endsInCall(tokens, position)) {
        this.addDiagnostic("PARSE_UNEXPECTED_TOKEN", "Cannot assign to a function call", token);
        return;
      }
    }
  }

  /** `type Name[params] = value` */
  private parseTypeAlias(statement: Token[], name: Token): void {
    let depth = 0;
    let equalsIndex = -1;
    for (let position = 2; position < statement.length; position += 1) {
      const token = statement[position];
      if (token === undefined || token.kind !== "Operator") {
        continue;
      }
      if (OPENING_BRACKETS.has(token.lexeme)) {
        depth += 1;
      } else if (CLOSING_BRACKETS.has(token.lexeme)) {
        depth -= 1;
      } else if (depth === 0 && token.lexeme === "=") {
        equalsIndex = position;
        break;
      }
    }

    if (equalsIndex < 0) {
      this.addDiagnostic("PARSE_EXPECTED_TOKEN", "Expected '=' in type alias", name);
      return;
    }

    this.checkExpressionTokens(statement.slice(equalsIndex + 1));
    this.checkTrailingToken(statement);

    if (this.scopes.length === 0) {
      this.elements.moduleBindings.push({ name: name.lexeme, line: name.range.start.line });
    }
  }

  private checkTrailingToken(tokens: Token[]): void {
    const last = tokens[tokens.length - 1];
    if (last === undefined) {
      return;
    }

    const dangling =
      (last.kind === "Operator" && !NON_TRAILING_OPERATORS.has(last.lexeme)) ||
      (last.kind === "Keyword" && TRAILING_KEYWORDS.has(last.lexeme) && tokens.length > 1);

    if (dangling) {
      this.addDiagnostic(
        "PARSE_INCOMPLETE_STATEMENT",
        `Statement ends with ${describeToken(last)}; expected an operand`,
        last
      );
    }
  }

  private recordModuleBindings(statement: Token[]): void {
    const parts = splitAtDepthZero(statement, "=");
    const targets = parts.length > 1 ? parts.slice(0, -1) : [];
    const first = statement[0];
    const second = statement[1];

    if (
      parts.length === 1 &&
      first?.kind === "Name" &&
      second?.kind === "Operator" &&
      second.lexeme === ":"
    ) {
      this.elements.moduleBindings.push({ name: first.lexeme, line: first.range.start.line });
      return;
    }

    for (const target of targets) {
      const head = target[0];
      const next = target[1];
      if (head?.kind === "Name" && next?.kind === "Operator" && next.lexeme === ":") {
        this.elements.moduleBindings.push({ name: head.lexeme, line: head.range.start.line });
        continue;
      }

      for (const item of splitAtDepthZero(target, ",")) {
        const name = item.length === 1 ? item[0] : item.length === 2 && item[0]?.lexeme === "*" ? item[1] : undefined;
        if (name?.kind === "Name") {
          this.elements.moduleBindings.push({ name: name.lexeme, line: name.range.start.line });
        }
      }
    }
  }

  private parseImport(): void {
    this.advance();

    while (true) {
      const dotted = this.parseDottedName("module name after 'import'");
      if (dotted === null) {
        this.skipStatement();
        return;
      }

      let boundName = dotted.path.split(".")[0] ?? dotted.path;
      if (this.isKeyword("as")) {
        this.advance();
        const alias = this.expectName("alias after 'as'");
        if (alias === null) {
          this.skipStatement();
          return;
        }
        boundName = alias.lexeme;
      }

      this.recordImport(dotted.path, boundName, dotted.token);

      if (!this.isOperator(",")) {
        return;
      }
      this.advance();
    }
  }

  private parseFromImport(): void {
    const fromToken = this.advance();
    let prefix = "";

    while (this.isOperator(".") || this.isOperator("...")) {
      prefix += this.advance().lexeme;
    }

    let path = prefix;
    if (this.isAt("Name")) {
      const dotted = this.parseDottedName("module name after 'from'");
      if (dotted === null) {
        this.skipStatement();
        return;
      }
      path += dotted.path;
    }

    if (path.length === 0) {
      this.addDiagnostic("PARSE_EXPECTED_TOKEN", "Expected module name after 'from'", this.current());
      this.skipStatement();
      return;
    }

    if (!this.isKeyword("import")) {
      this.addDiagnostic(
        "PARSE_EXPECTED_TOKEN",
        `Expected 'import' after module name, found ${describeToken(this.current())}`,
        this.current()
      );
      this.skipStatement();
      return;
    }
    this.advance();

    if (this.isOperator("*")) {
      this.advance();
      this.recordImport(path, "*", fromToken);
      return;
    }

    const parenthesized = this.isOperator("(");
    if (parenthesized) {
      this.advance();
    }

    while (true) {
      const nameToken = this.expectName("imported name");
      if (nameToken === null) {
        this.skipStatement();
        return;
      }

      let boundName = nameToken.lexeme;
      if (this.isKeyword("as")) {
        this.advance();
        const alias = this.expectName("alias after 'as'");
        if (alias === null) {
          this.skipStatement();
          return;
        }
        boundName = alias.lexeme;
      }
      this.recordImport(path, boundName, nameToken);

      if (!this.isOperator(",")) {
        break;
      }
      this.advance();
      if (parenthesized && this.isOperator(")")) {
        break;
      }
    }

    if (parenthesized) {
      if (!this.isOperator(")")) {
        this.addDiagnostic("PARSE_EXPECTED_TOKEN", "Expected ')' to close import list", this.current());
        this.skipStatement();
        return;
      }
      this.advance();
    }
  }

  private parseDottedName(context: string): { path: string; token: Token } | null {
    const first = this.expectName(context);
    if (first === null) {
      return null;
    }

    let path = first.lexeme;
    while (this.isOperator(".")) {
      this.advance();
      const part = this.expectName("name after '.'");
      if (part === null) {
        return null;
      }
      path += `.${part.lexeme}`;
    }

    return { path, token: first };
  }

  private recordImport(sourcePath: string, boundName: string, token: Token): void {
    this.elements.imports.push({ sourcePath, boundName, line: token.range.start.line });
  }

  private expectName(context: string): Token | null {
    const token = this.current();
    if (token.kind === "Name") {
      return this.advance();
    }

    this.addDiagnostic("PARSE_EXPECTED_TOKEN", `Expected ${context}, found ${describeToken(token)}`, token);
    return null;
  }

  private expectLineEnd(context: string): void {
    if (this.isAt("Newline")) {
      this.advance();
      return;
    }

    if (this.isAt("EOF") || this.isAt("Dedent")) {
      return;
    }

    this.addDiagnostic(
      "PARSE_UNEXPECTED_TOKEN",
      `Unexpected ${describeToken(this.current())} after ${context}; expected end of line`,
      this.current()
    );
    this.skipLogicalLine();
  }

  private collectUntilLineEnd(): Token[] {
    const collected: Token[] = [];
    while (!this.isAt("Newline") && !this.isAt("EOF")) {
      collected.push(this.advance());
    }
    return collected;
  }

  private skipStatement(): void {
    while (!this.isAt("Newline") && !this.isAt("EOF") && !this.isOperator(";")) {
      this.advance();
    }
  }

  private skipLogicalLine(): void {
    this.collectUntilLineEnd();
    if (this.isAt("Newline")) {
      this.advance();
    }
    if (this.isAt("Indent")) {
      this.skipIndentedBlock();
    }
  }

  private skipIndentedBlock(): void {
    let depth = 0;
    while (!this.isAt("EOF")) {
      const token = this.advance();
      if (token.kind === "Indent") {
        depth += 1;
      } else if (token.kind === "Dedent") {
        depth -= 1;
        if (depth === 0) {
          return;
        }
      }
    }
  }

  private skipBalanced(): void {
    let depth = 0;
    while (!this.isAt("EOF") && !this.isAt("Newline")) {
      const token = this.advance();
      if (token.kind === "Operator" && OPENING_BRACKETS.has(token.lexeme)) {
        depth += 1;
      } else if (token.kind === "Operator" && CLOSING_BRACKETS.has(token.lexeme)) {
        depth -= 1;
        if (depth === 0) {
          return;
        }
      }
    }
  }

  private qualify(name: string): string {
    const enclosing = this.scopes[this.scopes.length - 1];
    return enclosing === undefined ? name : `${enclosing.qualifiedName}.${name}`;
  }

  private enclosingType(): Scope | undefined {
    const enclosing = this.scopes[this.scopes.length - 1];
    return enclosing?.kind === "type" ? enclosing : undefined;
  }

  private isAt(kind: Token["kind"]): boolean {
    return this.current().kind === kind;
  }

  private isOperator(lexeme: string): boolean {
    const token = this.current();
    return token.kind === "Operator" && token.lexeme === lexeme;
  }

  private isKeyword(lexeme: string): boolean {
    const token = this.current();
    return token.kind === "Keyword" && token.lexeme === lexeme;
  }

  private peek(distance: number): Token {
    return this.tokens[this.index + distance] ?? this.current();
  }

  private current(): Token {
    const token = this.tokens[this.index] ?? this.tokens[this.tokens.length - 1];
    if (token === undefined) {
      throw new Error("Token stream is empty");
    }
    return token;
  }

  private advance(): Token {
    const token = this.current();
    if (this.index < this.tokens.length - 1) {
      this.index += 1;
    }
    if (token.kind !== "Newline" && token.kind !== "Indent" && token.kind !== "Dedent" && token.kind !== "EOF") {
      this.lastLine = token.range.end.line;
    }
    return token;
  }

  private addDiagnostic(code: DiagnosticCode, message: string, token: Token): void {
    this.diagnostics.push(createDiagnostic(code, message, token.range.start));
  }
}

/**
 * Validates statement structure and extracts an exact structural model. Any
 * lexer diagnostic fails the parse before statements are examined. A
 * {@link ScanError} from the lexer propagates to the caller.
 */
export function parseStrict(input: string): StrictParseResult {
  const lexResult = lex(input);
  if (lexResult.diagnostics.length > 0) {
    return {
      elements: null,
      diagnostics: lexResult.diagnostics
    };
  }

  const parser = new Parser(lexResult.tokens);
  return parser.parse();
}
