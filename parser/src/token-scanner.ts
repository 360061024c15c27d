import type { Diagnostic } from "./diagnostics.ts";
import { lex, type Token } from "./lexer.ts";
import { createEmptyElements, type StructuralElements } from "./structural-model.ts";

export interface ScanResult {
  elements: StructuralElements;
  diagnostics: Diagnostic[];
}

interface OpenScope {
  kind: "function" | "type";
  qualifiedName: string;
  indent: number;
  slot: number;
  startLine: number;
  members: string[];
}

const INTRODUCER_KEYWORDS = new Set(["def", "async", "class", "import", "from"]);

function isSignificant(token: Token): boolean {
  return token.kind !== "Newline" && token.kind !== "Indent" && token.kind !== "Dedent" && token.kind !== "EOF";
}

function isIntroducer(token: Token): boolean {
  return (
    (token.kind === "Keyword" && INTRODUCER_KEYWORDS.has(token.lexeme)) ||
    (token.kind === "Operator" && token.lexeme === "@")
  );
}

/**
 * Marks the tokens that begin a statement. A line start inside open brackets is
 * a continuation unless it is a block introducer, which also resets the depth.
 */
function markStatementStarts(tokens: Token[]): boolean[] {
  let depth = 0;
  return tokens.map((token) => {
    const introducer = isIntroducer(token);
    const start = token.lineStart && (depth === 0 || introducer);
    if (start && introducer) {
      depth = 0;
    }

    if (token.kind === "Operator" && (token.lexeme === "(" || token.lexeme === "[" || token.lexeme === "{")) {
      depth += 1;
    } else if (token.kind === "Operator" && (token.lexeme === ")" || token.lexeme === "]" || token.lexeme === "}")) {
      depth = Math.max(0, depth - 1);
    }
    return start;
  });
}

/**
 * Recognizes block introducers by position only. A `def`, `class`, `import`,
 * `from` or `@` that opens its physical line starts an element whatever the
 * bracket depth, so an unclosed bracket earlier in the file cannot hide later
 * definitions. Lexer diagnostics pass through and a {@link ScanError}
 * propagates.
 */
export function scanTokens(input: string): ScanResult {
  const { tokens, diagnostics } = lex(input);
  const significant = tokens.filter(isSignificant);
  const statementStarts = markStatementStarts(significant);
  const elements = createEmptyElements();
  const scopes: OpenScope[] = [];

  let lastLine = 0;
  let decoratorLine: number | null = null;

  function closeScope(scope: OpenScope): void {
    const endLine = Math.max(lastLine, scope.startLine);
    if (scope.kind === "function") {
      const record = elements.functions[scope.slot];
      if (record !== undefined) {
        elements.functions[scope.slot] = { ...record, range: { startLine: record.range.startLine, endLine } };
      }
      return;
    }

    const record = elements.types[scope.slot];
    if (record !== undefined) {
      elements.types[scope.slot] = {
        ...record,
        memberFunctions: scope.members,
        range: { startLine: record.range.startLine, endLine }
      };
    }
  }

  function closeScopesAt(indent: number): void {
    while (scopes.length > 0) {
      const top = scopes[scopes.length - 1];
      if (top === undefined || top.indent < indent) {
        return;
      }
      scopes.pop();
      closeScope(top);
    }
  }

  function qualify(name: string): string {
    const enclosing = scopes[scopes.length - 1];
    return enclosing === undefined ? name : `${enclosing.qualifiedName}.${name}`;
  }

  function lineTokens(from: number): Token[] {
    const collected: Token[] = [];
    for (let cursor = from; cursor < significant.length; cursor += 1) {
      const token = significant[cursor];
      if (token === undefined || (cursor > from && statementStarts[cursor] === true)) {
        break;
      }
      collected.push(token);
    }
    return collected;
  }

  function recordFunction(line: Token[], startLine: number, first: Token, isAsync: boolean): void {
    const nameToken = line[1];
    if (nameToken?.kind !== "Name") {
      return;
    }

    const name = nameToken.lexeme;
    const qualifiedName = qualify(name);
    const enclosing = scopes[scopes.length - 1];
    if (enclosing?.kind === "type") {
      enclosing.members.push(name);
    }

    const slot =
      elements.functions.push({
        name,
        qualifiedName,
        parameters: collectParameters(line.slice(2)),
        range: { startLine, endLine: startLine },
        headerLine: line[0]?.range.start.line ?? startLine,
        nestingDepth: scopes.length,
        isAsync
      }) - 1;

    scopes.push({ kind: "function", qualifiedName, indent: first.indent, slot, startLine, members: [] });
  }

  function recordType(line: Token[], startLine: number, first: Token): void {
    const nameToken = line[1];
    if (nameToken?.kind !== "Name") {
      return;
    }

    const name = nameToken.lexeme;
    const qualifiedName = qualify(name);
    const slot =
      elements.types.push({
        name,
        qualifiedName,
        memberFunctions: [],
        range: { startLine, endLine: startLine },
        headerLine: first.range.start.line,
        nestingDepth: scopes.length
      }) - 1;

    scopes.push({ kind: "type", qualifiedName, indent: first.indent, slot, startLine, members: [] });
  }

  function recordImport(line: Token[]): void {
    let cursor = 1;
    while (cursor < line.length) {
      const dotted = readDottedName(line, cursor);
      if (dotted === null) {
        return;
      }
      cursor = dotted.next;

      let boundName = dotted.path.split(".")[0] ?? dotted.path;
      const alias = line[cursor + 1];
      if (line[cursor]?.lexeme === "as" && alias?.kind === "Name") {
        boundName = alias.lexeme;
        cursor += 2;
      }
      elements.imports.push({ sourcePath: dotted.path, boundName, line: dotted.line });

      if (line[cursor]?.lexeme !== ",") {
        return;
      }
      cursor += 1;
    }
  }

  function recordFromImport(line: Token[]): void {
    let cursor = 1;
    let path = "";
    while (line[cursor]?.lexeme === "." || line[cursor]?.lexeme === "...") {
      path += line[cursor]?.lexeme ?? "";
      cursor += 1;
    }

    const dotted = readDottedName(line, cursor);
    if (dotted !== null) {
      path += dotted.path;
      cursor = dotted.next;
    }

    if (path.length === 0 || line[cursor]?.lexeme !== "import") {
      return;
    }
    cursor += 1;

    const first = line[0];
    if (line[cursor]?.lexeme === "*" && first !== undefined) {
      elements.imports.push({ sourcePath: path, boundName: "*", line: first.range.start.line });
      return;
    }

    for (; cursor < line.length; cursor += 1) {
      const token = line[cursor];
      if (token?.kind !== "Name") {
        continue;
      }

      const alias = line[cursor + 2];
      if (line[cursor + 1]?.lexeme === "as" && alias?.kind === "Name") {
        elements.imports.push({ sourcePath: path, boundName: alias.lexeme, line: token.range.start.line });
        cursor += 2;
        continue;
      }
      elements.imports.push({ sourcePath: path, boundName: token.lexeme, line: token.range.start.line });
    }
  }

  for (let index = 0; index < significant.length; index += 1) {
    const token = significant[index];
    if (token === undefined) {
      break;
    }

    if (statementStarts[index] !== true) {
      lastLine = token.range.end.line;
      continue;
    }

    closeScopesAt(token.indent);
    const line = lineTokens(index);
    const startLine = decoratorLine ?? token.range.start.line;

    if (token.kind === "Operator" && token.lexeme === "@") {
      if (decoratorLine === null) {
        decoratorLine = token.range.start.line;
      }
    } else if (token.kind === "Keyword" && (token.lexeme === "def" || token.lexeme === "async")) {
      const defIndex = token.lexeme === "async" ? 1 : 0;
      if (line[defIndex]?.lexeme === "def") {
        recordFunction(line.slice(defIndex), startLine, token, defIndex === 1);
      }
      decoratorLine = null;
    } else if (token.kind === "Keyword" && token.lexeme === "class") {
      recordType(line, startLine, token);
      decoratorLine = null;
    } else if (token.kind === "Keyword" && token.lexeme === "import") {
      recordImport(line);
      decoratorLine = null;
    } else if (token.kind === "Keyword" && token.lexeme === "from") {
      recordFromImport(line);
      decoratorLine = null;
    } else {
      if (scopes.length === 0 && token.kind === "Name") {
        const next = line[1];
        if (next?.kind === "Operator" && (next.lexeme === "=" || next.lexeme === ":")) {
          elements.moduleBindings.push({ name: token.lexeme, line: token.range.start.line });
        }
      }
      decoratorLine = null;
    }

    lastLine = token.range.end.line;
  }

  lastLine = significant[significant.length - 1]?.range.end.line ?? 0;
  closeScopesAt(Number.NEGATIVE_INFINITY);

  return {
    elements,
    diagnostics
  };
}

function readDottedName(line: Token[], from: number): { path: string; next: number; line: number } | null {
  const first = line[from];
  if (first?.kind !== "Name") {
    return null;
  }

  let path = first.lexeme;
  let cursor = from + 1;
  while (line[cursor]?.lexeme === "." && line[cursor + 1]?.kind === "Name") {
    path += `.${line[cursor + 1]?.lexeme ?? ""}`;
    cursor += 2;
  }

  return { path, next: cursor, line: first.range.start.line };
}

function collectParameters(tokens: Token[]): string[] {
  if (tokens[0]?.lexeme !== "(") {
    return [];
  }

  const names: string[] = [];
  let depth = 0;
  let expectParameter = true;
  let prefix = "";

  for (const token of tokens) {
    if (token.kind === "Operator" && (token.lexeme === "(" || token.lexeme === "[" || token.lexeme === "{")) {
      depth += 1;
      continue;
    }

    if (token.kind === "Operator" && (token.lexeme === ")" || token.lexeme === "]" || token.lexeme === "}")) {
      depth -= 1;
      if (depth === 0) {
        break;
      }
      continue;
    }

    if (depth !== 1) {
      continue;
    }

    if (token.kind === "Operator" && token.lexeme === ",") {
      expectParameter = true;
      prefix = "";
      continue;
    }

    if (!expectParameter) {
      continue;
    }

    if (token.kind === "Operator" && (token.lexeme === "*" || token.lexeme === "**")) {
      prefix = token.lexeme;
      continue;
    }

    if (token.kind === "Name") {
      names.push(`${prefix}${token.lexeme}`);
    }
    expectParameter = false;
  }

  return names;
}
