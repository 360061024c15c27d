import { createDiagnostic, type Diagnostic } from "./diagnostics.ts";
import { createEmptyElements } from "./structural-model.ts";
import type { ScanResult } from "./token-scanner.ts";

const NAME = "[\\p{L}_][\\p{L}\\p{N}_]*";
const DOTTED = `${NAME}(?:\\s*\\.\\s*${NAME})*`;

const FUNCTION_PATTERN = new RegExp(`^(async\\s+)?def\\s+(${NAME})\\s*(?:\\(([^)]*)(\\))?)?`, "u");
const TYPE_PATTERN = new RegExp(`^class\\s+(${NAME})`, "u");
const IMPORT_PATTERN = new RegExp(`^import\\s+(.+)$`, "u");
const FROM_IMPORT_PATTERN = new RegExp(`^from\\s+(\\.*\\s*(?:${DOTTED})?)\\s+import\\s+(.+)$`, "u");
const IMPORT_ITEM_PATTERN = new RegExp(`^(${DOTTED}|\\*)(?:\\s+as\\s+(${NAME}))?$`, "u");
const BINDING_PATTERN = new RegExp(`^(${NAME})\\s*(?::[^=]*)?=(?!=)`, "u");
const PARAMETER_PATTERN = new RegExp(`^(\\*{0,2})(${NAME})`, "u");

const TAB_WIDTH = 8;

interface OpenScope {
  kind: "function" | "type";
  qualifiedName: string;
  indent: number;
  slot: number;
  members: string[];
}

function measureIndent(line: string): number {
  let width = 0;
  for (const char of line) {
    if (char === " ") {
      width += 1;
    } else if (char === "\t") {
      width += TAB_WIDTH - (width % TAB_WIDTH);
    } else {
      break;
    }
  }
  return width;
}

function stripComment(line: string): string {
  const hash = line.indexOf("#");
  return (hash < 0 ? line : line.slice(0, hash)).trimEnd();
}

function compactDotted(value: string): string {
  return value.replace(/\s+/g, "");
}

function splitParameters(text: string): string[] {
  const names: string[] = [];
  let depth = 0;
  let current = "";

  const flush = (): void => {
    const match = PARAMETER_PATTERN.exec(current.trim());
    if (match !== null) {
      names.push(`${match[1] ?? ""}${match[2] ?? ""}`);
    }
    current = "";
  };

  for (const char of text) {
    if (char === "(" || char === "[" || char === "{") {
      depth += 1;
    } else if (char === ")" || char === "]" || char === "}") {
      depth -= 1;
    } else if (char === "," && depth === 0) {
      flush();
      continue;
    }
    current += char;
  }
  flush();

  return names;
}

/**
 * Line-pattern fallback. Works on physical lines with keyword-at-line-start
 * cues and never throws; scope ends are inferred from indentation alone.
 */
export function scanPatterns(input: string): ScanResult {
  const elements = createEmptyElements();
  const diagnostics: Diagnostic[] = [];
  const scopes: OpenScope[] = [];
  const lines = input.length === 0 ? [] : input.split(/\r\n|\n|\r/);

  let lastContentLine = 0;
  let decoratorLine: number | null = null;

  const closeScopesAt = (indent: number): void => {
    while (scopes.length > 0) {
      const top = scopes[scopes.length - 1];
      if (top === undefined || top.indent < indent) {
        return;
      }
      scopes.pop();

      if (top.kind === "function") {
        const record = elements.functions[top.slot];
        if (record !== undefined) {
          elements.functions[top.slot] = {
            ...record,
            range: { startLine: record.range.startLine, endLine: Math.max(lastContentLine, record.headerLine) }
          };
        }
        continue;
      }

      const record = elements.types[top.slot];
      if (record !== undefined) {
        elements.types[top.slot] = {
          ...record,
          memberFunctions: top.members,
          range: { startLine: record.range.startLine, endLine: Math.max(lastContentLine, record.headerLine) }
        };
      }
    }
  };

  const qualify = (name: string): string => {
    const enclosing = scopes[scopes.length - 1];
    return enclosing === undefined ? name : `${enclosing.qualifiedName}.${name}`;
  };

  const checkHeader = (content: string, lineNumber: number, column: number, kind: string): void => {
    if (!content.endsWith(":")) {
      diagnostics.push(
        createDiagnostic("PATTERN_HEADER_INCOMPLETE", `${kind} header does not end with ':'`, {
          line: lineNumber,
          column
        })
      );
    }
  };

  lines.forEach((rawLine, lineIndex) => {
    const lineNumber = lineIndex + 1;
    const content = stripComment(rawLine).trim();
    if (content.length === 0) {
      return;
    }

    const indent = measureIndent(rawLine);
    const column = rawLine.length - rawLine.trimStart().length + 1;
    closeScopesAt(indent);

    const startLine = decoratorLine ?? lineNumber;
    if (content.startsWith("@")) {
      if (decoratorLine === null) {
        decoratorLine = lineNumber;
      }
      lastContentLine = lineNumber;
      return;
    }
    decoratorLine = null;

    const functionMatch = FUNCTION_PATTERN.exec(content);
    if (functionMatch !== null) {
      const name = functionMatch[2] ?? "";
      const qualifiedName = qualify(name);
      const enclosing = scopes[scopes.length - 1];
      if (enclosing?.kind === "type") {
        enclosing.members.push(name);
      }

      const slot =
        elements.functions.push({
          name,
          qualifiedName,
          parameters: splitParameters(functionMatch[3] ?? ""),
          range: { startLine, endLine: lineNumber },
          headerLine: lineNumber,
          nestingDepth: scopes.length,
          isAsync: functionMatch[1] !== undefined
        }) - 1;
      scopes.push({ kind: "function", qualifiedName, indent, slot, members: [] });
      checkHeader(content, lineNumber, column, "Function");
      lastContentLine = lineNumber;
      return;
    }

    const typeMatch = TYPE_PATTERN.exec(content);
    if (typeMatch !== null) {
      const name = typeMatch[1] ?? "";
      const qualifiedName = qualify(name);
      const slot =
        elements.types.push({
          name,
          qualifiedName,
          memberFunctions: [],
          range: { startLine, endLine: lineNumber },
          headerLine: lineNumber,
          nestingDepth: scopes.length
        }) - 1;
      scopes.push({ kind: "type", qualifiedName, indent, slot, members: [] });
      checkHeader(content, lineNumber, column, "Class");
      lastContentLine = lineNumber;
      return;
    }

    const fromMatch = FROM_IMPORT_PATTERN.exec(content);
    if (fromMatch !== null) {
      const sourcePath = compactDotted(fromMatch[1] ?? "");
      const items = (fromMatch[2] ?? "").replace(/[()]/g, "").split(",");
      for (const item of items) {
        const itemMatch = IMPORT_ITEM_PATTERN.exec(item.trim());
        if (itemMatch !== null) {
          elements.imports.push({
            sourcePath,
            boundName: itemMatch[2] ?? compactDotted(itemMatch[1] ?? ""),
            line: lineNumber
          });
        }
      }
      lastContentLine = lineNumber;
      return;
    }

    const importMatch = IMPORT_PATTERN.exec(content);
    if (importMatch !== null) {
      for (const item of (importMatch[1] ?? "").split(",")) {
        const itemMatch = IMPORT_ITEM_PATTERN.exec(item.trim());
        if (itemMatch === null) {
          continue;
        }
        const sourcePath = compactDotted(itemMatch[1] ?? "");
        elements.imports.push({
          sourcePath,
          boundName: itemMatch[2] ?? sourcePath.split(".")[0] ?? sourcePath,
          line: lineNumber
        });
      }
      lastContentLine = lineNumber;
      return;
    }

    if (indent === 0) {
      const bindingMatch = BINDING_PATTERN.exec(content);
      if (bindingMatch !== null) {
        elements.moduleBindings.push({ name: bindingMatch[1] ?? "", line: lineNumber });
      }
    }
    lastContentLine = lineNumber;
  });

  closeScopesAt(Number.NEGATIVE_INFINITY);

  return {
    elements,
    diagnostics
  };
}
