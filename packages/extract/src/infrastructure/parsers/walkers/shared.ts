/**
 * Helpers shared by the per-language walkers.
 */
import type Parser from "tree-sitter";
import type { ElementCollector } from "../ElementCollector.js";

export type SyntaxNode = Parser.SyntaxNode;

/** Visits one parsed file, adding its elements to the collector. */
export type Walker = (root: SyntaxNode, collector: ElementCollector) => void;

export const startLine = (node: SyntaxNode): number => node.startPosition.row + 1;
export const endLine = (node: SyntaxNode): number => node.endPosition.row + 1;

export function field(node: SyntaxNode, name: string): SyntaxNode | undefined {
  return node.childForFieldName(name) ?? undefined;
}

export function fieldText(node: SyntaxNode, name: string): string | undefined {
  return node.childForFieldName(name)?.text;
}

export function firstNamedOfType(node: SyntaxNode, ...types: string[]): SyntaxNode | undefined {
  return node.namedChildren.find((child) => types.includes(child.type));
}

export function hasToken(node: SyntaxNode, token: string): boolean {
  return node.children.some((child) => !child.isNamed && child.type === token);
}

/**
 * Pre-order visit of every named descendant. Returning false from the visitor
 * skips that node's subtree. Uses an explicit stack: generated or minified
 * sources nest far deeper than the call stack allows.
 */
export function visitDescendants(node: SyntaxNode, visitor: (n: SyntaxNode) => boolean | void): void {
  const stack = [...node.namedChildren].reverse();
  let next = stack.pop();
  while (next !== undefined) {
    if (visitor(next) !== false) {
      const children = next.namedChildren;
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child) stack.push(child);
      }
    }
    next = stack.pop();
  }
}

/** Collect the text of every descendant (or the node itself) of the given types. */
export function namesOfType(node: SyntaxNode, types: ReadonlySet<string>): string[] {
  if (types.has(node.type)) return [node.text];
  const names: string[] = [];
  visitDescendants(node, (n) => {
    if (types.has(n.type)) {
      names.push(n.text);
      return false;
    }
  });
  return names;
}

export function unquote(text: string): string {
  return text.replace(/^[`'"]+|[`'"]+$/g, "");
}

/** `Base<T>` -> `Base` */
export function stripGenerics(text: string): string {
  return text.replace(/<[\s\S]*$/, "").replace(/\s+/g, "");
}

const RECEIVER_PREFIX = /^(this|self|cls|super)\./;

/** `this.repo.save` -> `repo.save` */
export function stripReceiver(target: string): string {
  return target.replace(RECEIVER_PREFIX, "");
}

/** `@app.route("/users")` -> `@app.route` */
export function decoratorName(text: string): string {
  const trimmed = text.trim().replace(/^@\s*/, "");
  const name = trimmed.replace(/[\s(][\s\S]*$/, "");
  return `@${name}`;
}

const DECLARATION_WRAPPERS: ReadonlySet<string> = new Set([
  "export_statement",
  "variable_declarator",
  "lexical_declaration",
  "variable_declaration",
]);

const PARAMETER_NAME_FIELDS = ["pattern", "name", "left"] as const;
const BARE_PARAMETER_TYPES: ReadonlySet<string> = new Set(["identifier", "self"]);

/**
 * Declared parameter names, in order. Destructured parameters keep their
 * pattern text; `func f(a, b int)` yields both names.
 */
export function parameterNames(list: SyntaxNode | undefined): string[] {
  if (!list) return [];
  const names: string[] = [];
  for (const parameter of list.namedChildren) {
    if (parameter.type.includes("comment")) continue;
    if (BARE_PARAMETER_TYPES.has(parameter.type)) {
      names.push(parameter.text);
      continue;
    }
    if (parameter.type === "self_parameter") {
      names.push("self");
      continue;
    }
    const goNames = parameter.childrenForFieldName("name");
    if (goNames.length > 1) {
      names.push(...goNames.map((n) => n.text));
      continue;
    }
    let nameNode: SyntaxNode | undefined;
    for (const fieldName of PARAMETER_NAME_FIELDS) {
      nameNode = field(parameter, fieldName);
      if (nameNode) break;
    }
    nameNode ??= firstNamedOfType(parameter, "identifier");
    if (nameNode) names.push(nameNode.text);
  }
  return names;
}

/**
 * The documentation comment directly above a declaration: a doc block
 * comment, or a run of line comments starting with `linePrefix`. Exported TypeScript
 * declarations carry theirs above the export statement.
 */
export function docComment(node: SyntaxNode, linePrefix = "///"): string | undefined {
  let anchor = node;
  while (anchor.parent && DECLARATION_WRAPPERS.has(anchor.parent.type)) anchor = anchor.parent;
  const lines: string[] = [];
  let line = anchor.startPosition.row;
  let sibling = anchor.previousNamedSibling;

  while (sibling && sibling.type.includes("comment") && sibling.endPosition.row >= line - 1) {
    const text = sibling.text.trim();
    if (text.startsWith("/**")) {
      if (lines.length > 0) break;
      return cleanBlockComment(text);
    }
    if (!text.startsWith(linePrefix)) break;
    lines.unshift(text.slice(linePrefix.length).replace(/^!/, "").trim());
    line = sibling.startPosition.row;
    sibling = sibling.previousNamedSibling;
  }

  const doc = lines.join("\n").trim();
  return doc.length > 0 ? doc : undefined;
}

function cleanBlockComment(text: string): string | undefined {
  const doc = text
    .replace(/^\/\*\*/, "")
    .replace(/\*\/$/, "")
    .split("\n")
    .map((l) => l.replace(/^\s*\* ?/, "").trimEnd())
    .join("\n")
    .trim();
  return doc.length > 0 ? doc : undefined;
}

/** `metadata` for a declaration, leaving out what the source does not give. */
export function declarationMetadata(
  docstring: string | undefined,
  parameters?: readonly string[]
): Record<string, unknown> {
  return {
    ...(docstring !== undefined ? { docstring } : {}),
    ...(parameters !== undefined ? { parameters: [...parameters] } : {}),
  };
}
