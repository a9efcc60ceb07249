/**
 * Python walker.
 */
import type { Visibility } from "../../../core/model.js";
import type { DraftElement, ElementCollector } from "../ElementCollector.js";
import { isPackageIndex, resolvePythonRelative } from "../modulePaths.js";
import {
  declarationMetadata,
  decoratorName,
  endLine,
  field,
  fieldText,
  hasToken,
  namesOfType,
  parameterNames,
  startLine,
  stripReceiver,
  visitDescendants,
  type SyntaxNode,
} from "./shared.js";

const TYPE_NAME_TYPES = new Set(["identifier", "attribute"]);
const BASE_TYPES = new Set(["identifier", "attribute"]);

type Scope = "module" | "class";

export function walkPython(root: SyntaxNode, c: ElementCollector): void {
  for (const child of root.namedChildren) {
    visit(child, c, c.module, "module", []);
  }
}

function visit(node: SyntaxNode, c: ElementCollector, parent: DraftElement, scope: Scope, decorators: string[]): void {
  switch (node.type) {
    case "import_statement":
    case "import_from_statement":
      visitImport(node, c);
      return;
    case "class_definition":
      visitClass(node, c, parent, decorators);
      return;
    case "function_definition":
      visitFunction(node, c, parent, scope, decorators);
      return;
    case "decorated_definition": {
      const names = node.namedChildren
        .filter((child) => child.type === "decorator")
        .map((child) => decoratorName(child.text));
      const definition = field(node, "definition");
      if (definition) visit(definition, c, parent, scope, names);
      return;
    }
    case "expression_statement": {
      const assignment = node.namedChildren[0];
      if (assignment?.type === "assignment") {
        visitAssignment(assignment, c, parent, scope);
      } else {
        collectReferences(node, c, parent);
      }
      return;
    }
    case "ERROR":
      for (const child of node.namedChildren) {
        visit(child, c, parent, scope, []);
      }
      return;
    case "comment":
      return;
    default:
      collectReferences(node, c, parent);
  }
}

export function pythonVisibility(name: string): Visibility {
  if (name.startsWith("__") && name.endsWith("__")) return "public";
  if (name.startsWith("__")) return "private";
  if (name.startsWith("_")) return "protected";
  return "public";
}

function visitImport(node: SyntaxNode, c: ElementCollector): void {
  if (node.type === "import_statement") {
    for (const item of node.namedChildren) {
      const dotted = item.type === "aliased_import" ? field(item, "name") : item;
      if (!dotted || dotted.type !== "dotted_name") continue;
      addImport(c, dotted.text, node);
      const alias = item.type === "aliased_import" ? fieldText(item, "alias") : undefined;
      if (alias) c.bind(alias, dotted.text);
    }
    return;
  }

  const moduleNode = field(node, "module_name");
  if (!moduleNode) return;
  const target = moduleNode.type === "relative_import" ? resolveRelative(moduleNode, c) : moduleNode.text;
  addImport(c, target, node);

  for (const item of node.namedChildren) {
    if (item.startIndex === moduleNode.startIndex) continue;
    const nameNode = item.type === "aliased_import" ? field(item, "name") : item;
    if (!nameNode || nameNode.type !== "dotted_name") continue;
    const alias = item.type === "aliased_import" ? fieldText(item, "alias") : undefined;
    const local = alias ?? nameNode.text.split(".")[0] ?? nameNode.text;
    c.bind(local, target ? `${target}.${nameNode.text}` : nameNode.text);
  }
}

function resolveRelative(node: SyntaxNode, c: ElementCollector): string {
  const prefix = node.namedChildren.find((child) => child.type === "import_prefix")?.text ?? ".";
  const rest = node.namedChildren.find((child) => child.type === "dotted_name")?.text ?? "";
  return resolvePythonRelative(
    c.module.qualifiedName,
    isPackageIndex(c.filePath, c.language),
    prefix.length,
    rest
  );
}

function addImport(c: ElementCollector, target: string, node: SyntaxNode): void {
  const element = c.add({
    name: target,
    qualifiedName: `${c.module.qualifiedName}:import:${target}`,
    kind: "import",
    startLine: startLine(node),
    endLine: endLine(node),
    visibility: "private",
    metadata: { target },
  });
  c.reference(element, "imports", target, startLine(node));
  c.reference(c.module, "depends_on", target, startLine(node));
}

function visitClass(node: SyntaxNode, c: ElementCollector, parent: DraftElement, decorators: string[]): void {
  const name = fieldText(node, "name") ?? "anonymous";
  const cls = c.add({
    name,
    kind: "class",
    startLine: startLine(node),
    endLine: endLine(node),
    parent,
    visibility: pythonVisibility(name),
    modifiers: decorators,
    metadata: declarationMetadata(docstringOf(node)),
  });

  const superclasses = field(node, "superclasses");
  if (superclasses) {
    for (const base of superclasses.namedChildren) {
      if (BASE_TYPES.has(base.type)) {
        c.reference(cls, "inherits", base.text, startLine(base));
      } else if (base.type === "subscript") {
        const value = fieldText(base, "value");
        if (value) c.reference(cls, "inherits", value, startLine(base));
      }
    }
  }

  const body = field(node, "body");
  if (!body) return;
  for (const statement of body.namedChildren) {
    visit(statement, c, cls, "class", []);
  }
}

function visitFunction(
  node: SyntaxNode,
  c: ElementCollector,
  parent: DraftElement,
  scope: Scope,
  decorators: string[]
): void {
  const name = fieldText(node, "name") ?? "anonymous";
  const modifiers = new Set(decorators);
  if (hasToken(node, "async")) modifiers.add("async");
  if (modifiers.has("@staticmethod")) modifiers.add("static");

  const fn = c.add({
    name,
    kind: scope === "class" ? "method" : "function",
    startLine: startLine(node),
    endLine: endLine(node),
    parent,
    visibility: pythonVisibility(name),
    modifiers,
    metadata: declarationMetadata(docstringOf(node), parameterNames(field(node, "parameters"))),
  });

  const parameters = field(node, "parameters");
  if (parameters) {
    for (const parameter of parameters.namedChildren) {
      const annotation = field(parameter, "type");
      if (!annotation) continue;
      for (const typeName of namesOfType(annotation, TYPE_NAME_TYPES)) {
        // __init__ parameters are the class's collaborators
        const owner = scope === "class" && name === "__init__" ? parent : fn;
        c.reference(owner, owner === parent ? "associates" : "uses", typeName, startLine(annotation));
      }
    }
  }

  const body = field(node, "body");
  if (body) collectReferences(body, c, fn);
}

/** The string literal that opens a class or function body. */
function docstringOf(node: SyntaxNode): string | undefined {
  const first = field(node, "body")?.namedChildren[0];
  const literal = first?.type === "expression_statement" ? first.namedChildren[0] : undefined;
  if (literal?.type !== "string") return undefined;
  const doc = literal.text
    .replace(/^[rRuUbBfF]*("""|'''|"|')/, "")
    .replace(/("""|'''|"|')$/, "")
    .split("\n")
    .map((line) => line.trim())
    .join("\n")
    .trim();
  return doc.length > 0 ? doc : undefined;
}

function visitAssignment(node: SyntaxNode, c: ElementCollector, parent: DraftElement, scope: Scope): void {
  const left = field(node, "left");
  const annotation = field(node, "type");
  const right = field(node, "right");

  if (left?.type === "identifier") {
    c.add({
      name: left.text,
      kind: "variable",
      startLine: startLine(node),
      endLine: endLine(node),
      parent,
      visibility: pythonVisibility(left.text),
      modifiers: /^[A-Z][A-Z0-9_]*$/.test(left.text) ? ["const"] : [],
    });
  }
  if (annotation && scope === "class") {
    for (const typeName of namesOfType(annotation, TYPE_NAME_TYPES)) {
      c.reference(parent, "associates", typeName, startLine(annotation));
    }
  }
  if (right) collectReferences(right, c, parent);
}

function collectReferences(node: SyntaxNode, c: ElementCollector, owner: DraftElement): void {
  const visitNode = (n: SyntaxNode): boolean | void => {
    switch (n.type) {
      case "import_statement":
      case "import_from_statement":
        visitImport(n, c);
        return false;
      case "call": {
        const callee = field(n, "function");
        if (callee?.type === "identifier") {
          c.reference(owner, "calls", callee.text, startLine(n));
        } else if (callee?.type === "attribute") {
          const target = isDottedChain(callee) ? callee.text : fieldText(callee, "attribute");
          if (target) c.reference(owner, "calls", stripReceiver(target), startLine(n));
        }
        return;
      }
    }
  };
  if (visitNode(node) === false) return;
  visitDescendants(node, visitNode);
}

function isDottedChain(node: SyntaxNode): boolean {
  if (node.type === "identifier") return true;
  if (node.type !== "attribute") return false;
  const object = field(node, "object");
  return object !== undefined && isDottedChain(object);
}
