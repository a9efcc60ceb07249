/**
 * Go walker. Declarations belong to the package named by the package clause.
 */
import type { Visibility } from "../../../core/model.js";
import type { DraftElement, ElementCollector } from "../ElementCollector.js";
import {
  declarationMetadata,
  docComment,
  endLine,
  field,
  fieldText,
  firstNamedOfType,
  parameterNames,
  startLine,
  unquote,
  visitDescendants,
  type SyntaxNode,
} from "./shared.js";

const TYPE_NAME_TYPES = new Set(["type_identifier", "qualified_type"]);

const BUILTIN_TYPES = new Set([
  "bool", "byte", "complex64", "complex128", "error", "float32", "float64", "int", "int8",
  "int16", "int32", "int64", "rune", "string", "uint", "uint8", "uint16", "uint32", "uint64",
  "uintptr", "any",
]);

export function goVisibility(name: string): Visibility {
  return /^[A-Z]/.test(name) ? "public" : "internal";
}

export function walkGo(root: SyntaxNode, c: ElementCollector): void {
  const declarations = root.namedChildren;

  const packageClause = declarations.find((node) => node.type === "package_clause");
  const packageName = packageClause ? firstNamedOfType(packageClause, "package_identifier")?.text : undefined;
  if (packageClause && packageName) {
    c.enterPackage(packageName, startLine(packageClause));
  }

  // Types first so methods can find their receiver declared later in the file
  for (const node of declarations) {
    if (node.type === "type_declaration") visitTypeDeclaration(node, c);
  }
  for (const node of declarations) {
    switch (node.type) {
      case "import_declaration":
        visitImports(node, c);
        break;
      case "function_declaration":
        visitFunction(node, c);
        break;
      case "method_declaration":
        visitMethod(node, c);
        break;
      case "const_declaration":
      case "var_declaration":
        visitValues(node, c);
        break;
      case "ERROR":
        collectReferences(node, c, c.module);
        break;
    }
  }
}

function visitImports(node: SyntaxNode, c: ElementCollector): void {
  const specs = node.descendantsOfType("import_spec");
  for (const spec of specs) {
    const pathNode = field(spec, "path");
    if (!pathNode) continue;
    const importPath = unquote(pathNode.text);
    const element = c.add({
      name: importPath,
      qualifiedName: `${c.module.qualifiedName}:import:${importPath}`,
      kind: "import",
      startLine: startLine(spec),
      endLine: endLine(spec),
      visibility: "private",
      metadata: { target: importPath },
    });
    c.reference(element, "imports", importPath, startLine(spec));
    c.reference(c.module, "depends_on", importPath, startLine(spec));

    const alias = field(spec, "name");
    if (alias?.type === "package_identifier") {
      c.bind(alias.text, importPath.split("/").pop() ?? importPath);
    }
  }
}

function visitTypeDeclaration(node: SyntaxNode, c: ElementCollector): void {
  for (const spec of node.namedChildren) {
    if (spec.type !== "type_spec") continue;
    const name = fieldText(spec, "name");
    const type = field(spec, "type");
    if (!name || !type) continue;
    // `type X struct` keeps its comment above the declaration, a group keeps it above the spec
    const metadata = declarationMetadata(docComment(spec, "//") ?? docComment(node, "//"));

    if (type.type === "struct_type") {
      const struct = c.add({
        name,
        kind: "struct",
        startLine: startLine(spec),
        endLine: endLine(spec),
        visibility: goVisibility(name),
        metadata,
      });
      visitStructFields(type, c, struct);
    } else if (type.type === "interface_type") {
      c.add({
        name,
        kind: "interface",
        startLine: startLine(spec),
        endLine: endLine(spec),
        visibility: goVisibility(name),
        metadata,
      });
    }
  }
}

function visitStructFields(struct: SyntaxNode, c: ElementCollector, owner: DraftElement): void {
  const fields = firstNamedOfType(struct, "field_declaration_list");
  if (!fields) return;
  for (const declaration of fields.namedChildren) {
    if (declaration.type !== "field_declaration") continue;
    const type = field(declaration, "type");
    if (!type) continue;
    const embedded = field(declaration, "name") === undefined;
    for (const typeName of typeNames(type)) {
      c.reference(owner, embedded ? "composes" : "associates", typeName, startLine(declaration));
    }
  }
}

function typeNames(type: SyntaxNode): string[] {
  const names: string[] = [];
  if (TYPE_NAME_TYPES.has(type.type)) {
    names.push(type.text);
  } else {
    visitDescendants(type, (n) => {
      if (TYPE_NAME_TYPES.has(n.type)) {
        names.push(n.text);
        return false;
      }
    });
  }
  return names.filter((name) => !BUILTIN_TYPES.has(name));
}

function visitFunction(node: SyntaxNode, c: ElementCollector): void {
  const name = fieldText(node, "name") ?? "anonymous";
  const fn = c.add({
    name,
    kind: "function",
    startLine: startLine(node),
    endLine: endLine(node),
    visibility: goVisibility(name),
    metadata: declarationMetadata(docComment(node, "//"), parameterNames(field(node, "parameters"))),
  });
  const body = field(node, "body");
  if (body) collectReferences(body, c, fn);
}

function receiverType(node: SyntaxNode): string | undefined {
  const receiver = field(node, "receiver");
  const parameter = receiver?.namedChildren.find((n) => n.type === "parameter_declaration");
  const type = parameter ? field(parameter, "type") : undefined;
  if (!type) return undefined;
  return type.type === "type_identifier" ? type.text : type.descendantsOfType("type_identifier")[0]?.text;
}

function visitMethod(node: SyntaxNode, c: ElementCollector): void {
  const name = fieldText(node, "name") ?? "anonymous";
  const receiver = receiverType(node);
  const scope = c.currentNamespace;
  const owner = receiver ? c.find(`${scope}.${receiver}`, ["struct", "interface"]) : undefined;

  const method = c.add({
    name,
    kind: "method",
    qualifiedName: receiver ? `${scope}.${receiver}.${name}` : `${scope}.${name}`,
    startLine: startLine(node),
    endLine: endLine(node),
    ...(owner ? { parent: owner } : {}),
    visibility: goVisibility(name),
    metadata: {
      ...declarationMetadata(docComment(node, "//"), parameterNames(field(node, "parameters"))),
      ...(receiver ? { receiver } : {}),
    },
  });
  const body = field(node, "body");
  if (body) collectReferences(body, c, method);
}

function visitValues(node: SyntaxNode, c: ElementCollector): void {
  const isConst = node.type === "const_declaration";
  for (const spec of node.descendantsOfType(["const_spec", "var_spec"])) {
    for (const nameNode of spec.namedChildren.filter((n) => n.type === "identifier")) {
      const variable = c.add({
        name: nameNode.text,
        kind: "variable",
        startLine: startLine(spec),
        endLine: endLine(spec),
        visibility: goVisibility(nameNode.text),
        modifiers: isConst ? ["const"] : [],
      });
      const value = field(spec, "value");
      if (value) collectReferences(value, c, variable);
    }
  }
}

function collectReferences(node: SyntaxNode, c: ElementCollector, owner: DraftElement): void {
  visitDescendants(node, (n) => {
    if (n.type === "call_expression") {
      const callee = field(n, "function");
      if (callee?.type === "identifier") {
        c.reference(owner, "calls", callee.text, startLine(n));
      } else if (callee?.type === "selector_expression") {
        const operand = field(callee, "operand");
        const member = fieldText(callee, "field");
        if (member) {
          const target = operand?.type === "identifier" ? `${operand.text}.${member}` : member;
          c.reference(owner, "calls", target, startLine(n));
        }
      }
    } else if (n.type === "composite_literal") {
      const type = field(n, "type");
      if (type && TYPE_NAME_TYPES.has(type.type)) c.reference(owner, "uses", type.text, startLine(n));
    }
  });
}
