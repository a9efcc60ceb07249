/**
 * TypeScript / TSX / JavaScript walker.
 */
import type { Visibility } from "../../../core/model.js";
import type { DraftElement, ElementCollector } from "../ElementCollector.js";
import { resolveScriptSpecifier } from "../modulePaths.js";
import {
  declarationMetadata,
  decoratorName,
  docComment,
  endLine,
  field,
  fieldText,
  firstNamedOfType,
  hasToken,
  namesOfType,
  parameterNames,
  startLine,
  stripGenerics,
  stripReceiver,
  unquote,
  visitDescendants,
  type SyntaxNode,
} from "./shared.js";

const CLASS_TYPES = new Set(["class_declaration", "abstract_class_declaration", "class"]);
const FUNCTION_VALUE_TYPES = new Set([
  "arrow_function",
  "function",
  "function_expression",
  "generator_function",
]);
const TYPE_NAME_TYPES = new Set(["type_identifier", "nested_type_identifier"]);
const HERITAGE_NAME_TYPES = new Set([
  "identifier",
  "type_identifier",
  "member_expression",
  "nested_type_identifier",
  "generic_type",
  "nested_identifier",
]);
const MEMBER_MODIFIERS = ["static", "async", "abstract", "readonly", "override", "get", "set"];

interface DeclarationContext {
  parent: DraftElement;
  exported: boolean;
  decorators: string[];
}

export function walkTypeScript(root: SyntaxNode, c: ElementCollector): void {
  for (const child of root.namedChildren) {
    visitStatement(child, c, { parent: c.module, exported: false, decorators: [] });
  }
}

function visitStatement(node: SyntaxNode, c: ElementCollector, ctx: DeclarationContext): void {
  switch (node.type) {
    case "export_statement":
      visitExport(node, c, ctx.parent);
      return;
    case "import_statement":
      visitImport(node, c);
      return;
    case "class_declaration":
    case "abstract_class_declaration":
      visitClass(node, c, ctx);
      return;
    case "function_declaration":
    case "generator_function_declaration":
      visitFunction(node, c, ctx);
      return;
    case "interface_declaration":
      visitInterface(node, c, ctx);
      return;
    case "enum_declaration":
      c.add({
        name: fieldText(node, "name") ?? "default",
        kind: "enum",
        startLine: startLine(node),
        endLine: endLine(node),
        parent: ctx.parent,
        visibility: topLevelVisibility(ctx),
        modifiers: ctx.exported ? ["export"] : [],
      });
      return;
    case "lexical_declaration":
    case "variable_declaration":
      visitVariables(node, c, ctx);
      return;
    case "internal_module":
    case "module":
      visitNamespace(node, c, ctx);
      return;
    case "expression_statement": {
      const inner = node.namedChildren[0];
      if (inner && inner.type === "internal_module") {
        visitNamespace(inner, c, ctx);
      } else {
        collectReferences(node, c, ctx.parent);
      }
      return;
    }
    case "ambient_declaration":
    case "ERROR":
      for (const child of node.namedChildren) {
        visitStatement(child, c, ctx);
      }
      return;
    case "type_alias_declaration":
    case "comment":
      return;
    default:
      collectReferences(node, c, ctx.parent);
  }
}

function visitExport(node: SyntaxNode, c: ElementCollector, parent: DraftElement): void {
  const source = field(node, "source");
  if (source) {
    const target = addImport(c, unquote(source.text), node);
    for (const specifier of node.descendantsOfType("export_specifier")) {
      const name = fieldText(specifier, "name");
      if (name) c.bind(name, `${target}.${name}`);
    }
    return;
  }

  const decorators = node.namedChildren
    .filter((child) => child.type === "decorator")
    .map((child) => decoratorName(child.text));
  const declaration =
    field(node, "declaration") ??
    node.namedChildren.find((child) => child.type !== "decorator" && child.type !== "comment");

  if (!declaration) return;
  if (declaration.type === "identifier" || declaration.type === "export_clause") return;
  if (CLASS_TYPES.has(declaration.type) || declaration.type.endsWith("declaration") || declaration.type === "internal_module") {
    visitStatement(declaration, c, { parent, exported: true, decorators });
    return;
  }
  // export default <expression>
  collectReferences(declaration, c, c.module);
}

function visitImport(node: SyntaxNode, c: ElementCollector): void {
  const source = field(node, "source");
  if (!source) return;
  const specifier = unquote(source.text);
  const target = addImport(c, specifier, node);

  const clause = firstNamedOfType(node, "import_clause");
  if (!clause) return;
  for (const part of clause.namedChildren) {
    if (part.type === "identifier") {
      c.bind(part.text, `${target}.${part.text}`);
    } else if (part.type === "namespace_import") {
      const alias = firstNamedOfType(part, "identifier");
      if (alias) c.bind(alias.text, target);
    } else if (part.type === "named_imports") {
      for (const specifierNode of part.namedChildren) {
        if (specifierNode.type !== "import_specifier") continue;
        const name = fieldText(specifierNode, "name");
        const alias = fieldText(specifierNode, "alias");
        if (name) c.bind(alias ?? name, `${target}.${name}`);
      }
    }
  }
}

function addImport(c: ElementCollector, specifier: string, node: SyntaxNode): string {
  const target = resolveScriptSpecifier(c.filePath, specifier, c.language);
  const element = c.add({
    name: specifier,
    qualifiedName: `${c.module.qualifiedName}:import:${specifier}`,
    kind: "import",
    startLine: startLine(node),
    endLine: endLine(node),
    visibility: "private",
    metadata: { specifier, target },
  });
  c.reference(element, "imports", target, startLine(node));
  c.reference(c.module, "depends_on", target, startLine(node));
  return target;
}

function topLevelVisibility(ctx: DeclarationContext): Visibility {
  return ctx.exported ? "public" : "internal";
}

function visitClass(node: SyntaxNode, c: ElementCollector, ctx: DeclarationContext, nameOverride?: string): void {
  const modifiers = new Set(ctx.decorators);
  for (const child of node.namedChildren) {
    if (child.type === "decorator") modifiers.add(decoratorName(child.text));
  }
  if (ctx.exported) modifiers.add("export");
  if (node.type === "abstract_class_declaration") modifiers.add("abstract");

  const classElement = c.add({
    name: fieldText(node, "name") ?? nameOverride ?? "default",
    kind: "class",
    startLine: startLine(node),
    endLine: endLine(node),
    parent: ctx.parent,
    visibility: topLevelVisibility(ctx),
    modifiers,
    metadata: declarationMetadata(docComment(node)),
  });

  const heritage = firstNamedOfType(node, "class_heritage");
  if (heritage) {
    for (const clause of heritage.namedChildren) {
      if (clause.type === "extends_clause") {
        for (const base of clause.namedChildren) {
          if (HERITAGE_NAME_TYPES.has(base.type)) {
            c.reference(classElement, "inherits", stripGenerics(base.text), startLine(base));
          }
        }
      } else if (clause.type === "implements_clause") {
        for (const iface of clause.namedChildren) {
          c.reference(classElement, "implements", stripGenerics(iface.text), startLine(iface));
        }
      } else if (HERITAGE_NAME_TYPES.has(clause.type)) {
        c.reference(classElement, "inherits", stripGenerics(clause.text), startLine(clause));
      }
    }
  }

  const body = field(node, "body");
  if (body) visitClassBody(body, c, classElement);
}

function visitClassBody(body: SyntaxNode, c: ElementCollector, classElement: DraftElement): void {
  let pending: string[] = [];

  for (const member of body.namedChildren) {
    if (member.type === "decorator") {
      pending.push(decoratorName(member.text));
      continue;
    }
    const decorators = [
      ...pending,
      ...member.namedChildren.filter((n) => n.type === "decorator").map((n) => decoratorName(n.text)),
    ];
    pending = [];

    switch (member.type) {
      case "method_definition":
      case "method_signature":
      case "abstract_method_signature":
        visitMethod(member, c, classElement, decorators);
        break;
      case "public_field_definition":
      case "field_definition":
        visitField(member, c, classElement, decorators);
        break;
      case "comment":
        break;
      default:
        collectReferences(member, c, classElement);
    }
  }
}

function memberVisibility(node: SyntaxNode, nameNode: SyntaxNode | undefined): Visibility {
  const accessibility = firstNamedOfType(node, "accessibility_modifier")?.text;
  if (accessibility === "private" || accessibility === "protected") return accessibility;
  if (nameNode?.type === "private_property_identifier") return "private";
  return "public";
}

function memberModifiers(node: SyntaxNode, decorators: string[]): Set<string> {
  const modifiers = new Set(decorators);
  for (const token of MEMBER_MODIFIERS) {
    if (hasToken(node, token)) modifiers.add(token);
  }
  if (node.type === "abstract_method_signature") modifiers.add("abstract");
  return modifiers;
}

function visitMethod(node: SyntaxNode, c: ElementCollector, classElement: DraftElement, decorators: string[]): void {
  const nameNode = field(node, "name");
  const name = nameNode?.text ?? "anonymous";
  const method = c.add({
    name,
    kind: "method",
    startLine: startLine(node),
    endLine: endLine(node),
    parent: classElement,
    visibility: memberVisibility(node, nameNode),
    modifiers: memberModifiers(node, decorators),
    metadata: declarationMetadata(docComment(node), functionParameters(node)),
  });

  const parameters = field(node, "parameters");
  if (parameters && name === "constructor") {
    // Constructor parameter types are the class's collaborators
    for (const typeName of namesOfType(parameters, TYPE_NAME_TYPES)) {
      c.reference(classElement, "associates", typeName, startLine(parameters));
    }
  }

  const body = field(node, "body");
  if (body) collectReferences(body, c, method);
}

function visitField(node: SyntaxNode, c: ElementCollector, classElement: DraftElement, decorators: string[]): void {
  const nameNode = field(node, "name") ?? field(node, "property");
  const value = field(node, "value");
  const modifiers = memberModifiers(node, decorators);

  if (value && FUNCTION_VALUE_TYPES.has(value.type)) {
    if (hasToken(value, "async")) modifiers.add("async");
    const method = c.add({
      name: nameNode?.text ?? "anonymous",
      kind: "method",
      startLine: startLine(node),
      endLine: endLine(node),
      parent: classElement,
      visibility: memberVisibility(node, nameNode),
      modifiers,
      metadata: declarationMetadata(docComment(node), functionParameters(value)),
    });
    collectReferences(value, c, method);
    return;
  }

  c.add({
    name: nameNode?.text ?? "anonymous",
    kind: "variable",
    startLine: startLine(node),
    endLine: endLine(node),
    parent: classElement,
    visibility: memberVisibility(node, nameNode),
    modifiers,
  });
  const annotation = field(node, "type");
  if (annotation) {
    for (const typeName of namesOfType(annotation, TYPE_NAME_TYPES)) {
      c.reference(classElement, "associates", typeName, startLine(annotation));
    }
  }
  if (value) collectReferences(value, c, classElement);
}

function visitFunction(node: SyntaxNode, c: ElementCollector, ctx: DeclarationContext, nameOverride?: string): void {
  const modifiers = new Set(ctx.decorators);
  if (ctx.exported) modifiers.add("export");
  if (hasToken(node, "async")) modifiers.add("async");
  if (node.type.startsWith("generator")) modifiers.add("generator");

  const fn = c.add({
    name: fieldText(node, "name") ?? nameOverride ?? "default",
    kind: "function",
    startLine: startLine(node),
    endLine: endLine(node),
    parent: ctx.parent,
    visibility: topLevelVisibility(ctx),
    modifiers,
    metadata: declarationMetadata(docComment(node), functionParameters(node)),
  });
  const body = field(node, "body");
  if (body) collectReferences(body, c, fn);
}

function visitInterface(node: SyntaxNode, c: ElementCollector, ctx: DeclarationContext): void {
  const iface = c.add({
    name: fieldText(node, "name") ?? "default",
    kind: "interface",
    startLine: startLine(node),
    endLine: endLine(node),
    parent: ctx.parent,
    visibility: topLevelVisibility(ctx),
    modifiers: ctx.exported ? ["export"] : [],
    metadata: declarationMetadata(docComment(node)),
  });
  const extendsClause = firstNamedOfType(node, "extends_type_clause", "extends_clause");
  if (extendsClause) {
    for (const base of extendsClause.namedChildren) {
      c.reference(iface, "inherits", stripGenerics(base.text), startLine(base));
    }
  }
}

function visitVariables(node: SyntaxNode, c: ElementCollector, ctx: DeclarationContext): void {
  const isConst = node.children[0]?.text === "const";

  for (const declarator of node.namedChildren) {
    if (declarator.type !== "variable_declarator") continue;
    const nameNode = field(declarator, "name");
    const value = field(declarator, "value");
    const name = nameNode?.type === "identifier" ? nameNode.text : undefined;

    if (name && value && FUNCTION_VALUE_TYPES.has(value.type)) {
      visitFunction(value, c, ctx, name);
      continue;
    }
    if (name && value && value.type === "class") {
      visitClass(value, c, ctx, name);
      continue;
    }
    if (!name) {
      if (value) collectReferences(value, c, ctx.parent);
      continue;
    }

    const modifiers = new Set<string>();
    if (ctx.exported) modifiers.add("export");
    if (isConst) modifiers.add("const");
    const variable = c.add({
      name,
      kind: "variable",
      startLine: startLine(declarator),
      endLine: endLine(declarator),
      parent: ctx.parent,
      visibility: topLevelVisibility(ctx),
      modifiers,
    });
    if (!value) continue;

    const required = requireSpecifier(value);
    if (required !== undefined) {
      c.bind(name, addImport(c, required, value));
      continue;
    }
    collectReferences(value, c, variable);
  }
}

function visitNamespace(node: SyntaxNode, c: ElementCollector, ctx: DeclarationContext): void {
  const nameNode = field(node, "name");
  if (!nameNode || nameNode.type === "string") {
    // declare module "x" { ... } describes another package
    return;
  }
  const namespace = c.add({
    name: nameNode.text,
    kind: "namespace",
    startLine: startLine(node),
    endLine: endLine(node),
    parent: ctx.parent,
    visibility: topLevelVisibility(ctx),
    modifiers: ctx.exported ? ["export"] : [],
  });
  const body = field(node, "body");
  if (!body) return;
  for (const statement of body.namedChildren) {
    visitStatement(statement, c, { parent: namespace, exported: false, decorators: [] });
  }
}

/** `require("x")` -> `"x"` */
/** `x => x` has a bare `parameter` field instead of a list. */
function functionParameters(node: SyntaxNode): string[] {
  const single = field(node, "parameter");
  return single ? [single.text] : parameterNames(field(node, "parameters"));
}

function requireSpecifier(node: SyntaxNode): string | undefined {
  if (node.type !== "call_expression") return undefined;
  const callee = field(node, "function");
  if (callee?.type !== "identifier" || callee.text !== "require") return undefined;
  const argument = field(node, "arguments")?.namedChildren[0];
  return argument?.type === "string" ? unquote(argument.text) : undefined;
}

function calleeTarget(callee: SyntaxNode): string | undefined {
  switch (callee.type) {
    case "identifier":
    case "property_identifier":
    case "private_property_identifier":
    case "this":
      return callee.text;
    case "member_expression": {
      const property = field(callee, "property")?.text;
      const object = field(callee, "object");
      if (!property) return undefined;
      const base = object ? calleeTarget(object) : undefined;
      return base ? `${base}.${property}` : property;
    }
    default:
      return undefined;
  }
}

function collectReferences(node: SyntaxNode, c: ElementCollector, owner: DraftElement): void {
  const visit = (n: SyntaxNode): boolean | void => {
    switch (n.type) {
      case "call_expression": {
        const required = requireSpecifier(n);
        if (required !== undefined) {
          addImport(c, required, n);
          return false;
        }
        const callee = field(n, "function");
        if (callee?.type === "import") {
          const argument = field(n, "arguments")?.namedChildren[0];
          if (argument?.type === "string") addImport(c, unquote(argument.text), n);
          return false;
        }
        const target = callee ? calleeTarget(callee) : undefined;
        if (target && target !== "this") c.reference(owner, "calls", stripReceiver(target), startLine(n));
        return;
      }
      case "new_expression": {
        const ctor = field(n, "constructor");
        const target = ctor ? calleeTarget(ctor) : undefined;
        if (target) c.reference(owner, "uses", stripReceiver(target), startLine(n));
        return;
      }
      case "jsx_opening_element":
      case "jsx_self_closing_element": {
        const name = fieldText(n, "name");
        if (name && /^[A-Z]/.test(name)) c.reference(owner, "uses", name, startLine(n));
        return;
      }
    }
  };
  if (visit(node) === false) return;
  visitDescendants(node, visit);
}
