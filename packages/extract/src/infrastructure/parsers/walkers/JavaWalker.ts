/**
 * Java walker. Declarations belong to the package of the compilation unit.
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
  stripGenerics,
  stripReceiver,
  visitDescendants,
  type SyntaxNode,
} from "./shared.js";

const TYPE_DECLARATIONS = new Set([
  "class_declaration",
  "interface_declaration",
  "enum_declaration",
  "record_declaration",
  "annotation_type_declaration",
]);
const TYPE_NAME_TYPES = new Set(["type_identifier", "scoped_type_identifier"]);
const MODIFIER_TOKENS = ["static", "final", "abstract", "synchronized", "default", "sealed"];

export function walkJava(root: SyntaxNode, c: ElementCollector): void {
  const packageDeclaration = root.namedChildren.find((n) => n.type === "package_declaration");
  const packageName = packageDeclaration
    ? firstNamedOfType(packageDeclaration, "scoped_identifier", "identifier")?.text
    : undefined;
  if (packageDeclaration && packageName) {
    c.enterPackage(packageName, startLine(packageDeclaration));
  }

  for (const node of root.namedChildren) {
    visitTopLevel(node, c);
  }
}

function visitTopLevel(node: SyntaxNode, c: ElementCollector): void {
  if (node.type === "import_declaration") {
    visitImport(node, c);
  } else if (TYPE_DECLARATIONS.has(node.type)) {
    visitType(node, c, c.module);
  } else if (node.type === "ERROR") {
    for (const child of node.namedChildren) visitTopLevel(child, c);
  }
}

function visitImport(node: SyntaxNode, c: ElementCollector): void {
  const nameNode = firstNamedOfType(node, "scoped_identifier", "identifier");
  if (!nameNode) return;
  const target = nameNode.text;
  const wildcard = node.namedChildren.some((n) => n.type === "asterisk");

  const element = c.add({
    name: target,
    qualifiedName: `${c.module.qualifiedName}:import:${target}${wildcard ? ".*" : ""}`,
    kind: "import",
    startLine: startLine(node),
    endLine: endLine(node),
    visibility: "private",
    metadata: { target, wildcard },
  });
  c.reference(element, "imports", target, startLine(node));
  c.reference(c.module, "depends_on", target, startLine(node));

  if (!wildcard) {
    c.bind(target.split(".").pop() ?? target, target);
  }
}

interface ModifierInfo {
  visibility: Visibility;
  modifiers: Set<string>;
}

function readModifiers(node: SyntaxNode, defaultVisibility: Visibility): ModifierInfo {
  const modifiersNode = firstNamedOfType(node, "modifiers");
  const modifiers = new Set<string>();
  let visibility = defaultVisibility;
  if (!modifiersNode) return { visibility, modifiers };

  for (const child of modifiersNode.children) {
    const token = child.type;
    if (token === "public" || token === "private" || token === "protected") {
      visibility = token;
    } else if (MODIFIER_TOKENS.includes(token)) {
      modifiers.add(token);
    } else if (child.type === "marker_annotation" || child.type === "annotation") {
      const name = fieldText(child, "name");
      if (name) modifiers.add(`@${name}`);
    }
  }
  return { visibility, modifiers };
}

function typeNames(node: SyntaxNode): string[] {
  if (TYPE_NAME_TYPES.has(node.type)) return [node.text];
  const names: string[] = [];
  visitDescendants(node, (n) => {
    if (TYPE_NAME_TYPES.has(n.type)) {
      names.push(n.text);
      return false;
    }
  });
  return names;
}

function visitType(node: SyntaxNode, c: ElementCollector, parent: DraftElement): void {
  const name = fieldText(node, "name") ?? "Anonymous";
  const { visibility, modifiers } = readModifiers(node, "internal");
  const kind = node.type === "interface_declaration" || node.type === "annotation_type_declaration"
    ? "interface"
    : node.type === "enum_declaration"
      ? "enum"
      : "class";
  if (node.type === "record_declaration") modifiers.add("record");

  const type = c.add({
    name,
    kind,
    startLine: startLine(node),
    endLine: endLine(node),
    parent,
    visibility,
    modifiers,
    metadata: declarationMetadata(docComment(node)),
  });

  const superclass = field(node, "superclass");
  if (superclass) {
    for (const base of typeNames(superclass).slice(0, 1)) {
      c.reference(type, "inherits", stripGenerics(base), startLine(superclass));
    }
  }
  const interfaces = field(node, "interfaces");
  if (interfaces) {
    for (const iface of topLevelTypeNames(interfaces)) {
      c.reference(type, "implements", iface, startLine(interfaces));
    }
  }
  const extendsInterfaces = firstNamedOfType(node, "extends_interfaces");
  if (extendsInterfaces) {
    for (const base of topLevelTypeNames(extendsInterfaces)) {
      c.reference(type, "inherits", base, startLine(extendsInterfaces));
    }
  }

  const body = field(node, "body");
  if (body) visitBody(body, c, type, kind === "interface");
}

/** Names in a type list, ignoring generic arguments. */
function topLevelTypeNames(node: SyntaxNode): string[] {
  const list = firstNamedOfType(node, "type_list") ?? node;
  return list.namedChildren
    .map((t) => (t.type === "generic_type" ? firstNamedOfType(t, "type_identifier", "scoped_type_identifier") : t))
    .filter((t): t is SyntaxNode => t !== undefined && TYPE_NAME_TYPES.has(t.type))
    .map((t) => t.text);
}

function visitBody(body: SyntaxNode, c: ElementCollector, owner: DraftElement, isInterface: boolean): void {
  for (const member of body.namedChildren) {
    switch (member.type) {
      case "method_declaration":
      case "constructor_declaration":
      case "compact_constructor_declaration": {
        const { visibility, modifiers } = readModifiers(member, isInterface ? "public" : "internal");
        const method = c.add({
          name: fieldText(member, "name") ?? owner.name,
          kind: "method",
          startLine: startLine(member),
          endLine: endLine(member),
          parent: owner,
          visibility,
          modifiers,
          metadata: declarationMetadata(docComment(member), parameterNames(field(member, "parameters"))),
        });
        if (member.type !== "method_declaration") {
          const parameters = field(member, "parameters");
          if (parameters) {
            for (const typeName of typeNames(parameters)) {
              c.reference(owner, "associates", stripGenerics(typeName), startLine(parameters));
            }
          }
        }
        const methodBody = field(member, "body");
        if (methodBody) collectReferences(methodBody, c, method);
        break;
      }
      case "field_declaration":
      case "constant_declaration":
        visitField(member, c, owner, isInterface);
        break;
      case "enum_body_declarations":
        visitBody(member, c, owner, isInterface);
        break;
      default:
        if (TYPE_DECLARATIONS.has(member.type)) {
          visitType(member, c, owner);
        } else {
          collectReferences(member, c, owner);
        }
    }
  }
}

function visitField(node: SyntaxNode, c: ElementCollector, owner: DraftElement, isInterface: boolean): void {
  const { visibility, modifiers } = readModifiers(node, isInterface ? "public" : "internal");
  for (const declarator of node.namedChildren.filter((n) => n.type === "variable_declarator")) {
    c.add({
      name: fieldText(declarator, "name") ?? "anonymous",
      kind: "variable",
      startLine: startLine(node),
      endLine: endLine(node),
      parent: owner,
      visibility,
      modifiers,
    });
    const value = field(declarator, "value");
    if (value) collectReferences(value, c, owner);
  }
  const type = field(node, "type");
  if (type) {
    for (const typeName of typeNames(type)) {
      c.reference(owner, "associates", typeName, startLine(node));
    }
  }
}

function invocationTarget(object: SyntaxNode | undefined, name: string): string {
  if (!object) return name;
  if (object.type === "identifier" || object.type === "this") return stripReceiver(`${object.text}.${name}`);
  if (object.type === "field_access" && /^[\w.]+$/.test(object.text)) {
    return stripReceiver(`${object.text}.${name}`);
  }
  return name;
}

function collectReferences(node: SyntaxNode, c: ElementCollector, owner: DraftElement): void {
  const visitNode = (n: SyntaxNode): boolean | void => {
    if (n.type === "method_invocation") {
      const name = fieldText(n, "name");
      if (name) c.reference(owner, "calls", invocationTarget(field(n, "object"), name), startLine(n));
    } else if (n.type === "object_creation_expression") {
      const type = field(n, "type");
      if (type) {
        const [typeName] = typeNames(type);
        if (typeName) c.reference(owner, "uses", typeName, startLine(n));
      }
    }
  };
  visitNode(node);
  visitDescendants(node, visitNode);
}
