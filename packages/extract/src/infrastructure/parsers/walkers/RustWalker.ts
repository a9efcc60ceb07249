/**
 * Rust walker. Paths are normalised to dotted crate-relative names.
 */
import type { Visibility } from "../../../core/model.js";
import type { DraftElement, ElementCollector } from "../ElementCollector.js";
import { isPackageIndex, normalizeRustPath } from "../modulePaths.js";
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

const TYPE_ITEMS = new Set(["struct_item", "enum_item", "trait_item"]);

const PRELUDE_TYPES = new Set([
  "String", "Vec", "Option", "Result", "Box", "Rc", "Arc", "HashMap", "HashSet", "BTreeMap",
  "Self",
]);

function rustVisibility(node: SyntaxNode): Visibility {
  const modifier = firstNamedOfType(node, "visibility_modifier")?.text;
  if (!modifier) return "private";
  return modifier === "pub" ? "public" : "internal";
}

export function walkRust(root: SyntaxNode, c: ElementCollector): void {
  visitItems(root, c, c.module);
}

function visitItems(container: SyntaxNode, c: ElementCollector, parent: DraftElement): void {
  const items = container.namedChildren.flatMap((n) => (n.type === "ERROR" ? n.namedChildren : [n]));

  // Type items first so impl blocks find their struct wherever it is declared
  for (const item of items) {
    if (TYPE_ITEMS.has(item.type)) visitTypeItem(item, c, parent);
  }
  for (const item of items) {
    switch (item.type) {
      case "use_declaration":
        visitUse(item, c);
        break;
      case "function_item":
        visitFunction(item, c, parent, "function");
        break;
      case "impl_item":
        visitImpl(item, c, parent);
        break;
      case "mod_item":
        visitMod(item, c, parent);
        break;
      case "const_item":
      case "static_item": {
        const name = fieldText(item, "name");
        if (!name) break;
        const variable = c.add({
          name,
          kind: "variable",
          startLine: startLine(item),
          endLine: endLine(item),
          parent,
          visibility: rustVisibility(item),
          modifiers: [item.type === "const_item" ? "const" : "static"],
        });
        const value = field(item, "value");
        if (value) collectReferences(value, c, variable);
        break;
      }
    }
  }
}

interface UseLeaf {
  path: string;
  alias?: string;
}

function expandUse(node: SyntaxNode, prefix: string, out: UseLeaf[]): void {
  switch (node.type) {
    case "scoped_identifier":
    case "identifier":
    case "crate":
    case "self":
    case "super":
      out.push({ path: prefix + node.text });
      return;
    case "use_as_clause": {
      const path = fieldText(node, "path");
      const alias = fieldText(node, "alias");
      if (path) out.push({ path: prefix + path, ...(alias ? { alias } : {}) });
      return;
    }
    case "use_wildcard": {
      const path = firstNamedOfType(node, "scoped_identifier", "identifier", "crate", "self", "super");
      if (path) out.push({ path: prefix + path.text, alias: "*" });
      return;
    }
    case "scoped_use_list": {
      const path = fieldText(node, "path");
      const list = field(node, "list");
      if (list) expandUse(list, path ? `${prefix}${path}::` : prefix, out);
      return;
    }
    case "use_list":
      for (const child of node.namedChildren) expandUse(child, prefix, out);
      return;
  }
}

function visitUse(node: SyntaxNode, c: ElementCollector): void {
  const argument = field(node, "argument");
  if (!argument) return;
  const leaves: UseLeaf[] = [];
  expandUse(argument, "", leaves);

  for (const leaf of leaves) {
    const target = normalizeRustPath(leaf.path, c.module.qualifiedName);
    if (!target) continue;
    const element = c.add({
      name: leaf.path,
      qualifiedName: `${c.module.qualifiedName}:import:${leaf.path}`,
      kind: "import",
      startLine: startLine(node),
      endLine: endLine(node),
      visibility: "private",
      metadata: { target },
    });
    c.reference(element, "imports", target, startLine(node));
    c.reference(c.module, "depends_on", target, startLine(node));
    if (leaf.alias !== "*") {
      c.bind(leaf.alias ?? target.split(".").pop() ?? target, target);
    }
  }
}

function typeNames(node: SyntaxNode): string[] {
  const names: string[] = [];
  const collect = (n: SyntaxNode): boolean | void => {
    if (n.type === "type_identifier") {
      names.push(n.text);
      return false;
    }
    if (n.type === "scoped_type_identifier") {
      names.push(n.text.replace(/::/g, "."));
      return false;
    }
  };
  if (collect(node) !== false) visitDescendants(node, collect);
  return names.filter((name) => !PRELUDE_TYPES.has(name));
}

function visitTypeItem(node: SyntaxNode, c: ElementCollector, parent: DraftElement): void {
  const name = fieldText(node, "name");
  if (!name) return;
  const kind = node.type === "struct_item" ? "struct" : node.type === "enum_item" ? "enum" : "interface";
  const element = c.add({
    name,
    kind,
    startLine: startLine(node),
    endLine: endLine(node),
    parent,
    visibility: rustVisibility(node),
    metadata: declarationMetadata(docComment(node)),
  });

  const body = field(node, "body");
  if (!body) return;
  if (node.type === "struct_item") {
    for (const typeName of typeNames(body)) {
      c.reference(element, "associates", typeName, startLine(body));
    }
  } else if (node.type === "trait_item") {
    for (const member of body.namedChildren) {
      if (member.type === "function_item" || member.type === "function_signature_item") {
        visitFunction(member, c, element, "method");
      }
    }
  }
  const bounds = field(node, "bounds");
  if (bounds) {
    for (const base of typeNames(bounds)) c.reference(element, "inherits", base, startLine(bounds));
  }
}

function visitFunction(node: SyntaxNode, c: ElementCollector, parent: DraftElement, kind: "function" | "method"): void {
  const name = fieldText(node, "name") ?? "anonymous";
  const modifiers = new Set<string>();
  const qualifiers = firstNamedOfType(node, "function_modifiers");
  if (qualifiers) {
    for (const token of qualifiers.children) modifiers.add(token.type);
  }
  const fn = c.add({
    name,
    kind,
    startLine: startLine(node),
    endLine: endLine(node),
    parent,
    visibility: rustVisibility(node),
    modifiers,
    metadata: declarationMetadata(docComment(node), parameterNames(field(node, "parameters"))),
  });
  const body = field(node, "body");
  if (body) collectReferences(body, c, fn);
}

function visitImpl(node: SyntaxNode, c: ElementCollector, parent: DraftElement): void {
  const typeNode = field(node, "type");
  if (!typeNode) return;
  const typeName = stripGenerics(typeNode.text);
  const scope = parent.scope;
  const owner = c.find(`${scope}.${typeName}`, ["struct", "enum"]);

  const trait = field(node, "trait");
  if (trait) {
    c.reference(owner ?? c.module, "implements", stripGenerics(trait.text).replace(/::/g, "."), startLine(trait));
  }

  const body = field(node, "body");
  if (!body) return;
  for (const member of body.namedChildren) {
    if (member.type !== "function_item") continue;
    const name = fieldText(member, "name") ?? "anonymous";
    const qualifiedName = `${scope}.${typeName}.${name}`;
    if (owner) {
      visitFunction(member, c, owner, "method");
      continue;
    }
    const method = c.add({
      name,
      kind: "method",
      qualifiedName,
      startLine: startLine(member),
      endLine: endLine(member),
      parent,
      visibility: rustVisibility(member),
      metadata: {
        ...declarationMetadata(docComment(member), parameterNames(field(member, "parameters"))),
        implFor: typeName,
      },
    });
    const methodBody = field(member, "body");
    if (methodBody) collectReferences(methodBody, c, method);
  }
}

function visitMod(node: SyntaxNode, c: ElementCollector, parent: DraftElement): void {
  const name = fieldText(node, "name");
  if (!name) return;
  const body = field(node, "body");
  if (!body) {
    // `mod store;` pulls in store.rs or store/mod.rs
    const crateRoot = isPackageIndex(c.filePath, c.language) && c.module.qualifiedName.split(".").length <= 1;
    const target = crateRoot ? name : `${c.module.qualifiedName}.${name}`;
    c.reference(c.module, "depends_on", target, startLine(node));
    return;
  }
  const namespace = c.add({
    name,
    kind: "namespace",
    startLine: startLine(node),
    endLine: endLine(node),
    parent,
    visibility: rustVisibility(node),
  });
  visitItems(body, c, namespace);
}

function callTarget(callee: SyntaxNode, c: ElementCollector): string | undefined {
  switch (callee.type) {
    case "identifier":
      return callee.text;
    case "scoped_identifier":
      return normalizeRustPath(stripGenerics(callee.text), c.module.qualifiedName);
    case "field_expression": {
      const member = fieldText(callee, "field");
      const value = field(callee, "value");
      if (!member) return undefined;
      if (value && /^[\w.]+$/.test(value.text)) return stripReceiver(`${value.text}.${member}`);
      return member;
    }
    case "generic_function": {
      const fn = field(callee, "function");
      return fn ? callTarget(fn, c) : undefined;
    }
    default:
      return undefined;
  }
}

function collectReferences(node: SyntaxNode, c: ElementCollector, owner: DraftElement): void {
  const visitNode = (n: SyntaxNode): boolean | void => {
    if (n.type === "call_expression") {
      const callee = field(n, "function");
      const target = callee ? callTarget(callee, c) : undefined;
      if (target && target !== "self") c.reference(owner, "calls", target, startLine(n));
    } else if (n.type === "struct_expression") {
      const name = fieldText(n, "name");
      if (name) c.reference(owner, "uses", stripGenerics(name).replace(/::/g, "."), startLine(n));
    }
  };
  visitNode(node);
  visitDescendants(node, visitNode);
}
