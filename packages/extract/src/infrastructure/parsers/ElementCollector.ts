/**
 * Accumulates the elements of one file while a walker visits its tree.
 * Elements stay mutable here and are frozen by finish().
 */
import type {
  Element,
  ElementKind,
  RawReference,
  ReferenceKind,
  Visibility,
} from "../../core/model.js";

/** Handle a walker holds on an element it has added. */
export interface DraftElement {
  readonly id: string;
  readonly name: string;
  readonly qualifiedName: string;
  readonly kind: ElementKind;
  /** Prefix for the qualified names of children. */
  readonly scope: string;
}

interface MutableElement extends DraftElement {
  scope: string;
  startLine: number;
  endLine: number;
  module: string;
  visibility: Visibility;
  modifiers: Set<string>;
  parentId: string | undefined;
  references: RawReference[];
  metadata: Record<string, unknown>;
}

export interface AddElementOptions {
  name: string;
  kind: ElementKind;
  startLine: number;
  endLine: number;
  parent?: DraftElement;
  visibility?: Visibility;
  modifiers?: Iterable<string>;
  /** Overrides `${parent.scope}.${name}`. */
  qualifiedName?: string;
  metadata?: Record<string, unknown>;
}

const UNQUALIFIED_KINDS: ReadonlySet<ReferenceKind> = new Set(["imports", "depends_on"]);

export class ElementCollector {
  readonly module: DraftElement;

  private readonly elements: MutableElement[] = [];
  private readonly byId = new Map<string, MutableElement>();
  private readonly bindings = new Map<string, string>();
  private namespace: string;

  constructor(
    readonly filePath: string,
    readonly language: string,
    moduleName: string,
    lineCount: number
  ) {
    this.namespace = moduleName;
    const stem = moduleName.split(".").pop() ?? moduleName;
    const moduleElement: MutableElement = {
      id: `${filePath}::module`,
      name: stem,
      qualifiedName: moduleName,
      kind: "module",
      scope: moduleName,
      startLine: 1,
      endLine: Math.max(1, lineCount),
      module: moduleName,
      visibility: "public",
      modifiers: new Set(),
      parentId: undefined,
      references: [],
      metadata: {},
    };
    this.push(moduleElement);
    this.module = moduleElement;
  }

  /**
   * Go and Java declarations live in their package rather than the file's
   * path-derived module. Call before adding any declaration.
   */
  enterPackage(name: string, line: number): DraftElement {
    this.namespace = name;
    const moduleElement = this.mutable(this.module);
    moduleElement.module = name;
    moduleElement.scope = name;
    return this.add({
      name: name.split(".").pop() ?? name,
      qualifiedName: name,
      kind: "package",
      startLine: line,
      endLine: line,
      parent: this.module,
    });
  }

  get currentNamespace(): string {
    return this.namespace;
  }

  add(options: AddElementOptions): DraftElement {
    const parent = options.parent ?? this.module;
    const qualifiedName = options.qualifiedName ?? `${parent.scope}.${options.name}`;
    const element: MutableElement = {
      id: this.uniqueId(`${this.filePath}::${options.kind}:${qualifiedName}`),
      name: options.name,
      qualifiedName,
      kind: options.kind,
      scope: qualifiedName,
      startLine: options.startLine,
      endLine: Math.max(options.startLine, options.endLine),
      module: this.namespace,
      visibility: options.visibility ?? "public",
      modifiers: new Set(options.modifiers ?? []),
      parentId: parent.id,
      references: [],
      metadata: { ...options.metadata },
    };
    this.push(element);
    return element;
  }

  reference(from: DraftElement, kind: ReferenceKind, target: string, line: number): void {
    const trimmed = target.trim();
    if (trimmed.length === 0) return;
    this.mutable(from).references.push({ kind, target: trimmed, line });
  }

  addModifier(element: DraftElement, modifier: string): void {
    this.mutable(element).modifiers.add(modifier);
  }

  /**
   * Record an import binding: local `User` stands for `app.models.User`.
   */
  bind(localName: string, qualifiedName: string): void {
    if (localName && qualifiedName && localName !== qualifiedName) {
      this.bindings.set(localName, qualifiedName);
    }
  }

  find(qualifiedName: string, kinds: readonly ElementKind[]): DraftElement | undefined {
    return this.elements.find((e) => e.qualifiedName === qualifiedName && kinds.includes(e.kind));
  }

  /**
   * Freeze the collected elements in document order, rewriting reference
   * targets whose first segment is an import binding.
   */
  finish(): Element[] {
    return this.elements.map((e) => {
      const element: Element = {
        id: e.id,
        name: e.name,
        qualifiedName: e.qualifiedName,
        kind: e.kind,
        language: this.language,
        filePath: this.filePath,
        startLine: e.startLine,
        endLine: e.endLine,
        module: e.module,
        visibility: e.visibility,
        modifiers: [...e.modifiers].sort(),
        ...(e.parentId !== undefined ? { parentId: e.parentId } : {}),
        references: e.references.map((ref) => this.applyBindings(ref)),
        metadata: e.metadata,
      };
      return element;
    });
  }

  private applyBindings(ref: RawReference): RawReference {
    if (UNQUALIFIED_KINDS.has(ref.kind)) return ref;
    const dot = ref.target.indexOf(".");
    const head = dot === -1 ? ref.target : ref.target.slice(0, dot);
    const bound = this.bindings.get(head);
    if (bound === undefined) return ref;
    return { ...ref, target: dot === -1 ? bound : `${bound}${ref.target.slice(dot)}` };
  }

  private uniqueId(base: string): string {
    if (!this.byId.has(base)) return base;
    let n = 2;
    while (this.byId.has(`${base}~${n}`)) n++;
    return `${base}~${n}`;
  }

  private push(element: MutableElement): void {
    this.elements.push(element);
    this.byId.set(element.id, element);
  }

  private mutable(handle: DraftElement): MutableElement {
    const element = this.byId.get(handle.id);
    if (!element) {
      throw new Error(`Unknown element ${handle.id} in ${this.filePath}`);
    }
    return element;
  }
}
