/**
 * Canonical element model produced by the language extractors.
 */

export const ELEMENT_KINDS = [
  "module",
  "class",
  "function",
  "method",
  "variable",
  "import",
  "package",
  "interface",
  "enum",
  "struct",
  "namespace",
] as const;

export type ElementKind = (typeof ELEMENT_KINDS)[number];

/** Kinds of raw reference an extractor can record. */
export const REFERENCE_KINDS = [
  "imports",
  "depends_on",
  "inherits",
  "implements",
  "calls",
  "uses",
  "associates",
  "composes",
  "aggregates",
] as const;

export type ReferenceKind = (typeof REFERENCE_KINDS)[number];

/** Reference kinds plus the structural parent/child edge. */
export type RelationshipKind = ReferenceKind | "contains";

export const RELATIONSHIP_KINDS: readonly RelationshipKind[] = [...REFERENCE_KINDS, "contains"];

export type Visibility = "public" | "private" | "protected" | "internal";

/**
 * An unresolved reference string as written in the source
 * (import path, base class name, call target).
 */
export interface RawReference {
  readonly kind: ReferenceKind;
  readonly target: string;
  readonly line: number;
}

export interface Element {
  /** `${filePath}::${kind}:${qualifiedName}`; module elements are `${filePath}::module` */
  readonly id: string;
  readonly name: string;
  readonly qualifiedName: string;
  readonly kind: ElementKind;
  readonly language: string;
  /** Root-relative, `/`-separated */
  readonly filePath: string;
  readonly startLine: number;
  readonly endLine: number;
  /** Enclosing module or package */
  readonly module: string;
  readonly visibility: Visibility;
  /** Sorted */
  readonly modifiers: readonly string[];
  readonly parentId?: string;
  readonly references: readonly RawReference[];
  readonly metadata: Readonly<Record<string, unknown>>;
}

/** An ERROR or MISSING node left by parser recovery. */
export interface SyntaxIssue {
  readonly line: number;
  readonly column: number;
  readonly message: string;
}

export interface FileExtraction {
  readonly filePath: string;
  readonly language: string;
  /** sha256 of the file content */
  readonly contentHash: string;
  readonly elements: readonly Element[];
  readonly syntaxIssues: readonly SyntaxIssue[];
}
