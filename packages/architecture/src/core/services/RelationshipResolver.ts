/**
 * Turns raw reference strings into typed, weighted relationships.
 *
 * Resolution runs only over a complete element set: exact qualified name,
 * then same-module name (unqualified targets only), then last path segment.
 * The first level with a compatible candidate wins.
 */

import { createLogger } from "@archlens/core";
import type { Element, ElementKind, RawReference, ReferenceKind, RelationshipKind } from "@archlens/extract";
import type { Relationship, RelationshipMetadata, ResolutionLevel } from "../model.js";

const log = createLogger("resolver");

export interface ResolutionStrengths {
  exact: number;
  sameModule: number;
  heuristic: number;
}

export interface Resolution {
  /** The element set this resolution was computed over (stubs excluded). */
  readonly elements: readonly Element[];
  /** Sorted by id. */
  readonly relationships: readonly Relationship[];
  /** External stub elements, sorted by id. */
  readonly externals: readonly Element[];
  /** Reference edges per source element, before folding. */
  readonly bySource: ReadonlyMap<string, readonly Relationship[]>;
}

const MODULE_LIKE: readonly ElementKind[] = ["module", "package", "namespace", "class", "interface", "struct", "enum"];
const TYPE_LIKE: readonly ElementKind[] = ["class", "struct", "interface", "enum"];

const COMPATIBLE_KINDS: Readonly<Record<ReferenceKind, ReadonlySet<ElementKind>>> = {
  imports: new Set(MODULE_LIKE),
  depends_on: new Set(MODULE_LIKE),
  inherits: new Set(["class", "interface", "struct"]),
  implements: new Set(["class", "interface", "struct"]),
  calls: new Set(["function", "method", "class", "struct"]),
  uses: new Set([...TYPE_LIKE, "function"]),
  associates: new Set(TYPE_LIKE),
  composes: new Set(TYPE_LIKE),
  aggregates: new Set(TYPE_LIKE),
};

const MODULE_KINDS: ReadonlySet<RelationshipKind> = new Set(["imports", "depends_on"]);
const TYPE_KINDS: ReadonlySet<RelationshipKind> = new Set([
  "inherits",
  "implements",
  "uses",
  "associates",
  "composes",
  "aggregates",
]);

export const EXTERNAL_PREFIX = "external:";

export function relationshipId(sourceId: string, kind: RelationshipKind, targetId: string): string {
  return `rel:${sourceId}|${kind}|${targetId}`;
}

export function lastSegment(target: string): string {
  const segments = target.split(/[.:/]+/).filter((s) => s.length > 0);
  return segments[segments.length - 1] ?? target;
}

function isQualified(target: string): boolean {
  return /[.:/]/.test(target);
}

function byId<T extends { id: string }>(a: T, b: T): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

class SymbolTable {
  private readonly byQualifiedName = new Map<string, Element[]>();
  private readonly byModuleName = new Map<string, Element[]>();
  private readonly byName = new Map<string, Element[]>();

  constructor(elements: readonly Element[]) {
    for (const element of elements) {
      if (element.kind === "import") continue;
      push(this.byQualifiedName, element.qualifiedName, element);
      push(this.byModuleName, `${element.module}\u0000${element.name}`, element);
      push(this.byName, element.name, element);
    }
  }

  exact(target: string): readonly Element[] {
    return this.byQualifiedName.get(target) ?? [];
  }

  sameModule(module: string, name: string): readonly Element[] {
    return this.byModuleName.get(`${module}\u0000${name}`) ?? [];
  }

  named(name: string): readonly Element[] {
    return this.byName.get(name) ?? [];
  }
}

function push<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) list.push(value);
  else map.set(key, [value]);
}

interface Candidate {
  targetId: string;
  strength: number;
  resolution: ResolutionLevel;
  candidateCount: number;
}

export class RelationshipResolver {
  constructor(private readonly strengths: ResolutionStrengths) {}

  resolve(elements: readonly Element[]): Resolution {
    const table = new SymbolTable(elements);
    const bySource = new Map<string, readonly Relationship[]>();
    for (const element of elements) {
      bySource.set(element.id, this.resolveElement(element, table));
    }
    return assemble(elements, bySource);
  }

  /**
   * Re-resolve the elements of the changed files plus every unchanged
   * element whose references could match a symbol that appeared or
   * disappeared. Everything else reuses the previous per-source edges.
   */
  resolveIncremental(
    previous: Resolution,
    elements: readonly Element[],
    changedFiles: ReadonlySet<string>
  ): Resolution {
    const keys = new Set<string>();
    for (const element of [...previous.elements, ...elements]) {
      if (!changedFiles.has(element.filePath)) continue;
      keys.add(element.qualifiedName);
      keys.add(element.name);
    }

    const table = new SymbolTable(elements);
    const bySource = new Map<string, readonly Relationship[]>();
    let reused = 0;
    for (const element of elements) {
      const cached = previous.bySource.get(element.id);
      if (cached && !changedFiles.has(element.filePath) && !mayMatch(element.references, keys)) {
        bySource.set(element.id, cached);
        reused++;
        continue;
      }
      bySource.set(element.id, this.resolveElement(element, table));
    }
    log.debug(`Reused edges of ${reused}/${elements.length} elements`);
    return assemble(elements, bySource);
  }

  private resolveElement(source: Element, table: SymbolTable): Relationship[] {
    const merged = new Map<string, Relationship>();

    for (const reference of source.references) {
      for (const candidate of this.candidates(source, reference, table)) {
        const id = relationshipId(source.id, reference.kind, candidate.targetId);
        const existing = merged.get(id);
        if (!existing) {
          merged.set(id, {
            id,
            sourceId: source.id,
            targetId: candidate.targetId,
            kind: reference.kind,
            strength: candidate.strength,
            bidirectional: false,
            metadata: {
              resolution: candidate.resolution,
              ambiguous: candidate.candidateCount > 1,
              candidateCount: candidate.candidateCount,
              reference: reference.target,
              line: reference.line,
              occurrences: 1,
            },
          });
          continue;
        }
        const stronger = candidate.strength > existing.strength;
        merged.set(id, {
          ...existing,
          strength: stronger ? candidate.strength : existing.strength,
          metadata: {
            ...existing.metadata,
            ...(stronger
              ? {
                  resolution: candidate.resolution,
                  ambiguous: candidate.candidateCount > 1,
                  candidateCount: candidate.candidateCount,
                }
              : {}),
            occurrences: existing.metadata.occurrences + 1,
          },
        });
      }
    }
    return [...merged.values()].sort(byId);
  }

  private candidates(source: Element, reference: RawReference, table: SymbolTable): Candidate[] {
    const compatible = COMPATIBLE_KINDS[reference.kind];
    const accept = (list: readonly Element[]): Element[] => list.filter((e) => compatible.has(e.kind)).sort(byId);

    const levels: Array<[ResolutionLevel, number, () => Element[]]> = [
      ["exact", this.strengths.exact, () => accept(table.exact(reference.target))],
      [
        "same_module",
        this.strengths.sameModule,
        () => (isQualified(reference.target) ? [] : accept(table.sameModule(source.module, reference.target))),
      ],
      ["heuristic", this.strengths.heuristic, () => accept(table.named(lastSegment(reference.target)))],
    ];

    for (const [resolution, confidence, find] of levels) {
      const found = find();
      if (found.length === 0) continue;
      return found.map((target) => ({
        targetId: target.id,
        strength: confidence / found.length,
        resolution,
        candidateCount: found.length,
      }));
    }

    return [
      {
        targetId: `${EXTERNAL_PREFIX}${reference.target}`,
        strength: this.strengths.heuristic,
        resolution: "external",
        candidateCount: 0,
      },
    ];
  }
}

function mayMatch(references: readonly RawReference[], keys: ReadonlySet<string>): boolean {
  return references.some((ref) => keys.has(ref.target) || keys.has(lastSegment(ref.target)));
}

const STRUCTURAL: RelationshipMetadata = {
  resolution: "structural",
  ambiguous: false,
  candidateCount: 1,
  occurrences: 1,
};

/**
 * Add containment edges, fold mutual associations and derive the external
 * stubs. Pure function of its inputs, so full and incremental resolution
 * agree whenever their per-source edges do.
 */
function assemble(elements: readonly Element[], bySource: ReadonlyMap<string, readonly Relationship[]>): Resolution {
  const byRelId = new Map<string, Relationship>();
  for (const edges of bySource.values()) {
    for (const edge of edges) byRelId.set(edge.id, edge);
  }

  for (const element of elements) {
    if (element.parentId === undefined) continue;
    const id = relationshipId(element.parentId, "contains", element.id);
    byRelId.set(id, {
      id,
      sourceId: element.parentId,
      targetId: element.id,
      kind: "contains",
      strength: 1,
      bidirectional: false,
      metadata: STRUCTURAL,
    });
  }

  const relationships: Relationship[] = [];
  for (const edge of byRelId.values()) {
    if (edge.kind !== "associates" || edge.sourceId === edge.targetId) {
      relationships.push(edge);
      continue;
    }
    const mirror = byRelId.get(relationshipId(edge.targetId, "associates", edge.sourceId));
    if (!mirror) {
      relationships.push(edge);
      continue;
    }
    // Keep one folded edge per mutual pair, anchored at the smaller id
    if (edge.sourceId > edge.targetId) continue;
    relationships.push({
      ...edge,
      strength: Math.max(edge.strength, mirror.strength),
      bidirectional: true,
      metadata: {
        ...edge.metadata,
        ambiguous: edge.metadata.ambiguous || mirror.metadata.ambiguous,
        occurrences: edge.metadata.occurrences + mirror.metadata.occurrences,
      },
    });
  }
  relationships.sort(byId);

  return { elements, relationships, externals: externalStubs(relationships), bySource };
}

function externalStubs(relationships: readonly Relationship[]): Element[] {
  const kinds = new Map<string, Set<RelationshipKind>>();
  for (const rel of relationships) {
    if (!rel.targetId.startsWith(EXTERNAL_PREFIX)) continue;
    const set = kinds.get(rel.targetId) ?? new Set<RelationshipKind>();
    set.add(rel.kind);
    kinds.set(rel.targetId, set);
  }

  return [...kinds.entries()]
    .map(([id, referencedAs]): Element => {
      const target = id.slice(EXTERNAL_PREFIX.length);
      const kind: ElementKind = [...referencedAs].some((k) => MODULE_KINDS.has(k))
        ? "module"
        : [...referencedAs].some((k) => TYPE_KINDS.has(k))
          ? "class"
          : "function";
      return {
        id,
        name: lastSegment(target),
        qualifiedName: target,
        kind,
        language: "external",
        filePath: "",
        startLine: 0,
        endLine: 0,
        module: "",
        visibility: "public",
        modifiers: [],
        references: [],
        metadata: { external: true },
      };
    })
    .sort(byId);
}
