import type { Element, ElementKind, RawReference } from "@archlens/extract";
import { DependencyGraph } from "../src/core/services/DependencyGraph.js";
import { buildMetricsReport } from "../src/core/services/MetricsReport.js";
import { DEFAULT_METRIC_THRESHOLDS } from "../src/core/defaults.js";
import type { AnalysisResult, Relationship } from "../src/core/model.js";

export interface ElementSpec {
  kind?: ElementKind;
  filePath?: string;
  module?: string;
  name?: string;
  qualifiedName?: string;
  startLine?: number;
  parentId?: string;
  modifiers?: string[];
  references?: RawReference[];
}

/**
 * Hand-built element. The id follows the extractor's form when no
 * explicit qualified name is given: `${filePath}::${kind}:${module}.${name}`.
 */
export function makeElement(name: string, spec: ElementSpec = {}): Element {
  const kind = spec.kind ?? "function";
  const module = spec.module ?? "app";
  const filePath = spec.filePath ?? `${module.replace(/\./g, "/")}.ts`;
  const qualifiedName = spec.qualifiedName ?? `${module}.${name}`;
  return {
    id: `${filePath}::${kind}:${qualifiedName}`,
    name: spec.name ?? name,
    qualifiedName,
    kind,
    language: "typescript",
    filePath,
    startLine: spec.startLine ?? 1,
    endLine: (spec.startLine ?? 1) + 1,
    module,
    visibility: "public",
    modifiers: spec.modifiers ?? [],
    ...(spec.parentId !== undefined ? { parentId: spec.parentId } : {}),
    references: spec.references ?? [],
    metadata: {},
  };
}

/** Plain element keyed by a short id, for graph-level tests. */
export function node(id: string, spec: Partial<Element> = {}): Element {
  return {
    id,
    name: id,
    qualifiedName: id,
    kind: "function",
    language: "typescript",
    filePath: `${id}.ts`,
    startLine: 1,
    endLine: 1,
    module: id,
    visibility: "public",
    modifiers: [],
    references: [],
    metadata: {},
    ...spec,
  };
}

export function edge(
  sourceId: string,
  targetId: string,
  kind: Relationship["kind"] = "calls",
  strength = 1,
  bidirectional = false
): Relationship {
  return {
    id: `rel:${sourceId}|${kind}|${targetId}`,
    sourceId,
    targetId,
    kind,
    strength,
    bidirectional,
    metadata: { resolution: "exact", ambiguous: false, candidateCount: 1, occurrences: 1 },
  };
}

export const ALL_BUT_CONTAINS: Relationship["kind"][] = [
  "imports",
  "depends_on",
  "inherits",
  "implements",
  "calls",
  "uses",
  "associates",
  "composes",
  "aggregates",
];

export function buildGraph(
  elements: readonly Element[],
  relationships: readonly Relationship[],
  previous?: DependencyGraph
): DependencyGraph {
  return DependencyGraph.build(elements, relationships, {
    dependencyKinds: ALL_BUT_CONTAINS,
    complexity: { edges: 1, fanOut: 2, cycleMembers: 3 },
    ...(previous ? { previous } : {}),
  }).graph;
}

/** Minimal published result over the given elements and relationships. */
export function makeResult(
  version: number,
  patch: Partial<Omit<AnalysisResult, "graph" | "metrics">> = {}
): AnalysisResult {
  const elements = patch.elements ?? [];
  const relationships = patch.relationships ?? [];
  const graph = buildGraph(elements, relationships);
  return {
    version,
    rootPath: "/repo",
    mode: "full",
    createdAt: "2026-01-01T00:00:00.000Z",
    boundaries: [],
    unassigned: [],
    layers: { layers: [], violations: [] },
    antiPatterns: [],
    languageCounts: {},
    diagnostics: [],
    ...patch,
    elements,
    relationships,
    metrics: buildMetricsReport(graph, patch.boundaries ?? [], { thresholds: DEFAULT_METRIC_THRESHOLDS, topN: 10 }),
    graph,
  };
}
