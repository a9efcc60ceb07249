/**
 * Resolved architecture model: relationships, boundaries, layers and the
 * versioned analysis result built from them.
 */

import type { Diagnostic } from "@archlens/core";
import type { Element, RelationshipKind } from "@archlens/extract";
import type { DependencyGraph } from "./services/DependencyGraph.js";
import type { MetricsReport } from "./services/MetricsReport.js";

export type ResolutionLevel = "exact" | "same_module" | "heuristic" | "external" | "structural";

export interface RelationshipMetadata {
  readonly resolution: ResolutionLevel;
  /** More than one candidate matched at the winning level. */
  readonly ambiguous: boolean;
  readonly candidateCount: number;
  /** Raw reference text the edge was resolved from. */
  readonly reference?: string;
  /** First source line the reference appears on. */
  readonly line?: number;
  /** Number of raw references folded into this edge. */
  readonly occurrences: number;
}

export interface Relationship {
  /** `rel:${sourceId}|${kind}|${targetId}` */
  readonly id: string;
  readonly sourceId: string;
  readonly targetId: string;
  readonly kind: RelationshipKind;
  /** In [0, 1] */
  readonly strength: number;
  readonly bidirectional: boolean;
  readonly metadata: RelationshipMetadata;
}

/** Priority order for breaking classification ties. */
export const BOUNDARY_TYPES = ["api", "data", "business", "infrastructure", "utility"] as const;

export type BoundaryType = (typeof BOUNDARY_TYPES)[number];

export interface ServiceBoundary {
  /** `boundary-` + first 12 hex chars of sha1(sorted member ids) */
  readonly id: string;
  readonly name: string;
  readonly type: BoundaryType;
  /** Sorted */
  readonly memberIds: readonly string[];
  /** Sorted targets of member dependency edges outside the boundary */
  readonly externalDependencyIds: readonly string[];
  readonly cohesion: number;
  readonly coupling: number;
  readonly complexity: number;
}

export const LAYER_NAMES = ["presentation", "application", "domain", "infrastructure"] as const;

export type LayerName = (typeof LAYER_NAMES)[number];

export const LAYER_LEVEL: Readonly<Record<LayerName, number>> = {
  presentation: 3,
  application: 2,
  domain: 1,
  infrastructure: 0,
};

export interface Layer {
  readonly name: LayerName;
  readonly level: number;
  readonly memberIds: readonly string[];
  readonly dependsOn: readonly LayerName[];
}

/** A dependency from a lower layer into a higher one. */
export interface LayerViolation {
  readonly sourceId: string;
  readonly targetId: string;
  readonly fromLayer: LayerName;
  readonly toLayer: LayerName;
}

export interface LayerReport {
  /** Highest level first; empty layers are omitted. */
  readonly layers: readonly Layer[];
  readonly violations: readonly LayerViolation[];
}

export type AntiPatternKind = "god_object" | "circular_dependency" | "high_coupling" | "layer_violation";

export interface AntiPattern {
  readonly kind: AntiPatternKind;
  readonly severity: "warning" | "error";
  readonly message: string;
  readonly elementIds: readonly string[];
  readonly boundaryId?: string;
}

export type AnalysisMode = "full" | "incremental" | "labels";

export interface LanguageCount {
  readonly files: number;
  readonly elements: number;
}

export interface ElementLabel {
  readonly label: string;
  readonly category?: string;
  readonly confidence: number;
  readonly description?: string;
}

/**
 * Immutable output of one run. The next run supersedes it.
 */
export interface AnalysisResult {
  /** Increases by one per publication on a handle. */
  readonly version: number;
  readonly rootPath: string;
  readonly mode: AnalysisMode;
  /** ISO timestamp */
  readonly createdAt: string;
  /** Sorted by id; includes external stubs */
  readonly elements: readonly Element[];
  /** Sorted by id */
  readonly relationships: readonly Relationship[];
  /** Sorted by id */
  readonly boundaries: readonly ServiceBoundary[];
  /** Element ids no legal boundary could take, sorted */
  readonly unassigned: readonly string[];
  readonly layers: LayerReport;
  readonly antiPatterns: readonly AntiPattern[];
  /** Per language, external stubs excluded */
  readonly languageCounts: Readonly<Record<string, LanguageCount>>;
  readonly metrics: MetricsReport;
  /** Sorted with sortDiagnostics */
  readonly diagnostics: readonly Diagnostic[];
  readonly graph: DependencyGraph;
}

export function isExternal(element: Element): boolean {
  return element.metadata["external"] === true;
}
