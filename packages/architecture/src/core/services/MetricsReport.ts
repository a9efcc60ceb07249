/**
 * Aggregate metrics over one analysis: graph summary, size, cycles,
 * per-boundary scores, top nodes and threshold checks.
 */

import type { Element, ElementKind } from "@archlens/extract";
import type { MetricThresholds } from "../defaults.js";
import type { BoundaryType, ServiceBoundary } from "../model.js";
import type { CycleGroup, DependencyGraph, GraphSummary } from "./DependencyGraph.js";

export interface BoundaryMetrics {
  readonly id: string;
  readonly name: string;
  readonly type: BoundaryType;
  readonly size: number;
  readonly cohesion: number;
  readonly coupling: number;
  readonly complexity: number;
}

export interface RankedNode {
  readonly id: string;
  readonly value: number;
}

export type ThresholdName = "average_instability" | "average_coupling" | "average_cohesion" | "cycle_count" | "density";

export interface ThresholdCheck {
  readonly name: ThresholdName;
  readonly value: number;
  readonly limit: number;
  /** `max`: warn above the limit; `min`: warn below it */
  readonly direction: "max" | "min";
  readonly severity: "ok" | "warning";
}

export interface SizeMetrics {
  readonly files: number;
  /** Sum of the line spans of every module element */
  readonly linesOfCode: number;
  readonly averageFileLines: number;
  readonly elementsByKind: Readonly<Partial<Record<ElementKind, number>>>;
  /** Share of types, functions and methods that carry a docstring */
  readonly documentation: number;
}

export interface MetricsReport {
  readonly summary: GraphSummary;
  readonly size: SizeMetrics;
  readonly cycles: readonly CycleGroup[];
  readonly boundaries: readonly BoundaryMetrics[];
  readonly topImpact: readonly RankedNode[];
  readonly topInstability: readonly RankedNode[];
  readonly thresholds: readonly ThresholdCheck[];
}

export interface MetricsOptions {
  thresholds: MetricThresholds;
  topN: number;
}

function check(name: ThresholdName, value: number, limit: number, direction: "max" | "min"): ThresholdCheck {
  const breached = direction === "max" ? value > limit : value < limit;
  return { name, value, limit, direction, severity: breached ? "warning" : "ok" };
}

function average(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

function top(ids: readonly string[], value: (id: string) => number, n: number): RankedNode[] {
  return ids
    .map((id) => ({ id, value: value(id) }))
    .sort((a, b) => b.value - a.value || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .slice(0, n);
}

const DOCUMENTABLE_KINDS: ReadonlySet<ElementKind> = new Set([
  "class",
  "interface",
  "struct",
  "enum",
  "function",
  "method",
]);

export function sizeMetrics(elements: readonly Element[]): SizeMetrics {
  const elementsByKind: Partial<Record<ElementKind, number>> = {};
  let files = 0;
  let linesOfCode = 0;
  let documentable = 0;
  let documented = 0;

  for (const element of elements) {
    if (element.metadata["external"] === true) continue;
    elementsByKind[element.kind] = (elementsByKind[element.kind] ?? 0) + 1;
    if (element.kind === "module") {
      files++;
      linesOfCode += element.endLine - element.startLine + 1;
    }
    if (DOCUMENTABLE_KINDS.has(element.kind)) {
      documentable++;
      if (typeof element.metadata["docstring"] === "string") documented++;
    }
  }

  return {
    files,
    linesOfCode,
    averageFileLines: files === 0 ? 0 : linesOfCode / files,
    elementsByKind,
    documentation: documentable === 0 ? 0 : documented / documentable,
  };
}

export function buildMetricsReport(
  graph: DependencyGraph,
  boundaries: readonly ServiceBoundary[],
  options: MetricsOptions
): MetricsReport {
  const summary = graph.summary();
  const internalIds = graph
    .nodes()
    .filter((node) => node.element.metadata["external"] !== true)
    .map((node) => node.id);

  const thresholds: ThresholdCheck[] = [
    check("average_instability", summary.averageInstability, options.thresholds.averageInstability, "max"),
    boundaries.length === 0
      ? { name: "average_coupling", value: 0, limit: options.thresholds.averageCoupling, direction: "max", severity: "ok" }
      : check("average_coupling", average(boundaries.map((b) => b.coupling)), options.thresholds.averageCoupling, "max"),
    boundaries.length === 0
      ? { name: "average_cohesion", value: 0, limit: options.thresholds.averageCohesion, direction: "min", severity: "ok" }
      : check("average_cohesion", average(boundaries.map((b) => b.cohesion)), options.thresholds.averageCohesion, "min"),
    check("cycle_count", summary.cycleCount, options.thresholds.cycleCount, "max"),
    check("density", summary.density, options.thresholds.density, "max"),
  ];

  return {
    summary,
    size: sizeMetrics(graph.nodes().map((node) => node.element)),
    cycles: graph.cycles(),
    boundaries: boundaries.map((b) => ({
      id: b.id,
      name: b.name,
      type: b.type,
      size: b.memberIds.length,
      cohesion: b.cohesion,
      coupling: b.coupling,
      complexity: b.complexity,
    })),
    topImpact: top(internalIds, (id) => graph.impact(id), options.topN),
    topInstability: top(internalIds, (id) => graph.instability(id), options.topN),
    thresholds,
  };
}
