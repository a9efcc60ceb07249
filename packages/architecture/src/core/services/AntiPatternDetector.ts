import type { Element } from "@archlens/extract";
import type { AntiPattern, AntiPatternKind, LayerReport, ServiceBoundary } from "../model.js";
import type { DependencyGraph } from "./DependencyGraph.js";

export interface AntiPatternOptions {
  /** A class or struct with more methods than this is a god object. */
  godObjectMethods: number;
  /** Boundaries with coupling above this are reported. */
  highCoupling: number;
}

const KIND_ORDER: Record<AntiPatternKind, number> = {
  circular_dependency: 0,
  god_object: 1,
  high_coupling: 2,
  layer_violation: 3,
};

export class AntiPatternDetector {
  constructor(private readonly options: AntiPatternOptions) {}

  detect(
    elements: readonly Element[],
    graph: DependencyGraph,
    boundaries: readonly ServiceBoundary[],
    layers: LayerReport
  ): AntiPattern[] {
    const findings: AntiPattern[] = [
      ...this.godObjects(elements),
      ...graph.cycles().map(
        (cycle): AntiPattern => ({
          kind: "circular_dependency",
          severity: "error",
          message: `Dependency cycle through ${cycle.memberIds.length} element(s)`,
          elementIds: cycle.memberIds,
        })
      ),
      ...boundaries
        .filter((b) => b.coupling > this.options.highCoupling)
        .map(
          (b): AntiPattern => ({
            kind: "high_coupling",
            severity: "warning",
            message: `Boundary ${b.name} has coupling ${b.coupling.toFixed(2)} (limit ${this.options.highCoupling})`,
            elementIds: b.memberIds,
            boundaryId: b.id,
          })
        ),
      ...layers.violations.map(
        (v): AntiPattern => ({
          kind: "layer_violation",
          severity: "warning",
          message: `${v.fromLayer} element depends on ${v.toLayer} element`,
          elementIds: [v.sourceId, v.targetId],
        })
      ),
    ];

    return findings.sort(
      (a, b) =>
        KIND_ORDER[a.kind] - KIND_ORDER[b.kind] ||
        compare(a.boundaryId ?? "", b.boundaryId ?? "") ||
        compare(a.elementIds.join("\n"), b.elementIds.join("\n"))
    );
  }

  private godObjects(elements: readonly Element[]): AntiPattern[] {
    const methods = new Map<string, number>();
    for (const element of elements) {
      if (element.kind !== "method" || element.parentId === undefined) continue;
      methods.set(element.parentId, (methods.get(element.parentId) ?? 0) + 1);
    }

    return elements
      .filter((e) => (e.kind === "class" || e.kind === "struct") && (methods.get(e.id) ?? 0) > this.options.godObjectMethods)
      .map((e): AntiPattern => ({
        kind: "god_object",
        severity: "warning",
        message: `${e.qualifiedName} declares ${methods.get(e.id) ?? 0} methods (limit ${this.options.godObjectMethods})`,
        elementIds: [e.id],
      }));
  }
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
