/**
 * Service boundary detection: structural clustering, size enforcement,
 * type classification and cohesion/coupling scoring.
 */

import { createHash } from "node:crypto";
import { createLogger } from "@archlens/core";
import type { Element } from "@archlens/extract";
import { BOUNDARY_TYPES, type BoundaryType, type Relationship, type ServiceBoundary, isExternal } from "../model.js";
import type { DependencyGraph } from "./DependencyGraph.js";
import type { PatternClassifier } from "./PatternClassifier.js";
import { addUndirected, partitionOrdered, propagateLabels } from "./clustering.js";

const log = createLogger("boundaries");

export interface BoundaryDetectorOptions {
  minSize: number;
  maxSize: number;
  maxIterations: number;
}

export interface BoundaryDetection {
  /** Sorted by id */
  readonly boundaries: readonly ServiceBoundary[];
  /** Sorted */
  readonly unassigned: readonly string[];
  /** Final clusters before scoring, each sorted by id */
  readonly clusters: readonly (readonly string[])[];
  /** Hash of the clustering input; equal keys give equal clusters. */
  readonly structuralKey: string;
}

export interface DetectReuse {
  previous: BoundaryDetection;
  previousGraph: DependencyGraph;
  /** Ids of elements from re-extracted files, old and new. */
  changedElementIds: ReadonlySet<string>;
}

export interface BoundaryScores {
  cohesion: number;
  coupling: number;
  complexity: number;
  externalDependencyIds: string[];
}

const STRUCTURAL_KINDS = new Set(["contains", "depends_on"]);

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function sha12(value: string): string {
  return createHash("sha1").update(value).digest("hex").slice(0, 12);
}

export function boundaryId(memberIds: readonly string[]): string {
  return `boundary-${sha12([...memberIds].sort().join("\n"))}`;
}

/**
 * Cohesion and coupling over dependency edges.
 * cohesion: distinct ordered internal pairs / n(n-1), 1 below two members.
 * coupling: crossing edges / edges touching the set, 0 when none touch it.
 */
export function scoreMembers(graph: DependencyGraph, memberIds: readonly string[]): BoundaryScores {
  const members = new Set(memberIds);
  const n = members.size;
  let internalPairs = 0;
  let touching = 0;
  let crossing = 0;
  const external = new Set<string>();

  for (const id of members) {
    for (const target of graph.dependenciesOf(id)) {
      if (members.has(target)) internalPairs++;
    }
    for (const edge of graph.outgoing(id)) {
      if (!edge.dependency) continue;
      touching++;
      const targetId = graph.nodeAt(edge.target)?.id;
      if (targetId !== undefined && !members.has(targetId)) {
        crossing++;
        external.add(targetId);
      }
    }
    for (const edge of graph.incoming(id)) {
      if (!edge.dependency) continue;
      const sourceId = graph.nodeAt(edge.source)?.id;
      if (sourceId === undefined || members.has(sourceId)) continue;
      touching++;
      crossing++;
    }
  }

  return {
    cohesion: n < 2 ? 1 : clamp01(internalPairs / (n * (n - 1))),
    coupling: touching === 0 ? 0 : clamp01(crossing / touching),
    complexity: graph.subgraphComplexity(members),
    externalDependencyIds: [...external].sort(),
  };
}

function compareOrder(a: Element, b: Element): number {
  if (a.filePath !== b.filePath) return a.filePath < b.filePath ? -1 : 1;
  if (a.startLine !== b.startLine) return a.startLine - b.startLine;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class BoundaryDetector {
  constructor(
    private readonly classifier: PatternClassifier,
    private readonly options: BoundaryDetectorOptions
  ) {}

  detect(
    elements: readonly Element[],
    relationships: readonly Relationship[],
    graph: DependencyGraph,
    reuse?: DetectReuse
  ): BoundaryDetection {
    const candidates = elements.filter((e) => !isExternal(e));
    const byId = new Map(candidates.map((e) => [e.id, e]));
    const structural = relationships.filter(
      (r) => STRUCTURAL_KINDS.has(r.kind) && r.sourceId !== r.targetId && byId.has(r.sourceId) && byId.has(r.targetId)
    );
    const structuralKey = this.structuralKey(candidates, structural);

    let clusters: readonly (readonly string[])[];
    let unassigned: readonly string[];
    if (reuse && reuse.previous.structuralKey === structuralKey) {
      clusters = reuse.previous.clusters;
      unassigned = reuse.previous.unassigned;
      log.debug(`Reused ${clusters.length} clusters`);
    } else {
      ({ clusters, unassigned } = this.cluster(candidates, structural, byId));
    }

    const previousById = new Map((reuse?.previous.boundaries ?? []).map((b) => [b.id, b]));
    let reusedScores = 0;
    const drafts = clusters.map((memberIds) => {
      const id = boundaryId(memberIds);
      const members = memberIds.flatMap((m) => {
        const element = byId.get(m);
        return element ? [element] : [];
      });
      const earlier = previousById.get(id);
      let scores: BoundaryScores;
      if (earlier && reuse && this.scoresStillValid(memberIds, graph, reuse)) {
        scores = {
          cohesion: earlier.cohesion,
          coupling: earlier.coupling,
          complexity: earlier.complexity,
          externalDependencyIds: [...earlier.externalDependencyIds],
        };
        reusedScores++;
      } else {
        scores = scoreMembers(graph, memberIds);
      }
      return { id, memberIds, type: this.vote(members), name: dominantModule(members), scores };
    });
    if (reuse) log.debug(`Reused scores of ${reusedScores}/${drafts.length} boundaries`);

    drafts.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    const seen = new Map<string, number>();
    const boundaries = drafts.map((draft): ServiceBoundary => {
      const count = (seen.get(draft.name) ?? 0) + 1;
      seen.set(draft.name, count);
      return {
        id: draft.id,
        name: count === 1 ? draft.name : `${draft.name}#${count}`,
        type: draft.type,
        memberIds: draft.memberIds,
        externalDependencyIds: draft.scores.externalDependencyIds,
        cohesion: draft.scores.cohesion,
        coupling: draft.scores.coupling,
        complexity: draft.scores.complexity,
      };
    });

    return { boundaries, unassigned, clusters, structuralKey };
  }

  private scoresStillValid(memberIds: readonly string[], graph: DependencyGraph, reuse: DetectReuse): boolean {
    return memberIds.every(
      (id) =>
        !graph.changed.has(id) &&
        !reuse.changedElementIds.has(id) &&
        graph.isInCycle(id) === reuse.previousGraph.isInCycle(id)
    );
  }

  private structuralKey(candidates: readonly Element[], structural: readonly Relationship[]): string {
    const hash = createHash("sha1");
    for (const e of [...candidates].sort(compareOrder)) hash.update(`${e.id}\u0000${e.filePath}\u0000${e.startLine}\n`);
    hash.update("\u0001");
    for (const r of structural) hash.update(`${r.id}\u0000${r.strength}\n`);
    return hash.digest("hex");
  }

  // --- Clustering ---

  private cluster(
    candidates: readonly Element[],
    structural: readonly Relationship[],
    byId: ReadonlyMap<string, Element>
  ): { clusters: string[][]; unassigned: string[] } {
    const { minSize, maxSize, maxIterations } = this.options;
    const adjacency = new Map<string, Map<string, number>>();
    for (const r of structural) addUndirected(adjacency, r.sourceId, r.targetId, r.strength);

    const labels = propagateLabels(
      candidates.map((e) => e.id),
      adjacency,
      maxIterations
    );

    const groups = new Map<string, Element[]>();
    for (const element of candidates) {
      const label = labels.get(element.id) ?? element.id;
      const group = groups.get(label) ?? [];
      group.push(element);
      groups.set(label, group);
    }

    const live = new Map<number, Element[]>();
    const clusterOf = new Map<string, number>();
    const pool: Element[] = [];
    let next = 0;
    const open = (members: Element[]): number => {
      const index = next++;
      live.set(index, members);
      for (const m of members) clusterOf.set(m.id, index);
      return index;
    };

    const small: number[] = [];
    for (const group of groups.values()) {
      const ordered = [...group].sort(compareOrder);
      if (ordered.length > maxSize) {
        const { chunks, rest } = partitionOrdered(ordered, minSize, maxSize);
        chunks.forEach((chunk) => open(chunk));
        pool.push(...rest);
      } else if (ordered.length < minSize) {
        small.push(open(ordered));
      } else {
        open(ordered);
      }
    }

    const firstKey = (index: number): Element | undefined => live.get(index)?.[0];
    small.sort((a, b) => {
      const ea = firstKey(a);
      const eb = firstKey(b);
      return ea && eb ? compareOrder(ea, eb) : 0;
    });

    for (const index of small) {
      const members = live.get(index);
      if (!members || members.length >= minSize) continue;

      const weights = new Map<number, number>();
      for (const m of members) {
        for (const [neighbour, weight] of adjacency.get(m.id) ?? []) {
          const target = clusterOf.get(neighbour);
          if (target === undefined || target === index) continue;
          weights.set(target, (weights.get(target) ?? 0) + weight);
        }
      }

      let best: number | undefined;
      let bestWeight = 0;
      for (const [target, weight] of weights) {
        if (weight <= 0) continue;
        const better =
          weight > bestWeight ||
          (weight === bestWeight && best !== undefined && this.keyBefore(firstKey(target), firstKey(best)));
        if (better) {
          best = target;
          bestWeight = weight;
        }
      }

      const into = best === undefined ? undefined : live.get(best);
      live.delete(index);
      if (best !== undefined && into && into.length + members.length <= maxSize) {
        const merged = [...into, ...members].sort(compareOrder);
        live.set(best, merged);
        for (const m of members) clusterOf.set(m.id, best);
      } else {
        for (const m of members) clusterOf.delete(m.id);
        pool.push(...members);
      }
    }

    const clusters: string[][] = [];
    for (const [index, members] of live) {
      if (members.length < minSize) {
        live.delete(index);
        pool.push(...members);
        continue;
      }
      clusters.push(members.map((m) => m.id).sort());
    }

    const { chunks, rest } = partitionOrdered([...pool].sort(compareOrder), minSize, maxSize);
    for (const chunk of chunks) clusters.push(chunk.map((m) => m.id).sort());

    log.debug(`${clusters.length} clusters, ${rest.length} unassigned of ${byId.size} elements`);
    return {
      clusters: clusters
        .map((ids) => ({ key: boundaryId(ids), ids }))
        .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0))
        .map(({ ids }) => ids),
      unassigned: rest.map((m) => m.id).sort(),
    };
  }

  private keyBefore(a: Element | undefined, b: Element | undefined): boolean {
    return a !== undefined && b !== undefined && compareOrder(a, b) < 0;
  }

  // --- Naming ---

  private vote(members: readonly Element[]): BoundaryType {
    const counts = new Map<BoundaryType, number>();
    for (const member of members) {
      if (member.kind === "import") continue;
      const type = this.classifier.classify(member);
      counts.set(type, (counts.get(type) ?? 0) + 1);
    }
    let winner: BoundaryType = "utility";
    let best = 0;
    // Priority order; strict > keeps the earlier type on ties
    for (const type of BOUNDARY_TYPES) {
      const count = counts.get(type) ?? 0;
      if (count > best) {
        winner = type;
        best = count;
      }
    }
    return winner;
  }
}

function dominantModule(members: readonly Element[]): string {
  const counts = new Map<string, number>();
  for (const m of members) counts.set(m.module, (counts.get(m.module) ?? 0) + 1);
  let name = "";
  let best = 0;
  for (const [module, count] of counts) {
    if (count > best || (count === best && module < name)) {
      name = module;
      best = count;
    }
  }
  return name || "root";
}
