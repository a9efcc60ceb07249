/**
 * Read-only dependency graph over an element arena.
 * Nodes are id-sorted and addressed by index; adjacency lists hold edge indices.
 */

import { createHash } from "node:crypto";
import { type Diagnostic, GraphIntegrityViolation, diagnosticFromError } from "@archlens/core";
import type { Element, RelationshipKind } from "@archlens/extract";
import type { Relationship } from "../model.js";

export interface GraphNode {
  readonly index: number;
  readonly id: string;
  readonly element: Element;
}

export interface GraphEdge {
  readonly index: number;
  /** Relationship id, with `:reverse` appended for the mirror of a bidirectional edge */
  readonly id: string;
  readonly relationshipId: string;
  readonly source: number;
  readonly target: number;
  readonly kind: RelationshipKind;
  readonly strength: number;
  readonly dependency: boolean;
}

export interface NodeMetrics {
  readonly afferent: number;
  readonly efferent: number;
  readonly instability: number;
  readonly impact: number;
}

export interface CycleGroup {
  /** `cycle-` + first 12 hex chars of sha1(sorted member ids) */
  readonly id: string;
  /** Sorted */
  readonly memberIds: readonly string[];
}

export interface GraphSummary {
  readonly nodeCount: number;
  readonly edgeCount: number;
  readonly dependencyEdgeCount: number;
  readonly density: number;
  readonly cycleCount: number;
  readonly averageAfferent: number;
  readonly averageEfferent: number;
  readonly averageInstability: number;
  /** Longest path, in hops, through the condensation DAG */
  readonly maxDepth: number;
}

export interface ComplexityWeights {
  edges: number;
  fanOut: number;
  cycleMembers: number;
}

export interface GraphBuildOptions {
  dependencyKinds: readonly RelationshipKind[];
  complexity: ComplexityWeights;
  /** Graph of the previous run; enables reach-count reuse. */
  previous?: DependencyGraph;
  /** Element ids known to have changed since `previous`. */
  touched?: ReadonlySet<string>;
}

export interface GraphBuild {
  graph: DependencyGraph;
  diagnostics: Diagnostic[];
}

function sha12(ids: readonly string[]): string {
  return createHash("sha1").update(ids.join("\n")).digest("hex").slice(0, 12);
}

export class DependencyGraph {
  private readonly nodeList: GraphNode[];
  private readonly indexById = new Map<string, number>();
  private readonly edgeList: GraphEdge[] = [];
  private readonly out: number[][];
  private readonly in: number[][];

  // Distinct dependency neighbours per node, self excluded
  private readonly dependsOn: number[][];
  private readonly dependedOnBy: number[][];
  private readonly selfLoop: boolean[];

  private readonly reach: Array<number | undefined>;
  private readonly complexityWeights: ComplexityWeights;

  private components: number[][] | undefined;
  private componentOf: number[] | undefined;
  private cycleGroups: CycleGroup[] | undefined;

  private changedIds: ReadonlySet<string> = new Set();

  private constructor(elements: readonly Element[], complexity: ComplexityWeights) {
    this.complexityWeights = complexity;
    const sorted = [...elements].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    this.nodeList = sorted.map((element, index) => ({ index, id: element.id, element }));
    this.nodeList.forEach((node) => this.indexById.set(node.id, node.index));
    const n = this.nodeList.length;
    this.out = Array.from({ length: n }, () => []);
    this.in = Array.from({ length: n }, () => []);
    this.dependsOn = Array.from({ length: n }, () => []);
    this.dependedOnBy = Array.from({ length: n }, () => []);
    this.selfLoop = new Array<boolean>(n).fill(false);
    this.reach = new Array<number | undefined>(n).fill(undefined);
  }

  static build(
    elements: readonly Element[],
    relationships: readonly Relationship[],
    options: GraphBuildOptions
  ): GraphBuild {
    const graph = new DependencyGraph(elements, options.complexity);
    const dependencyKinds = new Set(options.dependencyKinds);
    const diagnostics: Diagnostic[] = [];

    for (const rel of relationships) {
      const source = graph.indexById.get(rel.sourceId);
      const target = graph.indexById.get(rel.targetId);
      if (source === undefined || target === undefined) {
        const missing = source === undefined ? rel.sourceId : rel.targetId;
        diagnostics.push(diagnosticFromError(new GraphIntegrityViolation(rel.id, missing)));
        continue;
      }
      const dependency = dependencyKinds.has(rel.kind);
      graph.addEdge(rel.id, rel.id, source, target, rel.kind, rel.strength, dependency);
      if (rel.bidirectional) {
        graph.addEdge(`${rel.id}:reverse`, rel.id, target, source, rel.kind, rel.strength, dependency);
      }
    }
    graph.indexDependencies();

    if (options.previous) {
      const changed = graph.diffAgainst(options.previous);
      for (const id of options.touched ?? []) changed.add(id);
      graph.seedReach(options.previous, changed);
      graph.changedIds = changed;
    }

    return { graph, diagnostics };
  }

  // --- Construction ---

  private addEdge(
    id: string,
    relationshipId: string,
    source: number,
    target: number,
    kind: RelationshipKind,
    strength: number,
    dependency: boolean
  ): void {
    const index = this.edgeList.length;
    this.edgeList.push({ index, id, relationshipId, source, target, kind, strength, dependency });
    this.out[source]?.push(index);
    this.in[target]?.push(index);
  }

  private indexDependencies(): void {
    for (let i = 0; i < this.nodeList.length; i++) {
      const targets = new Set<number>();
      for (const e of this.out[i] ?? []) {
        const edge = this.edgeList[e];
        if (!edge?.dependency) continue;
        if (edge.target === i) this.selfLoop[i] = true;
        else targets.add(edge.target);
      }
      this.dependsOn[i] = [...targets].sort((a, b) => a - b);
      for (const t of targets) this.dependedOnBy[t]?.push(i);
    }
  }

  /** Sorted ids of the dependency edges leaving and entering a node. */
  private signature(index: number): string {
    const ids = (list: readonly number[]): string =>
      list
        .flatMap((e) => {
          const edge = this.edgeList[e];
          return edge?.dependency ? [edge.id] : [];
        })
        .sort()
        .join("\n");
    return `${ids(this.out[index] ?? [])}\u0000${ids(this.in[index] ?? [])}`;
  }

  private diffAgainst(previous: DependencyGraph): Set<string> {
    const changed = new Set<string>();
    for (const node of this.nodeList) {
      const old = previous.indexById.get(node.id);
      if (old === undefined || previous.signature(old) !== this.signature(node.index)) changed.add(node.id);
    }
    for (const node of previous.nodeList) {
      if (!this.indexById.has(node.id)) changed.add(node.id);
    }
    return changed;
  }

  /**
   * Copy reach counts for nodes that reach no changed node in either graph;
   * their reachable sets are the same in both.
   */
  private seedReach(previous: DependencyGraph, changed: ReadonlySet<string>): void {
    const affected = new Set<string>([...this.ancestorsOf(changed), ...previous.ancestorsOf(changed)]);
    for (const node of this.nodeList) {
      if (affected.has(node.id)) continue;
      const old = previous.indexById.get(node.id);
      if (old === undefined) continue;
      this.reach[node.index] = previous.reach[old];
    }
  }

  private ancestorsOf(ids: ReadonlySet<string>): Set<string> {
    const seen = new Set<number>();
    const stack: number[] = [];
    for (const id of ids) {
      const index = this.indexById.get(id);
      if (index !== undefined && !seen.has(index)) {
        seen.add(index);
        stack.push(index);
      }
    }
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      for (const source of this.dependedOnBy[current] ?? []) {
        if (seen.has(source)) continue;
        seen.add(source);
        stack.push(source);
      }
    }
    return new Set([...seen].map((i) => this.nodeList[i]?.id ?? ""));
  }

  // --- Node and Edge Access ---

  /** Ids whose dependency edges differ from the previous graph, plus added and removed ids. */
  get changed(): ReadonlySet<string> {
    return this.changedIds;
  }

  get nodeCount(): number {
    return this.nodeList.length;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  nodes(): readonly GraphNode[] {
    return this.nodeList;
  }

  edges(): readonly GraphEdge[] {
    return this.edgeList;
  }

  has(id: string): boolean {
    return this.indexById.has(id);
  }

  node(id: string): GraphNode | undefined {
    const index = this.indexById.get(id);
    return index === undefined ? undefined : this.nodeList[index];
  }

  nodeAt(index: number): GraphNode | undefined {
    return this.nodeList[index];
  }

  outgoing(id: string): GraphEdge[] {
    return this.edgesAt(this.out, id);
  }

  incoming(id: string): GraphEdge[] {
    return this.edgesAt(this.in, id);
  }

  private edgesAt(adjacency: number[][], id: string): GraphEdge[] {
    const index = this.indexById.get(id);
    if (index === undefined) return [];
    return (adjacency[index] ?? []).flatMap((e) => {
      const edge = this.edgeList[e];
      return edge ? [edge] : [];
    });
  }

  /** Distinct dependency targets, self excluded, sorted. */
  dependenciesOf(id: string): string[] {
    const index = this.indexById.get(id);
    if (index === undefined) return [];
    return (this.dependsOn[index] ?? []).map((i) => this.nodeList[i]?.id ?? "");
  }

  // --- Metrics ---

  afferent(id: string): number {
    const index = this.indexById.get(id);
    return index === undefined ? 0 : (this.dependedOnBy[index]?.length ?? 0);
  }

  efferent(id: string): number {
    const index = this.indexById.get(id);
    return index === undefined ? 0 : (this.dependsOn[index]?.length ?? 0);
  }

  instability(id: string): number {
    const ca = this.afferent(id);
    const ce = this.efferent(id);
    return ca + ce === 0 ? 0 : ce / (ca + ce);
  }

  /** Share of all nodes reachable over dependency edges, self excluded. */
  impact(id: string): number {
    const index = this.indexById.get(id);
    if (index === undefined || this.nodeList.length === 0) return 0;
    return this.reachCount(index) / this.nodeList.length;
  }

  metrics(id: string): NodeMetrics | undefined {
    if (!this.indexById.has(id)) return undefined;
    return {
      afferent: this.afferent(id),
      efferent: this.efferent(id),
      instability: this.instability(id),
      impact: this.impact(id),
    };
  }

  private reachCount(start: number): number {
    const cached = this.reach[start];
    if (cached !== undefined) return cached;

    const seen = new Set<number>([start]);
    const stack = [start];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      for (const next of this.dependsOn[current] ?? []) {
        if (seen.has(next)) continue;
        seen.add(next);
        stack.push(next);
      }
    }
    const count = seen.size - 1;
    this.reach[start] = count;
    return count;
  }

  // --- Cycles ---

  /**
   * Iterative Tarjan over dependency edges. Components come out in reverse
   * topological order: every component is emitted after all it depends on.
   */
  stronglyConnectedComponents(): string[][] {
    return this.tarjan().map((component) => component.map((i) => this.nodeList[i]?.id ?? ""));
  }

  private tarjan(): number[][] {
    if (this.components) return this.components;

    const n = this.nodeList.length;
    const order = new Array<number>(n).fill(-1);
    const low = new Array<number>(n).fill(0);
    const onStack = new Array<boolean>(n).fill(false);
    const componentOf = new Array<number>(n).fill(-1);
    const stack: number[] = [];
    const components: number[][] = [];
    let counter = 0;

    for (let root = 0; root < n; root++) {
      if (order[root] !== -1) continue;
      // Frames of [node, next neighbour position]
      const frames: Array<[number, number]> = [[root, 0]];
      order[root] = low[root] = counter++;
      stack.push(root);
      onStack[root] = true;

      while (frames.length > 0) {
        const frame = frames[frames.length - 1];
        if (!frame) break;
        const [v, position] = frame;
        const neighbours = this.dependsOn[v] ?? [];

        if (position < neighbours.length) {
          frame[1] = position + 1;
          const w = neighbours[position];
          if (w === undefined) continue;
          if (order[w] === -1) {
            order[w] = low[w] = counter++;
            stack.push(w);
            onStack[w] = true;
            frames.push([w, 0]);
          } else if (onStack[w]) {
            low[v] = Math.min(low[v] ?? 0, order[w] ?? 0);
          }
          continue;
        }

        frames.pop();
        const parent = frames[frames.length - 1];
        if (parent) low[parent[0]] = Math.min(low[parent[0]] ?? 0, low[v] ?? 0);

        if (low[v] === order[v]) {
          const component: number[] = [];
          let w: number | undefined;
          do {
            w = stack.pop();
            if (w === undefined) break;
            onStack[w] = false;
            componentOf[w] = components.length;
            component.push(w);
          } while (w !== v);
          components.push(component.sort((a, b) => a - b));
        }
      }
    }

    this.components = components;
    this.componentOf = componentOf;
    return components;
  }

  cycles(): readonly CycleGroup[] {
    if (this.cycleGroups) return this.cycleGroups;
    this.cycleGroups = this.tarjan()
      .filter((component) => {
        const first = component[0];
        return component.length > 1 || (first !== undefined && this.selfLoop[first] === true);
      })
      .map((component) => {
        const memberIds = component.map((i) => this.nodeList[i]?.id ?? "");
        return { id: `cycle-${sha12(memberIds)}`, memberIds };
      })
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return this.cycleGroups;
  }

  isInCycle(id: string): boolean {
    const index = this.indexById.get(id);
    if (index === undefined) return false;
    if (this.selfLoop[index]) return true;
    this.tarjan();
    const component = this.components?.[this.componentOf?.[index] ?? -1];
    return (component?.length ?? 0) > 1;
  }

  // --- Aggregates ---

  /**
   * Weighted sum of member dependency edges, their distinct targets and the
   * members sitting in a cycle. Grows with members and with edges.
   */
  subgraphComplexity(memberIds: Iterable<string>): number {
    const members = new Set<number>();
    for (const id of memberIds) {
      const index = this.indexById.get(id);
      if (index !== undefined) members.add(index);
    }

    let edgeCount = 0;
    const targets = new Set<number>();
    let cycleMembers = 0;
    for (const m of members) {
      for (const e of this.out[m] ?? []) {
        const edge = this.edgeList[e];
        if (!edge?.dependency) continue;
        edgeCount++;
        targets.add(edge.target);
      }
      const id = this.nodeList[m]?.id;
      if (id !== undefined && this.isInCycle(id)) cycleMembers++;
    }

    const w = this.complexityWeights;
    return w.edges * edgeCount + w.fanOut * targets.size + w.cycleMembers * cycleMembers;
  }

  summary(): GraphSummary {
    const n = this.nodeList.length;
    let pairs = 0;
    let dependencyEdgeCount = 0;
    let afferent = 0;
    let efferent = 0;
    let instability = 0;

    for (const edge of this.edgeList) if (edge.dependency) dependencyEdgeCount++;
    for (const node of this.nodeList) {
      pairs += this.dependsOn[node.index]?.length ?? 0;
      afferent += this.afferent(node.id);
      efferent += this.efferent(node.id);
      instability += this.instability(node.id);
    }

    return {
      nodeCount: n,
      edgeCount: this.edgeList.length,
      dependencyEdgeCount,
      density: n < 2 ? 0 : pairs / (n * (n - 1)),
      cycleCount: this.cycles().length,
      averageAfferent: n === 0 ? 0 : afferent / n,
      averageEfferent: n === 0 ? 0 : efferent / n,
      averageInstability: n === 0 ? 0 : instability / n,
      maxDepth: this.maxDepth(),
    };
  }

  private maxDepth(): number {
    const components = this.tarjan();
    const componentOf = this.componentOf ?? [];
    const depth = new Array<number>(components.length).fill(0);
    let max = 0;

    // Emission order puts every successor component first
    components.forEach((component, c) => {
      let best = 0;
      for (const v of component) {
        for (const w of this.dependsOn[v] ?? []) {
          const d = componentOf[w] ?? c;
          if (d !== c) best = Math.max(best, (depth[d] ?? 0) + 1);
        }
      }
      depth[c] = best;
      max = Math.max(max, best);
    });
    return max;
  }
}
