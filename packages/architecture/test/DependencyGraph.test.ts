import { describe, it, expect } from "vitest";
import { DependencyGraph } from "../src/core/services/DependencyGraph.js";
import { ALL_BUT_CONTAINS, buildGraph, edge, node } from "./fixtures.js";

const cycleNodes = ["a", "b", "c", "d"].map((id) => node(id));
const cycleEdges = [edge("a", "b"), edge("b", "c"), edge("c", "a"), edge("d", "a")];

describe("DependencyGraph", () => {
  describe("construction", () => {
    it("orders nodes by id", () => {
      const graph = buildGraph([node("c"), node("a"), node("b")], []);
      expect(graph.nodes().map((n) => [n.index, n.id])).toEqual([
        [0, "a"],
        [1, "b"],
        [2, "c"],
      ]);
    });

    it("mirrors a bidirectional relationship", () => {
      const graph = buildGraph([node("x"), node("y")], [edge("x", "y", "associates", 0.8, true)]);

      expect(graph.edges().map((e) => e.id)).toEqual(["rel:x|associates|y", "rel:x|associates|y:reverse"]);
      expect(graph.outgoing("y").map((e) => [e.strength, e.relationshipId])).toEqual([[0.8, "rel:x|associates|y"]]);
      expect(graph.efferent("x")).toBe(1);
      expect(graph.efferent("y")).toBe(1);
    });

    it("drops edges with a missing endpoint and reports them", () => {
      const { graph, diagnostics } = DependencyGraph.build([node("a")], [edge("a", "ghost")], {
        dependencyKinds: ALL_BUT_CONTAINS,
        complexity: { edges: 1, fanOut: 2, cycleMembers: 3 },
      });

      expect(graph.edgeCount).toBe(0);
      expect(diagnostics).toEqual([
        {
          severity: "warning",
          code: "graph_integrity",
          message: "Relationship rel:a|calls|ghost references missing element ghost",
          relationshipId: "rel:a|calls|ghost",
        },
      ]);
    });

    it("keeps contains edges out of the dependency metrics", () => {
      const graph = buildGraph([node("p"), node("q")], [edge("p", "q", "contains")]);
      expect(graph.edgeCount).toBe(1);
      expect(graph.efferent("p")).toBe(0);
      expect(graph.summary().dependencyEdgeCount).toBe(0);
    });
  });

  describe("node metrics", () => {
    const graph = buildGraph(cycleNodes, cycleEdges);

    it("counts distinct neighbours", () => {
      expect(graph.afferent("a")).toBe(2);
      expect(graph.efferent("a")).toBe(1);
      expect(graph.instability("a")).toBeCloseTo(1 / 3);
      expect(graph.instability("d")).toBe(1);
    });

    it("keeps instability in [0,1] and zero exactly when nothing is depended on", () => {
      const chain = buildGraph([node("a"), node("b"), node("c")], [edge("a", "b"), edge("b", "c")]);
      for (const n of chain.nodes()) {
        const value = chain.instability(n.id);
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
        expect(value === 0).toBe(chain.efferent(n.id) === 0);
      }
    });

    it("ignores self references in coupling counts", () => {
      const loop = buildGraph([node("e")], [edge("e", "e")]);
      expect(loop.afferent("e")).toBe(0);
      expect(loop.efferent("e")).toBe(0);
      expect(loop.instability("e")).toBe(0);
    });

    it("measures impact as the reachable share of nodes", () => {
      const chain = buildGraph([node("a"), node("b"), node("c"), node("d")], [edge("a", "b"), edge("b", "c")]);
      expect(chain.impact("a")).toBe(0.5);
      expect(chain.impact("b")).toBe(0.25);
      expect(chain.impact("c")).toBe(0);
      expect(chain.impact("missing")).toBe(0);
    });

    it("returns undefined metrics for unknown ids", () => {
      expect(graph.metrics("nope")).toBeUndefined();
      expect(graph.metrics("d")).toEqual({ afferent: 0, efferent: 1, instability: 1, impact: 0.75 });
    });
  });

  describe("cycles", () => {
    it("finds a three-node cycle", () => {
      const graph = buildGraph(cycleNodes, cycleEdges);
      const cycles = graph.cycles();

      expect(cycles).toHaveLength(1);
      expect(cycles[0]?.memberIds).toEqual(["a", "b", "c"]);
      expect(cycles[0]?.id).toMatch(/^cycle-[0-9a-f]{12}$/);
      expect(graph.isInCycle("b")).toBe(true);
      expect(graph.isInCycle("d")).toBe(false);
    });

    it("treats a self-loop as a cycle", () => {
      const graph = buildGraph([node("e"), node("f")], [edge("e", "e"), edge("e", "f")]);
      expect(graph.cycles().map((c) => c.memberIds)).toEqual([["e"]]);
      expect(graph.isInCycle("e")).toBe(true);
      expect(graph.isInCycle("f")).toBe(false);
    });

    it("emits components after everything they depend on", () => {
      const graph = buildGraph(cycleNodes, cycleEdges);
      expect(graph.stronglyConnectedComponents()).toEqual([["a", "b", "c"], ["d"]]);
    });

    it("handles long chains without recursion", () => {
      const ids = Array.from({ length: 5000 }, (_, i) => `n${String(i).padStart(5, "0")}`);
      const edges = ids.slice(1).map((id, i) => edge(ids[i] ?? "", id));
      const graph = buildGraph(
        ids.map((id) => node(id)),
        [...edges, edge(ids[ids.length - 1] ?? "", ids[0] ?? "")]
      );
      expect(graph.cycles()).toHaveLength(1);
      expect(graph.cycles()[0]?.memberIds).toHaveLength(5000);
    });
  });

  describe("summary", () => {
    it("aggregates the whole graph", () => {
      const summary = buildGraph(cycleNodes, cycleEdges).summary();

      expect(summary.nodeCount).toBe(4);
      expect(summary.edgeCount).toBe(4);
      expect(summary.density).toBeCloseTo(1 / 3);
      expect(summary.cycleCount).toBe(1);
      expect(summary.averageAfferent).toBe(1);
      expect(summary.averageEfferent).toBe(1);
      expect(summary.averageInstability).toBeCloseTo((1 / 3 + 1 / 2 + 1 / 2 + 1) / 4);
      expect(summary.maxDepth).toBe(1);
    });

    it("measures depth over the condensation", () => {
      const chain = buildGraph([node("a"), node("b"), node("c")], [edge("a", "b"), edge("b", "c")]);
      expect(chain.summary().maxDepth).toBe(2);
    });

    it("is all zeros for an empty graph", () => {
      const summary = buildGraph([], []).summary();
      expect(summary).toEqual({
        nodeCount: 0,
        edgeCount: 0,
        dependencyEdgeCount: 0,
        density: 0,
        cycleCount: 0,
        averageAfferent: 0,
        averageEfferent: 0,
        averageInstability: 0,
        maxDepth: 0,
      });
    });
  });

  describe("subgraphComplexity", () => {
    const nodes = ["a", "b", "c", "ext"].map((id) => node(id));
    const edges = [edge("a", "b"), edge("a", "ext"), edge("b", "c")];

    it("weights edges, fan-out and cycle members", () => {
      const graph = buildGraph(nodes, edges);
      expect(graph.subgraphComplexity(["a"])).toBe(2 + 2 * 2);
      expect(graph.subgraphComplexity(["a", "b"])).toBe(3 + 2 * 3);
    });

    it("never decreases when members or edges are added", () => {
      const graph = buildGraph(nodes, edges);
      const one = graph.subgraphComplexity(["a"]);
      const two = graph.subgraphComplexity(["a", "b"]);
      const three = graph.subgraphComplexity(["a", "b", "c"]);
      expect(two).toBeGreaterThanOrEqual(one);
      expect(three).toBeGreaterThanOrEqual(two);

      const withCycle = buildGraph(nodes, [...edges, edge("c", "a")]);
      expect(withCycle.subgraphComplexity(["a", "b", "c"])).toBe(4 + 2 * 4 + 3 * 3);
      expect(withCycle.subgraphComplexity(["a", "b", "c"])).toBeGreaterThan(three);
    });
  });

  describe("incremental build", () => {
    const nodes = ["a", "b", "c", "d", "e"].map((id) => node(id));
    const before = [edge("a", "b"), edge("b", "c"), edge("d", "e")];
    const after = [edge("a", "b"), edge("b", "c"), edge("c", "d"), edge("d", "e")];

    it("reports the nodes whose edges changed", () => {
      const previous = buildGraph(nodes, before);
      const next = buildGraph(nodes, after, previous);
      expect([...next.changed].sort()).toEqual(["c", "d"]);
    });

    it("reports added and removed nodes", () => {
      const previous = buildGraph(nodes, before);
      const next = buildGraph([...nodes.filter((n) => n.id !== "e"), node("f")], [edge("a", "b"), edge("b", "c")], previous);
      expect([...next.changed].sort()).toEqual(["d", "e", "f"]);
    });

    it("produces the same metrics as a fresh build", () => {
      const previous = buildGraph(nodes, before);
      for (const n of previous.nodes()) previous.impact(n.id);

      const reused = buildGraph(nodes, after, previous);
      const fresh = buildGraph(nodes, after);

      for (const n of fresh.nodes()) {
        expect(reused.metrics(n.id)).toEqual(fresh.metrics(n.id));
      }
      expect(reused.summary()).toEqual(fresh.summary());
      expect(reused.cycles()).toEqual(fresh.cycles());
      expect(reused.impact("a")).toBe(0.8);
    });
  });
});
