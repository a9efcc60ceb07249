import { describe, it, expect } from "vitest";
import { BoundaryDetector, boundaryId, scoreMembers } from "../src/core/services/BoundaryDetector.js";
import { PatternClassifier } from "../src/core/services/PatternClassifier.js";
import { DEFAULT_BOUNDARY_RULES } from "../src/core/defaults.js";
import { buildGraph, edge, makeElement, node } from "./fixtures.js";

const classifier = new PatternClassifier(DEFAULT_BOUNDARY_RULES, { useEnclosingScope: true });

function detector(minSize: number, maxSize: number): BoundaryDetector {
  return new BoundaryDetector(classifier, { minSize, maxSize, maxIterations: 20 });
}

const invoice = makeElement("invoice", { kind: "module", module: "billing.invoice", qualifiedName: "billing.invoice" });
const fA = makeElement("fA", { module: "billing.invoice", startLine: 2, parentId: invoice.id });
const fB = makeElement("fB", { module: "billing.invoice", startLine: 6, parentId: invoice.id });
const repository = makeElement("repository", {
  kind: "module",
  module: "users.repository",
  qualifiedName: "users.repository",
});
const gA = makeElement("gA", { module: "users.repository", startLine: 2, parentId: repository.id });
const gB = makeElement("gB", { module: "users.repository", startLine: 5, parentId: repository.id });
const gC = makeElement("gC", { module: "users.repository", startLine: 9, parentId: repository.id });
const lonely = makeElement("z", { module: "misc.lonely" });

const elements = [invoice, fA, fB, repository, gA, gB, gC, lonely];
const contains = [fA, fB, gA, gB, gC].map((child) => edge(child.parentId ?? "", child.id, "contains"));
const linked = [...contains, edge(invoice.id, repository.id, "depends_on", 0.5)];

describe("boundaryId", () => {
  it("does not depend on member order", () => {
    expect(boundaryId(["b", "a"])).toBe(boundaryId(["a", "b"]));
    expect(boundaryId(["a", "b"])).toMatch(/^boundary-[0-9a-f]{12}$/);
  });
});

describe("scoreMembers", () => {
  const graph = buildGraph(
    ["f1", "f2", "f3", "f4", "f5"].map((id) => node(id)),
    [edge("f1", "f2"), edge("f2", "f1"), edge("f1", "f3"), edge("f3", "f4"), edge("f5", "f1")]
  );

  it("scores cohesion, coupling and complexity", () => {
    expect(scoreMembers(graph, ["f1", "f2", "f3"])).toEqual({
      cohesion: 0.5,
      coupling: 0.4,
      complexity: 4 + 2 * 4 + 3 * 2,
      externalDependencyIds: ["f4"],
    });
  });

  it("scores five functions with ten internal and two outgoing calls", () => {
    const members = ["p1", "p2", "p3", "p4", "p5"];
    const internal = members.flatMap((a, i) => members.slice(i + 1).map((b) => edge(a, b)));
    const cluster = buildGraph(
      [...members, "x1", "x2"].map((id) => node(id)),
      [...internal, edge("p1", "x1"), edge("p5", "x2")]
    );
    const scores = scoreMembers(cluster, members);

    expect(internal).toHaveLength(10);
    expect(scores.cohesion).toBe(0.5);
    expect(scores.coupling).toBeCloseTo(2 / 12);
    expect(scores.externalDependencyIds).toEqual(["x1", "x2"]);
  });

  it("treats a single member as fully cohesive", () => {
    expect(scoreMembers(graph, ["f4"])).toMatchObject({ cohesion: 1, coupling: 1 });
  });
});

describe("BoundaryDetector", () => {
  it("clusters by containment and leaves isolated elements unassigned", () => {
    const graph = buildGraph(elements, contains);
    const { boundaries, unassigned } = detector(2, 40).detect(elements, contains, graph);
    const byName = [...boundaries].sort((a, b) => a.name.localeCompare(b.name));

    expect(byName.map((b) => [b.name, b.type, b.memberIds.length])).toEqual([
      ["billing.invoice", "utility", 3],
      ["users.repository", "data", 4],
    ]);
    expect(byName[0]?.memberIds).toEqual([fA.id, fB.id, invoice.id]);
    expect(byName[0]).toMatchObject({ cohesion: 0, coupling: 0, complexity: 0, externalDependencyIds: [] });
    expect(unassigned).toEqual([lonely.id]);
  });

  it("gives each boundary the id of its members", () => {
    const graph = buildGraph(elements, contains);
    const { boundaries } = detector(2, 40).detect(elements, contains, graph);

    for (const boundary of boundaries) expect(boundary.id).toBe(boundaryId(boundary.memberIds));
    expect(boundaries.map((b) => b.id)).toEqual([...boundaries.map((b) => b.id)].sort());
  });

  it("splits clusters above the maximum and numbers repeated names", () => {
    const graph = buildGraph(elements, contains);
    const { boundaries } = detector(2, 3).detect(elements, contains, graph);

    expect(boundaries.map((b) => b.name).sort()).toEqual(["billing.invoice", "users.repository", "users.repository#2"]);
    const split = boundaries.filter((b) => b.name.startsWith("users.")).map((b) => b.memberIds);
    expect(split).toContainEqual([gA.id, repository.id]);
    expect(split).toContainEqual([gB.id, gC.id]);
    for (const boundary of boundaries) {
      expect(boundary.memberIds.length).toBeGreaterThanOrEqual(2);
      expect(boundary.memberIds.length).toBeLessThanOrEqual(3);
    }
  });

  it("merges an undersized cluster into its strongest neighbour", () => {
    const graph = buildGraph(elements, linked);
    const { boundaries, unassigned } = detector(4, 10).detect(elements, linked, graph);

    expect(boundaries).toHaveLength(1);
    expect(boundaries[0]).toMatchObject({
      name: "users.repository",
      type: "data",
      cohesion: 1 / 42,
      coupling: 0,
      complexity: 3,
    });
    expect(boundaries[0]?.memberIds).toHaveLength(7);
    expect(unassigned).toEqual([lonely.id]);
  });

  it("pools what cannot merge and cuts the pool into clusters", () => {
    const graph = buildGraph(elements, linked);
    const { boundaries, unassigned } = detector(4, 5).detect(elements, linked, graph);

    expect(unassigned).toEqual([]);
    const pooled = boundaries.find((b) => b.memberIds.includes(lonely.id));
    expect(pooled?.memberIds).toEqual([fA.id, fB.id, invoice.id, lonely.id]);
    expect(pooled?.name).toBe("billing.invoice");
  });

  it("is deterministic", () => {
    const graph = buildGraph(elements, linked);
    const first = detector(2, 40).detect(elements, linked, graph);
    const second = detector(2, 40).detect([...elements].reverse(), [...linked].reverse(), buildGraph(elements, linked));
    expect(second.boundaries).toEqual(first.boundaries);
    expect(second.unassigned).toEqual(first.unassigned);
  });

  it("reuses clusters when the structure is unchanged", () => {
    const graph = buildGraph(elements, linked);
    const boundaryDetector = detector(2, 40);
    const previous = boundaryDetector.detect(elements, linked, graph);

    const nextGraph = buildGraph(elements, linked, graph);
    const reused = boundaryDetector.detect(elements, linked, nextGraph, {
      previous,
      previousGraph: graph,
      changedElementIds: new Set([fA.id]),
    });

    expect(reused.clusters).toBe(previous.clusters);
    expect(reused.boundaries).toEqual(boundaryDetector.detect(elements, linked, nextGraph).boundaries);
  });

  it("reclusters when the structure changes", () => {
    const graph = buildGraph(elements, contains);
    const boundaryDetector = detector(2, 40);
    const previous = boundaryDetector.detect(elements, contains, graph);

    const nextGraph = buildGraph(elements, linked, graph);
    const next = boundaryDetector.detect(elements, linked, nextGraph, {
      previous,
      previousGraph: graph,
      changedElementIds: new Set(),
    });

    expect(next.structuralKey).not.toBe(previous.structuralKey);
    expect(next.boundaries).toEqual(boundaryDetector.detect(elements, linked, nextGraph).boundaries);
  });
});
