import { describe, it, expect } from "vitest";
import { addUndirected, partitionOrdered, propagateLabels } from "../src/core/services/clustering.js";

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i + 1);
}

describe("partitionOrdered", () => {
  it("keeps a list that already fits", () => {
    expect(partitionOrdered(range(5), 2, 10)).toEqual({ chunks: [range(5)], rest: [] });
  });

  it("leaves a list below the minimum as rest", () => {
    expect(partitionOrdered([1], 2, 10)).toEqual({ chunks: [], rest: [1] });
  });

  it("balances chunks when they all reach the minimum", () => {
    expect(partitionOrdered(range(10), 2, 4)).toEqual({
      chunks: [
        [1, 2, 3, 4],
        [5, 6, 7],
        [8, 9, 10],
      ],
      rest: [],
    });
  });

  it("cuts full chunks and leaves the short tail over", () => {
    expect(partitionOrdered(range(7), 4, 5)).toEqual({ chunks: [[1, 2, 3, 4, 5]], rest: [6, 7] });
  });
});

describe("propagateLabels", () => {
  const adjacency = new Map<string, Map<string, number>>();
  addUndirected(adjacency, "a", "b", 1);
  addUndirected(adjacency, "b", "c", 1);
  addUndirected(adjacency, "x", "y", 1);
  addUndirected(adjacency, "z", "z", 1);

  it("ignores self pairs", () => {
    expect(adjacency.has("z")).toBe(false);
  });

  it("gives each connected group one label", () => {
    const labels = propagateLabels(["y", "x", "c", "b", "a", "z"], adjacency, 20);

    expect(Object.fromEntries(labels)).toEqual({ a: "b", b: "b", c: "b", x: "y", y: "y", z: "z" });
  });

  it("keeps every node on its own label with no sweeps", () => {
    const labels = propagateLabels(["a", "b"], adjacency, 0);
    expect(Object.fromEntries(labels)).toEqual({ a: "a", b: "b" });
  });
});
