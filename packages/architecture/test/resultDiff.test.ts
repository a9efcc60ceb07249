import { describe, it, expect } from "vitest";
import { canonicalJson, diffResults } from "../src/core/services/resultDiff.js";
import { edge, makeResult, node } from "./fixtures.js";

describe("canonicalJson", () => {
  it("sorts keys at every level and drops undefined members", () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { f: 1, e: undefined }], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,{"f":1}]},"b":1}'
    );
  });

  it("renders a bare undefined as null", () => {
    expect(canonicalJson(undefined)).toBe("null");
  });
});

describe("diffResults", () => {
  it("counts everything as added without a previous result", () => {
    const current = makeResult(1, { elements: [node("b"), node("a")] });
    const diff = diffResults(undefined, current);

    expect(diff.fromVersion).toBe(0);
    expect(diff.toVersion).toBe(1);
    expect(diff.elements).toEqual({ added: ["a", "b"], removed: [], changed: [] });
  });

  it("reports added, removed and changed ids", () => {
    const previous = makeResult(1, {
      elements: [node("a"), node("b"), node("c")],
      relationships: [edge("a", "b")],
    });
    const current = makeResult(2, {
      elements: [node("a"), node("b", { endLine: 9 }), node("d")],
      relationships: [edge("a", "b", "calls", 0.5)],
    });
    const diff = diffResults(previous, current);

    expect(diff.elements).toEqual({ added: ["d"], removed: ["c"], changed: ["b"] });
    expect(diff.relationships).toEqual({ added: [], removed: [], changed: ["rel:a|calls|b"] });
    expect(diff.boundaries).toEqual({ added: [], removed: [], changed: [] });
  });
});
