import { describe, it, expect } from "vitest";
import {
  formatAnalysisSummary,
  formatBoundaries,
  formatBoundary,
  formatDiff,
  formatElement,
} from "../src/tools/format.js";
import { diffResults } from "../src/core/services/resultDiff.js";
import type { ServiceBoundary } from "../src/core/model.js";
import { edge, makeResult, node } from "./fixtures.js";

const result = makeResult(3, {
  mode: "incremental",
  elements: [node("a"), node("b")],
  relationships: [edge("a", "b")],
  languageCounts: { typescript: { files: 2, elements: 2 } },
});

describe("format", () => {
  it("summarises a result", () => {
    expect(formatAnalysisSummary(result)).toBe(
      [
        "## Analysis v3 (incremental)",
        "",
        "**Root:** /repo",
        "**Elements:** 2",
        "**Relationships:** 1",
        "**Boundaries:** 0 (0 unassigned)",
        "**Cycles:** 0",
        "**Anti-patterns:** 0",
        "**Languages:** typescript (2 files, 2 elements)",
      ].join("\n")
    );
  });

  it("renders one line per boundary", () => {
    const boundary: ServiceBoundary = {
      id: "boundary-1",
      name: "core",
      type: "business",
      memberIds: ["a", "b"],
      externalDependencyIds: [],
      cohesion: 0.1,
      coupling: 0.6,
      complexity: 5,
    };
    expect(formatBoundary(boundary)).toBe(
      "- **core** [business] 2 members, cohesion 0.10, coupling 0.60, complexity 5"
    );
    expect(formatBoundaries([])).toBe("No boundaries found.");
  });

  it("describes an element with its metrics and edges", () => {
    expect(formatElement(result, "a")).toBe(
      [
        "## a",
        "",
        "**Kind:** function",
        "**File:** a.ts:1",
        "**Metrics:** Ca 0, Ce 1, I 1.00, impact 50%",
        "",
        "### Outgoing",
        "- calls → b (1.00)",
      ].join("\n")
    );
    expect(formatElement(result, "missing")).toBeUndefined();
  });

  it("counts the changes between versions", () => {
    const previous = makeResult(2, { elements: [node("a"), node("c")] });
    expect(formatDiff(diffResults(previous, result))).toBe(
      ["## Changes v2 → v3", "", "Elements: +1 -1 ~0", "Relationships: +1 -0 ~0", "Boundaries: +0 -0 ~0"].join("\n")
    );
  });
});
