import { describe, it, expect } from "vitest";
import { LabelBatchSchema, LabelSchema, toElementLabel, withLabel } from "../src/core/services/labels.js";
import { node } from "./fixtures.js";

describe("labels", () => {
  it("validates confidence and required fields", () => {
    expect(LabelSchema.safeParse({ elementId: "a", label: "Checkout", confidence: 0.9 }).success).toBe(true);
    expect(LabelSchema.safeParse({ elementId: "a", label: "Checkout", confidence: 1.5 }).success).toBe(false);
    expect(LabelSchema.safeParse({ elementId: "", label: "Checkout", confidence: 0.5 }).success).toBe(false);
    expect(LabelBatchSchema.safeParse([{ elementId: "a", label: "x", confidence: 0 }]).success).toBe(true);
  });

  it("keeps only the optional fields that were given", () => {
    expect(toElementLabel({ elementId: "a", label: "Checkout", confidence: 0.9 })).toEqual({
      label: "Checkout",
      confidence: 0.9,
    });
    expect(
      toElementLabel({ elementId: "a", label: "Checkout", confidence: 0.9, category: "flow", description: "Pays" })
    ).toEqual({ label: "Checkout", confidence: 0.9, category: "flow", description: "Pays" });
  });

  it("attaches a label without touching the other fields", () => {
    const element = node("a", { metadata: { exported: true } });
    const labelled = withLabel(element, { label: "Checkout", confidence: 0.9 });

    expect(labelled).not.toBe(element);
    expect(labelled.metadata).toEqual({ exported: true, label: { label: "Checkout", confidence: 0.9 } });
    expect({ ...labelled, metadata: element.metadata }).toEqual(element);
    expect(element.metadata).toEqual({ exported: true });
    expect(withLabel(element, undefined)).toBe(element);
  });
});
