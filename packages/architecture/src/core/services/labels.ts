import * as z from "zod/v4";
import type { Element } from "@archlens/extract";
import type { ElementLabel } from "../model.js";

export const LabelSchema = z.object({
  elementId: z.string().min(1),
  label: z.string().min(1),
  category: z.string().optional(),
  confidence: z.number().min(0).max(1),
  description: z.string().optional(),
});

export const LabelBatchSchema = z.array(LabelSchema);

export type LabelInput = z.infer<typeof LabelSchema>;

export function toElementLabel(input: LabelInput): ElementLabel {
  return {
    label: input.label,
    confidence: input.confidence,
    ...(input.category !== undefined ? { category: input.category } : {}),
    ...(input.description !== undefined ? { description: input.description } : {}),
  };
}

/** New element value with `metadata.label` set; every other field is shared. */
export function withLabel(element: Element, label: ElementLabel | undefined): Element {
  if (!label) return element;
  return { ...element, metadata: { ...element.metadata, label } };
}
