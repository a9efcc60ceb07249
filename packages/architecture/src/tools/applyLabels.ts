/**
 * apply_labels - Attach externally produced labels to elements.
 */

import * as z from "zod/v4";
import { resultToResponse, successResponse } from "@archlens/core";
import { LabelSchema, type LabelInput } from "../core/services/labels.js";
import type { ToolRegistrar } from "./types.js";

interface ApplyLabelsInput {
  labels: LabelInput[];
}

export const registerApplyLabels: ToolRegistrar = (server, orchestrator) => {
  server.registerTool(
    "apply_labels",
    {
      title: "Apply labels",
      description:
        "Merge labels into element metadata. Core fields are never changed; unknown ids are reported as warnings.",
      inputSchema: {
        labels: z.array(LabelSchema).describe("Labels keyed by element id"),
      },
    },
    async (input: ApplyLabelsInput) => {
      const outcome = await orchestrator.applyLabels(input.labels);
      return resultToResponse(outcome, ({ result, applied, unknown }) => {
        const text =
          `Applied ${applied} label(s) in v${result.version}` +
          (unknown.length > 0 ? `; unknown element(s): ${unknown.join(", ")}` : "");
        return successResponse(text, { version: result.version, applied, unknown });
      });
    }
  );
};
