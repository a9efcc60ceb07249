/**
 * analyze_changes - Incremental re-analysis after files changed.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@archlens/core";
import type { ToolRegistrar } from "./types.js";
import { formatAnalysisSummary } from "./format.js";

interface AnalyzeChangesInput {
  changed_files: string[];
}

export const registerAnalyzeChanges: ToolRegistrar = (server, orchestrator) => {
  server.registerTool(
    "analyze_changes",
    {
      title: "Analyze changes",
      description:
        "Re-analyse after files were added, edited or deleted. Requires a previous analyze_codebase. Output equals a full run over the same tree.",
      inputSchema: {
        changed_files: z.array(z.string()).describe("Changed paths, absolute or relative to the analysed root"),
      },
    },
    async (input: AnalyzeChangesInput) => {
      const result = await orchestrator.runIncremental(input.changed_files);
      if (!result.ok) return errorResponse(result.error.message);

      return successResponse(formatAnalysisSummary(result.value), {
        version: result.value.version,
        elements: result.value.elements.length,
        relationships: result.value.relationships.length,
        boundaries: result.value.boundaries.length,
      });
    }
  );
};
