/**
 * analyze_codebase - Full architecture analysis of a source tree.
 */

import * as z from "zod/v4";
import { resultToResponse, successResponse } from "@archlens/core";
import type { ToolRegistrar } from "./types.js";
import { formatAnalysisSummary } from "./format.js";

interface AnalyzeCodebaseInput {
  root_path: string;
  time_budget_ms?: number;
}

export const registerAnalyzeCodebase: ToolRegistrar = (server, orchestrator) => {
  server.registerTool(
    "analyze_codebase",
    {
      title: "Analyze codebase",
      description:
        "Scan a source tree and build its architecture model: elements, relationships, dependency graph, service boundaries, layers and anti-patterns. Replaces the current analysis.",
      inputSchema: {
        root_path: z.string().min(1).describe("Absolute path of the project root"),
        time_budget_ms: z.number().int().positive().optional().describe("Wall-clock budget for extraction"),
      },
    },
    async (input: AnalyzeCodebaseInput) => {
      const result = await orchestrator.runFull(input.root_path, {
        ...(input.time_budget_ms !== undefined ? { timeBudgetMs: input.time_budget_ms } : {}),
      });
      return resultToResponse(result, (analysis) =>
        successResponse(formatAnalysisSummary(analysis), {
          version: analysis.version,
          elements: analysis.elements.length,
          relationships: analysis.relationships.length,
          boundaries: analysis.boundaries.length,
          diagnostics: analysis.diagnostics.length,
        })
      );
    }
  );
};
