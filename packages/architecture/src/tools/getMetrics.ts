/**
 * get_metrics - Aggregate metrics of the current analysis.
 */

import { errorResponse, successResponse } from "@archlens/core";
import { NO_ANALYSIS, type ToolRegistrar } from "./types.js";
import { formatMetrics } from "./format.js";

export const registerGetMetrics: ToolRegistrar = (server, orchestrator) => {
  server.registerTool(
    "get_metrics",
    {
      title: "Get metrics",
      description: "Graph summary, size, cycles, per-boundary scores, top nodes and threshold checks.",
      inputSchema: {},
    },
    async () => {
      const current = orchestrator.current();
      if (!current) return errorResponse(NO_ANALYSIS);

      const { metrics } = current;
      return successResponse(formatMetrics(metrics), {
        version: current.version,
        summary: { ...metrics.summary },
        size: { ...metrics.size, elementsByKind: { ...metrics.size.elementsByKind } },
        thresholds: metrics.thresholds.map((t) => ({ ...t })),
        cycles: metrics.cycles.map((c) => ({ id: c.id, memberIds: [...c.memberIds] })),
      });
    }
  );
};
