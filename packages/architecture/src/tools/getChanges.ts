/**
 * get_changes - Diff of the previous analysis against the current one.
 */

import { errorResponse, successResponse } from "@archlens/core";
import type { ToolRegistrar } from "./types.js";
import { formatDiff } from "./format.js";

export const registerGetChanges: ToolRegistrar = (server, orchestrator) => {
  server.registerTool(
    "get_changes",
    {
      title: "Get changes",
      description: "Added, removed and changed element, relationship and boundary ids between the last two versions.",
      inputSchema: {},
    },
    async () => {
      const diff = orchestrator.diff();
      if (!diff.ok) return errorResponse(diff.error.message);

      return successResponse(formatDiff(diff.value), {
        fromVersion: diff.value.fromVersion,
        toVersion: diff.value.toVersion,
        elements: { ...diff.value.elements },
        relationships: { ...diff.value.relationships },
        boundaries: { ...diff.value.boundaries },
      });
    }
  );
};
