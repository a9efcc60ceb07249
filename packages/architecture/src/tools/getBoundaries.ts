/**
 * get_boundaries - List detected service boundaries.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@archlens/core";
import { BOUNDARY_TYPES, type BoundaryType } from "../core/model.js";
import { NO_ANALYSIS, type ToolRegistrar } from "./types.js";
import { formatBoundaries } from "./format.js";

interface GetBoundariesInput {
  type?: BoundaryType;
}

export const registerGetBoundaries: ToolRegistrar = (server, orchestrator) => {
  server.registerTool(
    "get_boundaries",
    {
      title: "Get boundaries",
      description: "List service boundaries with cohesion, coupling and complexity. Optionally filter by type.",
      inputSchema: {
        type: z.enum(BOUNDARY_TYPES).optional().describe("Only boundaries of this type"),
      },
    },
    async (input: GetBoundariesInput) => {
      const current = orchestrator.current();
      if (!current) return errorResponse(NO_ANALYSIS);

      const boundaries = input.type ? current.boundaries.filter((b) => b.type === input.type) : current.boundaries;
      return successResponse(formatBoundaries(boundaries), {
        version: current.version,
        boundaries: boundaries.map((b) => ({ ...b, memberIds: [...b.memberIds] })),
        unassigned: current.unassigned.length,
      });
    }
  );
};
