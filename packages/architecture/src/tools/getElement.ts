/**
 * get_element - One element with its edges and node metrics.
 */

import * as z from "zod/v4";
import { errorResponse, successResponse } from "@archlens/core";
import { NO_ANALYSIS, type ToolRegistrar } from "./types.js";
import { formatElement } from "./format.js";

interface GetElementInput {
  element_id: string;
}

export const registerGetElement: ToolRegistrar = (server, orchestrator) => {
  server.registerTool(
    "get_element",
    {
      title: "Get element",
      description: "Element details: location, boundary, afferent/efferent coupling, instability, impact and edges.",
      inputSchema: {
        element_id: z.string().min(1).describe("Element id, e.g. src/app.ts::class:src.app.App"),
      },
    },
    async (input: GetElementInput) => {
      const current = orchestrator.current();
      if (!current) return errorResponse(NO_ANALYSIS);

      const text = formatElement(current, input.element_id);
      if (text === undefined) return errorResponse(`Element not found: ${input.element_id}`);

      return successResponse(text, {
        elementId: input.element_id,
        metrics: { ...current.graph.metrics(input.element_id) },
      });
    }
  );
};
