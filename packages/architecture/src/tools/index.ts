/**
 * MCP tool registration for the architecture server.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AnalysisOrchestrator } from "../core/services/AnalysisOrchestrator.js";

import { registerAnalyzeCodebase } from "./analyzeCodebase.js";
import { registerAnalyzeChanges } from "./analyzeChanges.js";
import { registerGetMetrics } from "./getMetrics.js";
import { registerGetBoundaries } from "./getBoundaries.js";
import { registerGetElement } from "./getElement.js";
import { registerGetChanges } from "./getChanges.js";
import { registerApplyLabels } from "./applyLabels.js";

export interface Services {
  orchestrator: AnalysisOrchestrator;
}

export function registerAllTools(server: McpServer, services: Services): void {
  const { orchestrator } = services;

  registerAnalyzeCodebase(server, orchestrator);
  registerAnalyzeChanges(server, orchestrator);
  registerGetMetrics(server, orchestrator);
  registerGetBoundaries(server, orchestrator);
  registerGetElement(server, orchestrator);
  registerGetChanges(server, orchestrator);
  registerApplyLabels(server, orchestrator);
}
