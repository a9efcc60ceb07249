import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { AnalysisOrchestrator } from "../core/services/AnalysisOrchestrator.js";

export interface ToolRegistrar {
  (server: McpServer, orchestrator: AnalysisOrchestrator): void;
}

export const NO_ANALYSIS = "No analysis yet. Call analyze_codebase first.";
