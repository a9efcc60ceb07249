#!/usr/bin/env node
/**
 * MCP server exposing the architecture analysis engine.
 * Configuration comes from archlens.config.json in the working directory.
 */

import { createLogger, runServer } from "@archlens/core";
import { NodeFileSystem, NodeProjectScanner, TreeSitterExtractor } from "@archlens/extract";
import { loadConfig } from "./core/config.js";
import { AnalysisOrchestrator } from "./core/services/AnalysisOrchestrator.js";
import { readConfigFile } from "./infrastructure/ConfigFile.js";
import { registerAllTools, type Services } from "./tools/index.js";

const log = createLogger("archlens");

runServer<Services>({
  identity: { name: "archlens", version: "0.1.0" },
  createServices: async () => {
    const cwd = process.cwd();
    const raw = await readConfigFile(cwd);
    if (!raw.ok) throw raw.error;

    const extractor = new TreeSitterExtractor();
    const config = loadConfig(raw.value, { supportedLanguages: extractor.languages });
    if (!config.ok) throw config.error;

    const orchestrator = AnalysisOrchestrator.create(config.value, {
      scanner: new NodeProjectScanner(),
      fs: new NodeFileSystem(cwd),
      extractor,
    });
    if (!orchestrator.ok) throw orchestrator.error;

    return { orchestrator: orchestrator.value };
  },
  registerTools: registerAllTools,
  onReady: () => {
    log.info(`Ready; configuration loaded from ${process.cwd()}`);
  },
});
