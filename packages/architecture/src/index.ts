export type {
  ResolutionLevel,
  RelationshipMetadata,
  Relationship,
  BoundaryType,
  ServiceBoundary,
  LayerName,
  Layer,
  LayerViolation,
  LayerReport,
  AntiPatternKind,
  AntiPattern,
  AnalysisMode,
  LanguageCount,
  ElementLabel,
  AnalysisResult,
} from "./core/model.js";
export { BOUNDARY_TYPES, LAYER_NAMES, LAYER_LEVEL, isExternal } from "./core/model.js";

export type { RuleTarget, ClassificationRule, LayerRule, MetricThresholds } from "./core/defaults.js";
export { DEFAULT_BOUNDARY_RULES, DEFAULT_LAYER_RULES, DEFAULT_METRIC_THRESHOLDS } from "./core/defaults.js";

export type { AnalysisConfigInput, ResolvedConfig, LoadConfigOptions } from "./core/config.js";
export { AnalysisConfigSchema, loadConfig } from "./core/config.js";

export type { ResolutionStrengths, Resolution } from "./core/services/RelationshipResolver.js";
export { RelationshipResolver, relationshipId, EXTERNAL_PREFIX } from "./core/services/RelationshipResolver.js";

export type {
  GraphNode,
  GraphEdge,
  NodeMetrics,
  CycleGroup,
  GraphSummary,
  ComplexityWeights,
  GraphBuildOptions,
  GraphBuild,
} from "./core/services/DependencyGraph.js";
export { DependencyGraph } from "./core/services/DependencyGraph.js";

export type { ClassifierOptions } from "./core/services/PatternClassifier.js";
export { PatternClassifier } from "./core/services/PatternClassifier.js";

export type {
  BoundaryDetectorOptions,
  BoundaryDetection,
  DetectReuse,
  BoundaryScores,
} from "./core/services/BoundaryDetector.js";
export { BoundaryDetector, boundaryId, scoreMembers } from "./core/services/BoundaryDetector.js";
export { partitionOrdered, propagateLabels } from "./core/services/clustering.js";

export { LayerDetector } from "./core/services/LayerDetector.js";
export type { AntiPatternOptions } from "./core/services/AntiPatternDetector.js";
export { AntiPatternDetector } from "./core/services/AntiPatternDetector.js";

export type {
  BoundaryMetrics,
  RankedNode,
  ThresholdName,
  ThresholdCheck,
  MetricsReport,
  MetricsOptions,
  SizeMetrics,
} from "./core/services/MetricsReport.js";
export { buildMetricsReport, sizeMetrics } from "./core/services/MetricsReport.js";

export type { ResultBuilder } from "./core/services/AnalysisHandle.js";
export { AnalysisHandle } from "./core/services/AnalysisHandle.js";

export type { OrchestratorDeps, RunOptions, LabelOutcome } from "./core/services/AnalysisOrchestrator.js";
export { AnalysisOrchestrator } from "./core/services/AnalysisOrchestrator.js";

export type { IdDiff, ResultDiff } from "./core/services/resultDiff.js";
export { diffResults, canonicalJson } from "./core/services/resultDiff.js";

export type { LabelInput } from "./core/services/labels.js";
export { LabelSchema, LabelBatchSchema } from "./core/services/labels.js";

export { readConfigFile, CONFIG_FILE_NAME } from "./infrastructure/ConfigFile.js";
