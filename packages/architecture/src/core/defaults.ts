import type { BoundaryType, LayerName } from "./model.js";

export type RuleTarget = "name" | "modifier" | "path";

export interface ClassificationRule {
  pattern: string;
  flags?: string;
  appliesTo: RuleTarget;
  type: BoundaryType;
}

export interface LayerRule {
  pattern: string;
  flags?: string;
  layer: LayerName;
}

/** Evaluated in order; the first match wins. */
export const DEFAULT_BOUNDARY_RULES: readonly ClassificationRule[] = [
  { pattern: "controller|endpoint|route(r|s)?|handler|resource|api|view", flags: "i", appliesTo: "name", type: "api" },
  { pattern: "repository|repo|dao|entity|model|schema|dto|store|mapper", flags: "i", appliesTo: "name", type: "data" },
  { pattern: "service|manager|usecase|interactor|domain|workflow|policy", flags: "i", appliesTo: "name", type: "business" },
  {
    pattern: "config|client|adapter|gateway|provider|factory|queue|cache|db|database|middleware|server",
    flags: "i",
    appliesTo: "name",
    type: "infrastructure",
  },
  { pattern: "util|helper|tool|common|shared|lib", flags: "i", appliesTo: "name", type: "utility" },

  {
    pattern: "^@((Rest)?Controller|(Get|Post|Put|Delete|Patch)(Mapping)?|app\\.route|router\\..+)$",
    appliesTo: "modifier",
    type: "api",
  },
  { pattern: "^@(Entity|Table|Repository|dataclass)$", appliesTo: "modifier", type: "data" },
  { pattern: "^@(Service|Injectable)$", appliesTo: "modifier", type: "business" },
  { pattern: "^@(Configuration|Component|Module)$", appliesTo: "modifier", type: "infrastructure" },

  { pattern: "(^|/)(api|controllers?|routes?|handlers?|views?|endpoints?)/", flags: "i", appliesTo: "path", type: "api" },
  { pattern: "(^|/)(models?|entities|repositories|schemas?|dao|persistence)/", flags: "i", appliesTo: "path", type: "data" },
  { pattern: "(^|/)(services?|domain|usecases?|core)/", flags: "i", appliesTo: "path", type: "business" },
  { pattern: "(^|/)(config|infra|infrastructure|adapters?|clients?|db)/", flags: "i", appliesTo: "path", type: "infrastructure" },
  { pattern: "(^|/)(utils?|helpers?|common|shared|lib)/", flags: "i", appliesTo: "path", type: "utility" },
];

/** Matched against the element name first, then its path. */
export const DEFAULT_LAYER_RULES: readonly LayerRule[] = [
  { pattern: "controller|view|route|handler|endpoint|resolver|page|screen|cli", flags: "i", layer: "presentation" },
  { pattern: "service|usecase|interactor|workflow|command|application", flags: "i", layer: "application" },
  { pattern: "entity|model|domain|aggregate|policy|value", flags: "i", layer: "domain" },
  {
    pattern: "repository|repo|dao|client|adapter|gateway|config|database|cache|queue|infrastructure|persistence",
    flags: "i",
    layer: "infrastructure",
  },
];

export interface MetricThresholds {
  /** Warn above */
  averageInstability: number;
  /** Warn above */
  averageCoupling: number;
  /** Warn below */
  averageCohesion: number;
  /** Warn above */
  cycleCount: number;
  /** Warn above */
  density: number;
}

export const DEFAULT_METRIC_THRESHOLDS: MetricThresholds = {
  averageInstability: 0.7,
  averageCoupling: 0.5,
  averageCohesion: 0.2,
  cycleCount: 0,
  density: 0.3,
};
