/**
 * Analysis configuration. Every field has a default, so `loadConfig({})`
 * yields a complete configuration.
 */

import * as z from "zod/v4";
import { ConfigurationError, Err, Ok, type Result } from "@archlens/core";
import {
  DEFAULT_IGNORE_PATTERNS,
  DEFAULT_LANGUAGE_MAP,
  LanguageRegistry,
  RELATIONSHIP_KINDS,
  SUPPORTED_LANGUAGES,
} from "@archlens/extract";
import {
  DEFAULT_BOUNDARY_RULES,
  DEFAULT_LAYER_RULES,
  DEFAULT_METRIC_THRESHOLDS,
} from "./defaults.js";
import { BOUNDARY_TYPES, LAYER_NAMES } from "./model.js";

const Strength = z.number().gt(0).max(1);
const PositiveWeight = z.number().positive();

const ClassificationRuleSchema = z.object({
  pattern: z.string().min(1),
  flags: z.string().optional(),
  appliesTo: z.enum(["name", "modifier", "path"]).default("name"),
  type: z.enum(BOUNDARY_TYPES),
});

const LayerRuleSchema = z.object({
  pattern: z.string().min(1),
  flags: z.string().optional(),
  layer: z.enum(LAYER_NAMES),
});

export const AnalysisConfigSchema = z
  .object({
    languages: z
      .record(z.string(), z.array(z.string()))
      .default(() =>
        Object.fromEntries(Object.entries(DEFAULT_LANGUAGE_MAP).map(([language, exts]) => [language, [...exts]]))
      ),
    ignorePatterns: z.array(z.string()).default(() => [...DEFAULT_IGNORE_PATTERNS]),
    respectGitignore: z.boolean().default(true),
    concurrency: z.number().int().min(1).max(256).default(8),
    timeBudgetMs: z.number().int().positive().optional(),
    resolution: z
      .object({
        exact: Strength.default(1),
        sameModule: Strength.default(0.8),
        heuristic: Strength.default(0.5),
      })
      .prefault({}),
    graph: z
      .object({
        dependencyKinds: z
          .array(z.enum(RELATIONSHIP_KINDS))
          .default(() => RELATIONSHIP_KINDS.filter((kind) => kind !== "contains")),
        complexity: z
          .object({
            edges: PositiveWeight.default(1),
            fanOut: PositiveWeight.default(2),
            cycleMembers: PositiveWeight.default(3),
          })
          .prefault({}),
      })
      .prefault({}),
    boundaries: z
      .object({
        minSize: z.number().int().min(1).default(2),
        maxSize: z.number().int().min(1).default(40),
        maxIterations: z.number().int().min(1).default(20),
        useEnclosingScope: z.boolean().default(true),
        rules: z.array(ClassificationRuleSchema).default(() => [...DEFAULT_BOUNDARY_RULES]),
      })
      .prefault({}),
    layers: z
      .object({
        rules: z.array(LayerRuleSchema).default(() => [...DEFAULT_LAYER_RULES]),
      })
      .prefault({}),
    antiPatterns: z
      .object({
        godObjectMethods: z.number().int().positive().default(20),
        highCoupling: z.number().min(0).max(1).default(0.8),
      })
      .prefault({}),
    metrics: z
      .object({
        thresholds: z
          .object({
            averageInstability: z.number().min(0).max(1).default(DEFAULT_METRIC_THRESHOLDS.averageInstability),
            averageCoupling: z.number().min(0).max(1).default(DEFAULT_METRIC_THRESHOLDS.averageCoupling),
            averageCohesion: z.number().min(0).max(1).default(DEFAULT_METRIC_THRESHOLDS.averageCohesion),
            cycleCount: z.number().int().min(0).default(DEFAULT_METRIC_THRESHOLDS.cycleCount),
            density: z.number().min(0).max(1).default(DEFAULT_METRIC_THRESHOLDS.density),
          })
          .prefault({}),
        topN: z.number().int().min(1).default(10),
      })
      .prefault({}),
  })
  .superRefine((config, ctx) => {
    const { exact, sameModule, heuristic } = config.resolution;
    if (!(exact >= sameModule && sameModule >= heuristic)) {
      ctx.addIssue({
        code: "custom",
        message: "strengths must satisfy exact >= sameModule >= heuristic",
        path: ["resolution"],
      });
    }
    if (config.boundaries.minSize > config.boundaries.maxSize) {
      ctx.addIssue({
        code: "custom",
        message: `minSize ${config.boundaries.minSize} exceeds maxSize ${config.boundaries.maxSize}`,
        path: ["boundaries", "minSize"],
      });
    }
    config.boundaries.rules.forEach((rule, index) => {
      const problem = regexProblem(rule.pattern, rule.flags);
      if (problem) ctx.addIssue({ code: "custom", message: problem, path: ["boundaries", "rules", index, "pattern"] });
    });
    config.layers.rules.forEach((rule, index) => {
      const problem = regexProblem(rule.pattern, rule.flags);
      if (problem) ctx.addIssue({ code: "custom", message: problem, path: ["layers", "rules", index, "pattern"] });
    });
  });

export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;
export type ResolvedConfig = z.output<typeof AnalysisConfigSchema>;

function regexProblem(pattern: string, flags: string | undefined): string | undefined {
  try {
    new RegExp(pattern, flags);
    return undefined;
  } catch (error) {
    return error instanceof Error ? error.message : `invalid pattern ${pattern}`;
  }
}

function formatIssue(issue: { path: PropertyKey[]; message: string }): string {
  const location = issue.path.map(String).join(".");
  return location ? `${location}: ${issue.message}` : issue.message;
}

export interface LoadConfigOptions {
  /** Languages the extractor in use can handle. */
  supportedLanguages?: readonly string[];
}

/**
 * Validate raw configuration (usually parsed JSON). The language map is
 * checked against the extractor once the schema itself passes.
 */
export function loadConfig(input: unknown, options: LoadConfigOptions = {}): Result<ResolvedConfig, ConfigurationError> {
  const parsed = AnalysisConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    return Err(new ConfigurationError("Invalid configuration", parsed.error.issues.map(formatIssue)));
  }

  const registry = LanguageRegistry.create(parsed.data.languages, options.supportedLanguages ?? SUPPORTED_LANGUAGES);
  if (!registry.ok) {
    return Err(new ConfigurationError("Invalid configuration", registry.error.issues));
  }
  return Ok(parsed.data);
}
