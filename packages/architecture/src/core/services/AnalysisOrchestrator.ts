/**
 * Drives a run end to end: scan, extract, resolve, graph, boundaries,
 * layers, anti-patterns, metrics, publish. Every stage after extraction is
 * synchronous over an immutable snapshot.
 */

import path from "node:path";
import {
  type AnalysisError,
  ConfigurationError,
  type Diagnostic,
  Err,
  Ok,
  type Result,
  createLogger,
  sortDiagnostics,
  tryCatch,
} from "@archlens/core";
import {
  type Element,
  type ExtractOptions,
  ExtractionService,
  type FileExtraction,
  type FileSystem,
  type LanguageExtractor,
  LanguageRegistry,
  type ProjectScanner,
  contentHash,
} from "@archlens/extract";
import type { ResolvedConfig } from "../config.js";
import type { AnalysisMode, AnalysisResult, ElementLabel, LanguageCount } from "../model.js";
import { AnalysisHandle } from "./AnalysisHandle.js";
import { AntiPatternDetector } from "./AntiPatternDetector.js";
import { type BoundaryDetection, BoundaryDetector } from "./BoundaryDetector.js";
import { DependencyGraph } from "./DependencyGraph.js";
import { LayerDetector } from "./LayerDetector.js";
import { buildMetricsReport } from "./MetricsReport.js";
import { PatternClassifier } from "./PatternClassifier.js";
import { type Resolution, RelationshipResolver } from "./RelationshipResolver.js";
import { LabelBatchSchema, toElementLabel, withLabel } from "./labels.js";
import { type ResultDiff, diffResults } from "./resultDiff.js";

const log = createLogger("orchestrator");

export interface OrchestratorDeps {
  scanner: ProjectScanner;
  fs: FileSystem;
  extractor: LanguageExtractor;
  handle?: AnalysisHandle;
  /** Source of `createdAt`; defaults to the wall clock. */
  clock?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Overrides `timeBudgetMs` from the configuration for this run. */
  timeBudgetMs?: number;
}

export interface LabelOutcome {
  result: AnalysisResult;
  applied: number;
  unknown: string[];
}

/** What a run leaves behind for the next incremental run. */
interface RunState {
  rootPath: string;
  isIgnored: (relativePath: string) => boolean;
  extractions: ReadonlyMap<string, FileExtraction>;
  fileDiagnostics: ReadonlyMap<string, readonly Diagnostic[]>;
  resolution: Resolution;
  graph: DependencyGraph;
  detection: BoundaryDetection;
}

interface Reuse {
  state: RunState;
  changedFiles: ReadonlySet<string>;
  changedElementIds: ReadonlySet<string>;
}

interface Snapshot {
  rootPath: string;
  isIgnored: (relativePath: string) => boolean;
  extractions: ReadonlyMap<string, FileExtraction>;
  fileDiagnostics: ReadonlyMap<string, readonly Diagnostic[]>;
}

function byPath<T>(map: ReadonlyMap<string, T>): T[] {
  return [...map.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, value]) => value);
}

export class AnalysisOrchestrator {
  private state: RunState | undefined;
  private readonly labels = new Map<string, ElementLabel>();
  private readonly handle: AnalysisHandle;
  private readonly clock: () => Date;

  private constructor(
    private readonly config: ResolvedConfig,
    private readonly deps: OrchestratorDeps,
    private readonly extraction: ExtractionService,
    private readonly resolver: RelationshipResolver,
    private readonly boundaryDetector: BoundaryDetector,
    private readonly layerDetector: LayerDetector,
    private readonly antiPatternDetector: AntiPatternDetector
  ) {
    this.handle = deps.handle ?? new AnalysisHandle();
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Check the configuration against the extractor and compile the rule
   * tables. Nothing runs until this succeeds.
   */
  static create(config: ResolvedConfig, deps: OrchestratorDeps): Result<AnalysisOrchestrator, ConfigurationError> {
    const registry = LanguageRegistry.create(config.languages, deps.extractor.languages);
    if (!registry.ok) return registry;

    const compiled = tryCatch(() => ({
      classifier: new PatternClassifier(config.boundaries.rules, {
        useEnclosingScope: config.boundaries.useEnclosingScope,
      }),
      layers: new LayerDetector(config.layers.rules),
    }));
    if (!compiled.ok) {
      return Err(new ConfigurationError("Invalid configuration", [compiled.error.message]));
    }

    return Ok(
      new AnalysisOrchestrator(
        config,
        deps,
        new ExtractionService(registry.value, deps.extractor, deps.fs),
        new RelationshipResolver(config.resolution),
        new BoundaryDetector(compiled.value.classifier, {
          minSize: config.boundaries.minSize,
          maxSize: config.boundaries.maxSize,
          maxIterations: config.boundaries.maxIterations,
        }),
        compiled.value.layers,
        new AntiPatternDetector(config.antiPatterns)
      )
    );
  }

  current(): AnalysisResult | undefined {
    return this.handle.current();
  }

  previous(): AnalysisResult | undefined {
    return this.handle.previous();
  }

  // --- Runs ---

  runFull(rootPath: string, options: RunOptions = {}): Promise<Result<AnalysisResult, AnalysisError>> {
    const root = path.resolve(rootPath);
    return this.handle.publish<AnalysisError>(async (version) => {
      const started = Date.now();
      log.info(`Full run v${version} started at ${root}`);

      const scan = await this.deps.scanner.scan(root, {
        ignorePatterns: this.config.ignorePatterns,
        respectGitignore: this.config.respectGitignore,
      });
      if (!scan.ok) return scan;

      const batch = await this.extraction.extract(root, scan.value.files, this.extractOptions(options));
      if (!batch.ok) {
        log.warn(`Full run v${version} cancelled; keeping v${this.handle.version}`);
        return batch;
      }

      const extractions = new Map<string, FileExtraction>();
      const fileDiagnostics = new Map<string, readonly Diagnostic[]>();
      for (const outcome of batch.value.files) {
        if (outcome.extraction) extractions.set(outcome.filePath, outcome.extraction);
        if (outcome.diagnostics.length > 0) fileDiagnostics.set(outcome.filePath, outcome.diagnostics);
      }

      const result = this.analyse(
        { rootPath: root, isIgnored: scan.value.isIgnored, extractions, fileDiagnostics },
        "full",
        version
      );
      this.logFinished(result, started);
      return Ok(result);
    });
  }

  /**
   * Re-analyse after the given files changed. Paths may be absolute or
   * relative to the analysed root; paths outside it or ignored are dropped.
   */
  runIncremental(
    changedFiles: readonly string[],
    options: RunOptions = {}
  ): Promise<Result<AnalysisResult, AnalysisError>> {
    return this.handle.publish<AnalysisError>(async (version) => {
      const state = this.state;
      if (!state) {
        return Err(new ConfigurationError("No previous analysis; run a full analysis first"));
      }
      const started = Date.now();
      const paths = this.normalisePaths(state, changedFiles);
      log.info(`Incremental run v${version} started for ${paths.length} file(s)`);

      const removed: string[] = [];
      const toExtract: string[] = [];
      for (const relative of paths) {
        const absolute = path.join(state.rootPath, relative);
        if (!(await this.deps.fs.exists(absolute))) {
          removed.push(relative);
          continue;
        }
        const known = state.extractions.get(relative);
        if (known) {
          const content = await this.deps.fs.read(absolute);
          if (content.ok && contentHash(content.value) === known.contentHash) continue;
        }
        toExtract.push(relative);
      }

      const batch = await this.extraction.extract(state.rootPath, toExtract, this.extractOptions(options));
      if (!batch.ok) {
        log.warn(`Incremental run v${version} cancelled; keeping v${this.handle.version}`);
        return batch;
      }

      const extractions = new Map(state.extractions);
      const fileDiagnostics = new Map(state.fileDiagnostics);
      const changedElementIds = new Set<string>();
      const touchedFiles = [...removed, ...batch.value.files.map((f) => f.filePath)];
      for (const filePath of touchedFiles) {
        for (const element of extractions.get(filePath)?.elements ?? []) changedElementIds.add(element.id);
        extractions.delete(filePath);
        fileDiagnostics.delete(filePath);
      }
      for (const outcome of batch.value.files) {
        if (outcome.extraction) {
          extractions.set(outcome.filePath, outcome.extraction);
          for (const element of outcome.extraction.elements) changedElementIds.add(element.id);
        }
        if (outcome.diagnostics.length > 0) fileDiagnostics.set(outcome.filePath, outcome.diagnostics);
      }

      const result = this.analyse(
        { rootPath: state.rootPath, isIgnored: state.isIgnored, extractions, fileDiagnostics },
        "incremental",
        version,
        { state, changedFiles: new Set(touchedFiles), changedElementIds }
      );
      log.debug(`Removed ${removed.length}, re-extracted ${toExtract.length}, unchanged ${paths.length - removed.length - toExtract.length}`);
      this.logFinished(result, started);
      return Ok(result);
    });
  }

  /**
   * Merge external labels into `metadata.label`. Labels stick to their
   * element ids and are re-applied by later runs.
   */
  applyLabels(input: unknown): Promise<Result<LabelOutcome, AnalysisError>> {
    const parsed = LabelBatchSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`);
      return Promise.resolve(Err(new ConfigurationError("Invalid labels", issues)));
    }

    let applied = 0;
    const unknownIds: string[] = [];
    const published = this.handle.publish<AnalysisError>(async (version, current) => {
      if (!current) return Err(new ConfigurationError("No analysis to label; run a full analysis first"));

      const known = new Set(current.elements.map((e) => e.id));
      const warnings: Diagnostic[] = [];
      for (const input of parsed.data) {
        if (!known.has(input.elementId)) {
          unknownIds.push(input.elementId);
          warnings.push({
            severity: "warning",
            code: "label_unknown_element",
            message: `No element ${input.elementId} to label`,
            elementId: input.elementId,
          });
          continue;
        }
        this.labels.set(input.elementId, toElementLabel(input));
        applied++;
      }

      const labelled: AnalysisResult = {
        ...current,
        version,
        mode: "labels",
        createdAt: this.clock().toISOString(),
        elements: current.elements.map((e) => withLabel(e, this.labels.get(e.id))),
        diagnostics: sortDiagnostics([
          ...current.diagnostics.filter((d) => d.code !== "label_unknown_element"),
          ...warnings,
        ]),
      };
      return Ok(labelled);
    });

    return published.then((result) => (result.ok ? Ok({ result: result.value, applied, unknown: unknownIds }) : result));
  }

  /** Defaults to the handle's previous and current results. */
  diff(previous?: AnalysisResult, current?: AnalysisResult): Result<ResultDiff, ConfigurationError> {
    const to = current ?? this.handle.current();
    if (!to) return Err(new ConfigurationError("No analysis to compare; run a full analysis first"));
    return Ok(diffResults(previous ?? (current ? undefined : this.handle.previous()), to));
  }

  // --- Pipeline ---

  private extractOptions(options: RunOptions): ExtractOptions {
    const budget = options.timeBudgetMs ?? this.config.timeBudgetMs;
    return {
      concurrency: this.config.concurrency,
      ...(options.signal ? { signal: options.signal } : {}),
      ...(budget !== undefined ? { deadline: Date.now() + budget } : {}),
    };
  }

  private normalisePaths(state: RunState, changedFiles: readonly string[]): string[] {
    const paths = new Set<string>();
    for (const raw of changedFiles) {
      const relative = path.isAbsolute(raw) ? path.relative(state.rootPath, raw) : raw;
      const posix = path.posix.normalize(relative.split(path.sep).join("/"));
      if (!posix || posix === "." || posix.startsWith("../") || posix === ".." || path.posix.isAbsolute(posix)) {
        log.debug(`Dropped ${raw}: outside ${state.rootPath}`);
        continue;
      }
      if (state.isIgnored(posix)) {
        log.debug(`Dropped ${raw}: ignored`);
        continue;
      }
      paths.add(posix);
    }
    return [...paths].sort();
  }

  /**
   * Everything after extraction. Reuse only skips work: the result equals
   * what a run without it would produce.
   */
  private analyse(snapshot: Snapshot, mode: AnalysisMode, version: number, reuse?: Reuse): AnalysisResult {
    const extractions = byPath(snapshot.extractions);
    const base: Element[] = extractions.flatMap((extraction) => [...extraction.elements]);

    const resolution = reuse
      ? this.resolver.resolveIncremental(reuse.state.resolution, base, reuse.changedFiles)
      : this.resolver.resolve(base);
    const elements = [...base, ...resolution.externals];

    const { graph, diagnostics: graphDiagnostics } = DependencyGraph.build(elements, resolution.relationships, {
      dependencyKinds: this.config.graph.dependencyKinds,
      complexity: this.config.graph.complexity,
      ...(reuse ? { previous: reuse.state.graph, touched: reuse.changedElementIds } : {}),
    });

    const detection = this.boundaryDetector.detect(
      elements,
      resolution.relationships,
      graph,
      reuse
        ? { previous: reuse.state.detection, previousGraph: reuse.state.graph, changedElementIds: reuse.changedElementIds }
        : undefined
    );
    const layers = this.layerDetector.detect(elements, graph);
    const antiPatterns = this.antiPatternDetector.detect(base, graph, detection.boundaries, layers);
    const metrics = buildMetricsReport(graph, detection.boundaries, this.config.metrics);

    const languageCounts: Record<string, LanguageCount> = {};
    for (const extraction of extractions) {
      const count = languageCounts[extraction.language] ?? { files: 0, elements: 0 };
      languageCounts[extraction.language] = {
        files: count.files + 1,
        elements: count.elements + extraction.elements.length,
      };
    }

    this.state = {
      rootPath: snapshot.rootPath,
      isIgnored: snapshot.isIgnored,
      extractions: snapshot.extractions,
      fileDiagnostics: snapshot.fileDiagnostics,
      resolution,
      graph,
      detection,
    };

    return {
      version,
      rootPath: snapshot.rootPath,
      mode,
      createdAt: this.clock().toISOString(),
      elements: elements
        .map((e) => withLabel(e, this.labels.get(e.id)))
        .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)),
      relationships: resolution.relationships,
      boundaries: detection.boundaries,
      unassigned: detection.unassigned,
      layers,
      antiPatterns,
      languageCounts,
      metrics,
      diagnostics: sortDiagnostics([...byPath(snapshot.fileDiagnostics).flat(), ...graphDiagnostics]),
      graph,
    };
  }

  private logFinished(result: AnalysisResult, started: number): void {
    log.info(
      `${result.mode} run v${result.version} finished: ${result.elements.length} elements, ` +
        `${result.relationships.length} relationships, ${result.boundaries.length} boundaries, ` +
        `${result.diagnostics.length} diagnostics in ${Date.now() - started}ms`
    );
  }
}
