import path from "node:path";
import { describe, it, expect, beforeEach } from "vitest";
import { AnalysisCancelledError, ConfigurationError, Err, FileAccessError, Ok, type Result } from "@archlens/core";
import {
  REFERENCE_KINDS,
  contentHash,
  type Element,
  type FileExtraction,
  type FileSystem,
  type LanguageExtractor,
  type ProjectScanner,
  type RawReference,
  type ScanResult,
  type SyntaxIssue,
} from "@archlens/extract";
import { AnalysisOrchestrator } from "../src/core/services/AnalysisOrchestrator.js";
import { loadConfig } from "../src/core/config.js";
import type { AnalysisResult } from "../src/core/model.js";
import { canonicalJson } from "../src/core/services/resultDiff.js";

const ROOT = "/repo";

/** Files keyed by root-relative path; `vendor/` is ignored by the scan. */
class MemoryProject implements FileSystem, ProjectScanner {
  readonly files: Map<string, string>;

  constructor(files: Record<string, string>) {
    this.files = new Map(Object.entries(files));
  }

  async read(filePath: string): Promise<Result<string, FileAccessError>> {
    const content = this.files.get(path.posix.relative(ROOT, filePath));
    return content === undefined ? Err(new FileAccessError(filePath, new Error("ENOENT"))) : Ok(content);
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(path.posix.relative(ROOT, filePath));
  }

  async scan(): Promise<Result<ScanResult, FileAccessError>> {
    const isIgnored = (relativePath: string) => relativePath.startsWith("vendor/");
    return Ok({ files: [...this.files.keys()].filter((p) => !isIgnored(p)).sort(), isIgnored });
  }
}

/**
 * One element per line: `fn name [refKind target]...` or `class Name ...`.
 * A line of `!!` is a syntax error. Every file also gets a module element.
 */
class LineExtractor implements LanguageExtractor {
  readonly languages = ["typescript"];
  readonly calls: string[] = [];

  async extract(source: string, filePath: string, language: string): Promise<Result<FileExtraction, Error>> {
    this.calls.push(filePath);
    const module = filePath.replace(/\.ts$/, "").split("/").join(".");
    const lines = source.split("\n");
    const moduleId = `${filePath}::module`;
    const base = { language, filePath, module, visibility: "public" as const, modifiers: [], metadata: {} };
    const elements: Element[] = [
      {
        ...base,
        id: moduleId,
        name: module.split(".").pop() ?? module,
        qualifiedName: module,
        kind: "module",
        startLine: 1,
        endLine: lines.length,
        references: [],
      },
    ];
    const syntaxIssues: SyntaxIssue[] = [];

    lines.forEach((line, index) => {
      const [keyword, name, ...rest] = line.trim().split(/\s+/);
      if (keyword === "!!") {
        syntaxIssues.push({ line: index + 1, column: 1, message: "Unexpected token" });
        return;
      }
      if (name === undefined || (keyword !== "fn" && keyword !== "class")) return;

      const references: RawReference[] = [];
      for (let i = 0; i + 1 < rest.length; i += 2) {
        const refKind = REFERENCE_KINDS.find((k) => k === rest[i]);
        const target = rest[i + 1];
        if (refKind && target) references.push({ kind: refKind, target, line: index + 1 });
      }
      const kind = keyword === "fn" ? "function" : "class";
      elements.push({
        ...base,
        id: `${filePath}::${kind}:${module}.${name}`,
        name,
        qualifiedName: `${module}.${name}`,
        kind,
        startLine: index + 1,
        endLine: index + 1,
        parentId: moduleId,
        references,
      });
    });

    return Ok({ filePath, language, contentHash: contentHash(source), elements, syntaxIssues });
  }
}

function initialFiles(): Record<string, string> {
  return {
    "app/main.ts": "fn main calls billing.invoice.total calls log",
    "billing/invoice.ts": "fn total calls tax\nfn tax",
    "util/log.ts": "fn log",
    "README.md": "# readme",
    "vendor/lib.ts": "fn vendored",
  };
}

function createOrchestrator(project: MemoryProject, extractor = new LineExtractor()): AnalysisOrchestrator {
  const config = loadConfig({ languages: { typescript: [".ts"] } }, { supportedLanguages: ["typescript"] });
  if (!config.ok) throw config.error;
  const orchestrator = AnalysisOrchestrator.create(config.value, {
    scanner: project,
    fs: project,
    extractor,
    clock: () => new Date("2026-01-02T03:04:05.000Z"),
  });
  if (!orchestrator.ok) throw orchestrator.error;
  return orchestrator.value;
}

/** Everything except version, mode, timestamp and the graph object. */
function stable(result: AnalysisResult): string {
  return canonicalJson({
    rootPath: result.rootPath,
    elements: result.elements,
    relationships: result.relationships,
    boundaries: result.boundaries,
    unassigned: result.unassigned,
    layers: result.layers,
    antiPatterns: result.antiPatterns,
    languageCounts: result.languageCounts,
    metrics: result.metrics,
    diagnostics: result.diagnostics,
  });
}

async function run(promise: Promise<Result<AnalysisResult, Error>>): Promise<AnalysisResult> {
  const result = await promise;
  if (!result.ok) throw result.error;
  return result.value;
}

const MAIN = "app/main.ts::function:app.main.main";
const TOTAL = "billing/invoice.ts::function:billing.invoice.total";

describe("AnalysisOrchestrator", () => {
  let project: MemoryProject;

  beforeEach(() => {
    project = new MemoryProject(initialFiles());
  });

  describe("create", () => {
    it("rejects languages the extractor cannot handle", () => {
      const config = loadConfig({ languages: { python: [".py"] } }, { supportedLanguages: ["python"] });
      if (!config.ok) throw config.error;

      const created = AnalysisOrchestrator.create(config.value, {
        scanner: project,
        fs: project,
        extractor: new LineExtractor(),
      });
      expect(created.ok).toBe(false);
      if (created.ok) return;
      expect(created.error).toBeInstanceOf(ConfigurationError);
      expect(created.error.issues).toEqual(["languages.python: no extractor for this language"]);
    });
  });

  describe("runFull", () => {
    it("publishes a complete first version", async () => {
      const result = await run(createOrchestrator(project).runFull(ROOT));

      expect(result.version).toBe(1);
      expect(result.mode).toBe("full");
      expect(result.rootPath).toBe(ROOT);
      expect(result.createdAt).toBe("2026-01-02T03:04:05.000Z");
      expect(result.languageCounts).toEqual({ typescript: { files: 3, elements: 7 } });
      expect(result.elements.some((e) => e.filePath.startsWith("vendor/"))).toBe(false);
    });

    it("keeps ids unique and strengths within bounds", async () => {
      const result = await run(createOrchestrator(project).runFull(ROOT));
      const ids = result.elements.map((e) => e.id);

      expect(new Set(ids).size).toBe(ids.length);
      expect(ids).toEqual([...ids].sort());
      for (const r of result.relationships) {
        expect(r.strength).toBeGreaterThanOrEqual(0);
        expect(r.strength).toBeLessThanOrEqual(1);
        expect(ids).toContain(r.sourceId);
        expect(ids).toContain(r.targetId);
      }
    });

    it("resolves references across files", async () => {
      const result = await run(createOrchestrator(project).runFull(ROOT));
      const fromMain = result.relationships.filter((r) => r.sourceId === MAIN);

      expect(fromMain.map((r) => [r.targetId, r.strength, r.metadata.resolution])).toEqual([
        [TOTAL, 1, "exact"],
        ["util/log.ts::function:util.log.log", 0.5, "heuristic"],
      ]);
    });

    it("records skipped files as diagnostics", async () => {
      project.files.set("broken.ts", "fn ok\n!!");
      const result = await run(createOrchestrator(project).runFull(ROOT));

      expect(result.diagnostics).toContainEqual({
        severity: "info",
        code: "unsupported_language",
        message: "Skipped: no extractor for this extension",
        filePath: "README.md",
      });
      expect(result.diagnostics.find((d) => d.filePath === "broken.ts")?.message).toBe(
        "1 syntax error; recovered 2 elements"
      );
      expect(result.elements.map((e) => e.id)).toContain("broken.ts::function:broken.ok");
    });

    it("gives the same result for the same input", async () => {
      const first = await run(createOrchestrator(project).runFull(ROOT));
      const second = await run(createOrchestrator(project).runFull(ROOT));
      expect(stable(second)).toBe(stable(first));
    });

    it("keeps the previous result when cancelled", async () => {
      const orchestrator = createOrchestrator(project);
      const first = await run(orchestrator.runFull(ROOT));

      const controller = new AbortController();
      controller.abort();
      const cancelled = await orchestrator.runFull(ROOT, { signal: controller.signal });

      expect(cancelled.ok).toBe(false);
      expect(!cancelled.ok && cancelled.error).toBeInstanceOf(AnalysisCancelledError);
      expect(orchestrator.current()).toBe(first);
    });

    it("skips files once the time budget is spent", async () => {
      // A negative budget is already spent before the first file starts
      const result = await run(createOrchestrator(project).runFull(ROOT, { timeBudgetMs: -1 }));

      expect(result.elements).toEqual([]);
      expect(result.diagnostics.filter((d) => d.code === "time_budget")).toHaveLength(4);
    });
  });

  describe("runIncremental", () => {
    it("needs a full run first", async () => {
      const result = await createOrchestrator(project).runIncremental(["app/main.ts"]);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ConfigurationError);
      expect(result.error.message).toBe("No previous analysis; run a full analysis first");
    });

    it("matches a full run over the changed tree", async () => {
      const orchestrator = createOrchestrator(project);
      await run(orchestrator.runFull(ROOT));

      project.files.set("util/log.ts", "fn log\nfn warn calls log");
      project.files.set("util/fmt.ts", "fn fmt");
      project.files.delete("billing/invoice.ts");
      const incremental = await run(
        orchestrator.runIncremental([
          "util/log.ts",
          "/repo/util/fmt.ts",
          "billing/invoice.ts",
          "vendor/lib.ts",
          "../outside.ts",
        ])
      );
      const full = await run(createOrchestrator(project).runFull(ROOT));

      expect(incremental.version).toBe(2);
      expect(incremental.mode).toBe("incremental");
      expect(stable(incremental)).toBe(stable(full));
      expect(incremental.relationships.find((r) => r.sourceId === MAIN && r.kind === "calls")?.targetId).toBe(
        "external:billing.invoice.total"
      );
    });

    it("does not re-extract files whose content is unchanged", async () => {
      const extractor = new LineExtractor();
      const orchestrator = createOrchestrator(project, extractor);
      const first = await run(orchestrator.runFull(ROOT));
      extractor.calls.length = 0;

      const second = await run(orchestrator.runIncremental(["util/log.ts"]));

      expect(extractor.calls).toEqual([]);
      expect(second.version).toBe(2);
      expect(stable(second)).toBe(stable(first));
    });
  });

  describe("diff", () => {
    it("needs a result", () => {
      expect(createOrchestrator(project).diff().ok).toBe(false);
    });

    it("compares the last two versions", async () => {
      const orchestrator = createOrchestrator(project);
      await run(orchestrator.runFull(ROOT));
      project.files.set("util/log.ts", "fn log\nfn warn calls log");
      project.files.set("util/fmt.ts", "fn fmt");
      project.files.delete("billing/invoice.ts");
      await run(orchestrator.runIncremental(["util/log.ts", "util/fmt.ts", "billing/invoice.ts"]));

      const diff = orchestrator.diff();
      expect(diff.ok).toBe(true);
      if (!diff.ok) return;
      expect(diff.value.fromVersion).toBe(1);
      expect(diff.value.toVersion).toBe(2);
      expect(diff.value.elements.added).toEqual([
        "external:billing.invoice.total",
        "util/fmt.ts::function:util.fmt.fmt",
        "util/fmt.ts::module",
        "util/log.ts::function:util.log.warn",
      ]);
      expect(diff.value.elements.removed).toEqual([
        "billing/invoice.ts::function:billing.invoice.tax",
        TOTAL,
        "billing/invoice.ts::module",
      ]);
    });
  });

  describe("applyLabels", () => {
    it("rejects malformed labels", async () => {
      const orchestrator = createOrchestrator(project);
      await run(orchestrator.runFull(ROOT));

      const result = await orchestrator.applyLabels([{ elementId: MAIN, label: "Entry", confidence: 2 }]);
      expect(result.ok).toBe(false);
      expect(!result.ok && result.error.message.startsWith("Invalid labels")).toBe(true);
      expect(orchestrator.current()?.version).toBe(1);
    });

    it("labels known elements and warns about the rest", async () => {
      const orchestrator = createOrchestrator(project);
      const before = await run(orchestrator.runFull(ROOT));

      const outcome = await orchestrator.applyLabels([
        { elementId: MAIN, label: "Entry", confidence: 0.9 },
        { elementId: "nope", label: "Ghost", confidence: 0.5 },
      ]);
      if (!outcome.ok) throw outcome.error;
      const { result, applied, unknown } = outcome.value;

      expect(applied).toBe(1);
      expect(unknown).toEqual(["nope"]);
      expect(result.version).toBe(2);
      expect(result.mode).toBe("labels");
      expect(result.elements.find((e) => e.id === MAIN)?.metadata["label"]).toEqual({ label: "Entry", confidence: 0.9 });
      expect(result.relationships).toBe(before.relationships);
      expect(result.boundaries).toBe(before.boundaries);
      expect(result.diagnostics).toContainEqual({
        severity: "warning",
        code: "label_unknown_element",
        message: "No element nope to label",
        elementId: "nope",
      });
    });

    it("keeps labels across later runs", async () => {
      const orchestrator = createOrchestrator(project);
      await run(orchestrator.runFull(ROOT));
      await orchestrator.applyLabels([{ elementId: MAIN, label: "Entry", confidence: 0.9 }]);

      const next = await run(orchestrator.runFull(ROOT));
      expect(next.version).toBe(3);
      expect(next.elements.find((e) => e.id === MAIN)?.metadata["label"]).toEqual({ label: "Entry", confidence: 0.9 });
    });
  });
});
