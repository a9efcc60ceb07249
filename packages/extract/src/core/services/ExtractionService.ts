import path from "node:path";
import pLimit from "p-limit";
import {
  AnalysisCancelledError,
  Err,
  FileAccessError,
  Ok,
  ParseError,
  createLogger,
  diagnosticFromError,
  type Diagnostic,
  type Result,
} from "@archlens/core";
import type { FileExtraction } from "../model.js";
import type { LanguageRegistry } from "../languages.js";
import type { FileSystem } from "../ports/FileSystem.js";
import type { LanguageExtractor } from "../ports/LanguageExtractor.js";

const log = createLogger("extract");

export interface ExtractOptions {
  /** Maximum number of files in flight. */
  concurrency: number;
  /** Checked before each file task starts. */
  signal?: AbortSignal;
  /** Epoch ms; files not started by then are skipped. */
  deadline?: number;
}

export interface FileOutcome {
  readonly filePath: string;
  /** Absent when the file was skipped or failed. */
  readonly extraction?: FileExtraction;
  readonly diagnostics: readonly Diagnostic[];
}

export interface ExtractionBatch {
  /** In the order the files were given. */
  readonly files: readonly FileOutcome[];
}

/**
 * Runs one extraction task per file behind a completion barrier.
 * Tasks share no mutable state; outcomes are reassembled in input order.
 */
export class ExtractionService {
  constructor(
    private readonly registry: LanguageRegistry,
    private readonly extractor: LanguageExtractor,
    private readonly fs: FileSystem
  ) {}

  async extract(
    rootPath: string,
    files: readonly string[],
    options: ExtractOptions
  ): Promise<Result<ExtractionBatch, AnalysisCancelledError>> {
    const limit = pLimit(Math.max(1, options.concurrency));
    let cancelled = false;

    const tasks = files.map((filePath) =>
      limit(async (): Promise<FileOutcome> => {
        if (cancelled || options.signal?.aborted) {
          cancelled = true;
          return { filePath, diagnostics: [] };
        }
        if (options.deadline !== undefined && Date.now() > options.deadline) {
          return {
            filePath,
            diagnostics: [
              {
                severity: "warning",
                code: "time_budget",
                message: "Skipped: extraction time budget exhausted",
                filePath,
              },
            ],
          };
        }
        return this.extractFile(rootPath, filePath);
      })
    );

    const outcomes = await Promise.all(tasks);

    if (cancelled) {
      log.info(`Extraction cancelled after ${outcomes.filter((o) => o.extraction).length} files`);
      return Err(new AnalysisCancelledError("Analysis cancelled during extraction"));
    }
    return Ok({ files: outcomes });
  }

  private async extractFile(rootPath: string, filePath: string): Promise<FileOutcome> {
    const language = this.registry.detect(filePath);
    if (!language) {
      return {
        filePath,
        diagnostics: [
          { severity: "info", code: "unsupported_language", message: "Skipped: no extractor for this extension", filePath },
        ],
      };
    }

    const content = await this.fs.read(path.join(rootPath, filePath));
    if (!content.ok) {
      const error = new FileAccessError(filePath, content.error.cause ?? content.error);
      return { filePath, diagnostics: [diagnosticFromError(error)] };
    }

    const extracted = await this.extractor.extract(content.value, filePath, language);
    if (!extracted.ok) {
      const error = new ParseError(filePath, `Extraction failed: ${extracted.error.message}`);
      return { filePath, diagnostics: [diagnosticFromError(error, "error")] };
    }

    const issues = extracted.value.syntaxIssues;
    const diagnostics: Diagnostic[] = [];
    if (issues.length > 0) {
      const first = issues[0];
      const error = new ParseError(
        filePath,
        `${issues.length} syntax error${issues.length === 1 ? "" : "s"}; recovered ${extracted.value.elements.length} elements`,
        first?.line
      );
      diagnostics.push(diagnosticFromError(error));
    }
    return { filePath, extraction: extracted.value, diagnostics };
  }
}
