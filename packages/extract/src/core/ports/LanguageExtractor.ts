import type { Result } from "@archlens/core";
import type { FileExtraction } from "../model.js";

/**
 * Port for per-language structural extraction.
 */
export interface LanguageExtractor {
  /** Language ids this extractor can handle. */
  readonly languages: readonly string[];

  /**
   * Produce the ordered elements of one file with their raw references.
   * Malformed syntax is not a failure: recovered structure is returned along
   * with the syntax issues found.
   */
  extract(source: string, filePath: string, language: string): Promise<Result<FileExtraction, Error>>;
}
