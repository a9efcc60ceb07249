import { createHash } from "node:crypto";
import { Err, Ok, toError, type Result } from "@archlens/core";
import Parser from "tree-sitter";

import type { FileExtraction } from "../../core/model.js";
import type { LanguageExtractor } from "../../core/ports/LanguageExtractor.js";
import { ElementCollector } from "./ElementCollector.js";
import { moduleNameFor } from "./modulePaths.js";
import { collectSyntaxIssues } from "./syntaxIssues.js";
import { walkGo } from "./walkers/GoWalker.js";
import { walkJava } from "./walkers/JavaWalker.js";
import { walkPython } from "./walkers/PythonWalker.js";
import { walkRust } from "./walkers/RustWalker.js";
import { walkTypeScript } from "./walkers/TypeScriptWalker.js";
import type { Walker } from "./walkers/shared.js";

// Grammar objects are opaque; Parser.setLanguage takes them untyped.
type TreeSitterLanguage = unknown;

type GrammarLoader = () => Promise<TreeSitterLanguage>;

const GRAMMAR_LOADERS: Record<string, GrammarLoader> = {
  typescript: async () => {
    const mod = await import("tree-sitter-typescript");
    return mod.default.typescript;
  },
  tsx: async () => {
    const mod = await import("tree-sitter-typescript");
    return mod.default.tsx;
  },
  javascript: async () => {
    const mod = await import("tree-sitter-javascript");
    return mod.default;
  },
  python: async () => {
    const mod = await import("tree-sitter-python");
    return mod.default;
  },
  go: async () => {
    const mod = await import("tree-sitter-go");
    return mod.default;
  },
  java: async () => {
    const mod = await import("tree-sitter-java");
    return mod.default;
  },
  rust: async () => {
    const mod = await import("tree-sitter-rust");
    return mod.default;
  },
};

const WALKERS: Record<string, Walker> = {
  typescript: walkTypeScript,
  tsx: walkTypeScript,
  javascript: walkTypeScript,
  python: walkPython,
  go: walkGo,
  java: walkJava,
  rust: walkRust,
};

export const SUPPORTED_LANGUAGES: readonly string[] = Object.keys(WALKERS);

export function contentHash(source: string): string {
  return createHash("sha256").update(source).digest("hex");
}

/**
 * Tree-sitter based extractor for every supported language.
 *
 * setLanguage and parse run back to back without an await between them,
 * so one parser instance is safe to share between concurrent file tasks.
 */
export class TreeSitterExtractor implements LanguageExtractor {
  readonly languages = SUPPORTED_LANGUAGES;

  private readonly parser = new Parser();
  private readonly grammars = new Map<string, Promise<TreeSitterLanguage>>();

  async extract(source: string, filePath: string, language: string): Promise<Result<FileExtraction, Error>> {
    const walker = WALKERS[language];
    const loader = GRAMMAR_LOADERS[language];
    if (!walker || !loader) {
      return Err(new Error(`No extractor for language "${language}" (${filePath})`));
    }

    try {
      const grammar = await this.grammar(language, loader);
      this.parser.setLanguage(grammar);
      const tree = this.parser.parse(source, undefined, {
        bufferSize: Math.max(32 * 1024, Buffer.byteLength(source, "utf8") * 2),
      });

      const lineCount = source.length === 0 ? 1 : source.split("\n").length;
      const collector = new ElementCollector(filePath, language, moduleNameFor(filePath, language), lineCount);
      walker(tree.rootNode, collector);

      return Ok({
        filePath,
        language,
        contentHash: contentHash(source),
        elements: collector.finish(),
        syntaxIssues: collectSyntaxIssues(tree.rootNode),
      });
    } catch (error) {
      return Err(toError(error));
    }
  }

  private grammar(language: string, loader: GrammarLoader): Promise<TreeSitterLanguage> {
    let pending = this.grammars.get(language);
    if (!pending) {
      pending = loader();
      this.grammars.set(language, pending);
    }
    return pending;
  }
}
