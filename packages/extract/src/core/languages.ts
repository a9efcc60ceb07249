import path from "node:path";
import { ConfigurationError, Err, Ok, type Result } from "@archlens/core";

/** Language id -> file extensions (with leading dot). */
export type LanguageMap = Readonly<Record<string, readonly string[]>>;

export const DEFAULT_LANGUAGE_MAP: LanguageMap = {
  typescript: [".ts", ".mts", ".cts"],
  tsx: [".tsx"],
  javascript: [".js", ".jsx", ".mjs", ".cjs"],
  python: [".py", ".pyi"],
  go: [".go"],
  java: [".java"],
  rust: [".rs"],
};

/**
 * Extension-based language selection over a configurable map.
 */
export class LanguageRegistry {
  private constructor(private readonly byExtension: ReadonlyMap<string, string>) {}

  /**
   * Validate the map against the languages an extractor can handle.
   */
  static create(
    map: LanguageMap,
    supportedLanguages: readonly string[]
  ): Result<LanguageRegistry, ConfigurationError> {
    const issues: string[] = [];
    const supported = new Set(supportedLanguages);
    const byExtension = new Map<string, string>();

    for (const [language, extensions] of Object.entries(map)) {
      if (!supported.has(language)) {
        issues.push(`languages.${language}: no extractor for this language`);
        continue;
      }
      for (const raw of extensions) {
        const extension = raw.toLowerCase();
        if (!/^\.[a-z0-9_+-]+$/.test(extension)) {
          issues.push(`languages.${language}: invalid extension "${raw}"`);
          continue;
        }
        const owner = byExtension.get(extension);
        if (owner !== undefined && owner !== language) {
          issues.push(`languages.${language}: extension ${extension} already mapped to ${owner}`);
          continue;
        }
        byExtension.set(extension, language);
      }
    }

    if (issues.length > 0) {
      return Err(new ConfigurationError("Invalid language map", issues));
    }
    return Ok(new LanguageRegistry(byExtension));
  }

  detect(filePath: string): string | undefined {
    return this.byExtension.get(path.extname(filePath).toLowerCase());
  }

  languages(): string[] {
    return [...new Set(this.byExtension.values())].sort();
  }
}
