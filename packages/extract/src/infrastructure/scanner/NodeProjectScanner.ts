import { readFile } from "node:fs/promises";
import path from "node:path";
import { glob } from "glob";
import micromatch from "micromatch";
import { Err, FileAccessError, Ok, createLogger, type Result } from "@archlens/core";
import type { ProjectScanner, ScanOptions, ScanResult } from "../../core/ports/ProjectScanner.js";

const log = createLogger("scanner");

export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  "**/node_modules/**",
  "**/.git/**",
  "**/__pycache__/**",
  "**/dist/**",
  "**/build/**",
  "**/target/**",
  "**/venv/**",
  "**/.venv/**",
  "**/coverage/**",
  "**/*.pyc",
  "**/*.min.js",
];

// Child path used to ask "is everything below this directory ignored?"
const CHILD_MARKER = "__archlens_child__";

/**
 * Turn one gitignore-style line into micromatch globs.
 * `build` -> `**\/build`, `**\/build/**`; `/out/` -> `out`, `out/**`.
 * Negations are not supported and are skipped.
 */
export function expandIgnorePattern(line: string): string[] {
  let pattern = line.trim().replace(/\\/g, "/");
  if (!pattern || pattern.startsWith("#") || pattern.startsWith("!")) {
    return [];
  }
  pattern = pattern.replace(/\/+$/, "");
  const anchored = pattern.includes("/");
  pattern = pattern.replace(/^\/+/, "");
  if (!pattern) return [];
  const base = anchored ? pattern : `**/${pattern}`;
  return base.endsWith("/**") ? [base] : [base, `${base}/**`];
}

export function createIgnoreMatcher(patterns: readonly string[]): (relativePath: string) => boolean {
  const globs = [...new Set(patterns.flatMap(expandIgnorePattern))];
  return (relativePath) =>
    globs.length > 0 && micromatch.isMatch(relativePath.replace(/\\/g, "/"), globs, { dot: true });
}

/**
 * Node.js implementation of ProjectScanner on top of glob.
 * The same matcher prunes the walk and answers isIgnored afterwards.
 */
export class NodeProjectScanner implements ProjectScanner {
  async scan(rootPath: string, options: ScanOptions): Promise<Result<ScanResult, FileAccessError>> {
    const patterns = [...options.ignorePatterns];
    if (options.respectGitignore) {
      patterns.push(...(await this.loadGitignore(rootPath)));
    }
    const isIgnored = createIgnoreMatcher(patterns);

    try {
      const files = await glob("**/*", {
        cwd: rootPath,
        nodir: true,
        dot: true,
        posix: true,
        ignore: {
          ignored: (p) => isIgnored(p.relativePosix()),
          childrenIgnored: (p) => {
            const relative = p.relativePosix();
            return relative !== "" && (isIgnored(relative) || isIgnored(`${relative}/${CHILD_MARKER}`));
          },
        },
      });
      files.sort();
      log.debug(`Scanned ${rootPath}: ${files.length} files`);
      return Ok({ files, isIgnored });
    } catch (error) {
      return Err(new FileAccessError(rootPath, error));
    }
  }

  private async loadGitignore(rootPath: string): Promise<string[]> {
    try {
      const content = await readFile(path.join(rootPath, ".gitignore"), "utf-8");
      return content.split(/\r?\n/);
    } catch {
      return [];
    }
  }
}
