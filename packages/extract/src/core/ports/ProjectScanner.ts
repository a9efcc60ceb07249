import type { FileAccessError, Result } from "@archlens/core";

export interface ScanOptions {
  /** Glob patterns matched against root-relative paths. */
  ignorePatterns: readonly string[];
  /** Add the root .gitignore to the ignore set. */
  respectGitignore: boolean;
}

export interface ScanResult {
  /** Root-relative, `/`-separated, sorted. */
  files: string[];
  /** The exact predicate the scan applied, for checking paths later. */
  isIgnored: (relativePath: string) => boolean;
}

/**
 * Port for listing the files of a project.
 */
export interface ProjectScanner {
  scan(rootPath: string, options: ScanOptions): Promise<Result<ScanResult, FileAccessError>>;
}
