/**
 * Path-derived module names and import-specifier normalisation.
 */
import path from "node:path";

const SOURCE_EXTENSION = /\.(d\.ts|[cm]?[jt]sx?|pyi?|go|java|rs)$/;

const INDEX_STEMS: Record<string, ReadonlySet<string>> = {
  typescript: new Set(["index"]),
  tsx: new Set(["index"]),
  javascript: new Set(["index"]),
  python: new Set(["__init__"]),
  rust: new Set(["mod", "lib", "main"]),
};

/**
 * `src/app/models.py` -> `src.app.models`; `pkg/__init__.py` -> `pkg`;
 * Rust drops a leading `src` so `crate::a::b` paths line up.
 */
export function moduleNameFor(filePath: string, language: string): string {
  let segments = filePath.replace(SOURCE_EXTENSION, "").split("/").filter((s) => s.length > 0);

  if (language === "rust" && segments[0] === "src" && segments.length > 1) {
    segments = segments.slice(1);
  }

  const last = segments[segments.length - 1];
  if (last !== undefined && segments.length > 1 && INDEX_STEMS[language]?.has(last)) {
    segments = segments.slice(0, -1);
  }

  return segments.join(".");
}

/** True for files whose module name is their directory. */
export function isPackageIndex(filePath: string, language: string): boolean {
  const stem = path.posix.basename(filePath).replace(SOURCE_EXTENSION, "");
  return INDEX_STEMS[language]?.has(stem) ?? false;
}

/**
 * `./models.js` imported from `src/app/index.ts` -> `src.app.models`.
 * Bare specifiers (packages) are returned unchanged.
 */
export function resolveScriptSpecifier(fromFile: string, specifier: string, language: string): string {
  if (!specifier.startsWith(".")) {
    return specifier;
  }
  const joined = path.posix.normalize(path.posix.join(path.posix.dirname(fromFile), specifier));
  return moduleNameFor(joined.replace(/\/$/, ""), language);
}

/**
 * Python `from ..models import User` style resolution. `dots` is the number
 * of leading dots, `rest` the dotted name after them (may be empty).
 */
export function resolvePythonRelative(
  moduleName: string,
  isPackage: boolean,
  dots: number,
  rest: string
): string {
  const segments = moduleName.split(".");
  const packageSegments = isPackage ? segments : segments.slice(0, -1);
  const base = packageSegments.slice(0, Math.max(0, packageSegments.length - (dots - 1)));
  return [...base, ...(rest ? rest.split(".") : [])].join(".");
}

/**
 * `crate::store::save` -> `store.save`; `self::`/`super::` are resolved
 * against the current module.
 */
export function normalizeRustPath(rawPath: string, moduleName: string): string {
  const segments = rawPath.split("::").filter((s) => s.length > 0);
  const moduleSegments = moduleName.split(".").filter((s) => s.length > 0);

  if (segments[0] === "crate") {
    return segments.slice(1).join(".");
  }
  if (segments[0] === "self") {
    return [...moduleSegments, ...segments.slice(1)].join(".");
  }
  let parent = moduleSegments;
  let i = 0;
  while (segments[i] === "super") {
    parent = parent.slice(0, -1);
    i++;
  }
  if (i > 0) {
    return [...parent, ...segments.slice(i)].join(".");
  }
  return segments.join(".");
}
