import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { tmpdir } from "os";
import {
  DEFAULT_IGNORE_PATTERNS,
  NodeProjectScanner,
  createIgnoreMatcher,
  expandIgnorePattern,
} from "../src/infrastructure/scanner/NodeProjectScanner.js";

describe("expandIgnorePattern", () => {
  it("matches unanchored names at any depth", () => {
    expect(expandIgnorePattern("build")).toEqual(["**/build", "**/build/**"]);
    expect(expandIgnorePattern("generated/")).toEqual(["**/generated", "**/generated/**"]);
  });

  it("anchors patterns that contain a slash", () => {
    expect(expandIgnorePattern("/out/")).toEqual(["out", "out/**"]);
    expect(expandIgnorePattern("src/*.gen.ts")).toEqual(["src/*.gen.ts", "src/*.gen.ts/**"]);
  });

  it("skips blanks, comments and negations", () => {
    expect(expandIgnorePattern("")).toEqual([]);
    expect(expandIgnorePattern("# build output")).toEqual([]);
    expect(expandIgnorePattern("!keep.ts")).toEqual([]);
  });
});

describe("createIgnoreMatcher", () => {
  it("applies the default patterns", () => {
    const isIgnored = createIgnoreMatcher(DEFAULT_IGNORE_PATTERNS);
    expect(isIgnored("node_modules/lodash/index.js")).toBe(true);
    expect(isIgnored("web/node_modules/react/index.js")).toBe(true);
    expect(isIgnored("app/__pycache__/models.cpython-311.pyc")).toBe(true);
    expect(isIgnored("src/app.ts")).toBe(false);
  });

  it("ignores nothing without patterns", () => {
    expect(createIgnoreMatcher([])("anything.ts")).toBe(false);
  });
});

describe("NodeProjectScanner", () => {
  let root: string;

  const write = (relative: string, content = ""): void => {
    const full = join(root, relative);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, content);
  };

  beforeAll(() => {
    root = join(tmpdir(), `scanner-test-${Date.now()}`);
    write("src/a.ts", "export const a = 1;\n");
    write("src/b.py", "b = 1\n");
    write("docs/readme.md", "# docs\n");
    write("node_modules/x/index.js", "module.exports = 1;\n");
    write("dist/out.js", "\n");
    write("generated/g.ts", "\n");
    write("debug.log", "\n");
    write(".gitignore", "generated/\n# local noise\n*.log\n");
  });

  afterAll(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("lists files sorted, honouring defaults and .gitignore", async () => {
    const result = await new NodeProjectScanner().scan(root, {
      ignorePatterns: DEFAULT_IGNORE_PATTERNS,
      respectGitignore: true,
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.files).toEqual([".gitignore", "docs/readme.md", "src/a.ts", "src/b.py"]);
    expect(result.value.isIgnored("generated/g.ts")).toBe(true);
    expect(result.value.isIgnored("src/a.ts")).toBe(false);
  });

  it("skips .gitignore rules when asked to", async () => {
    const result = await new NodeProjectScanner().scan(root, {
      ignorePatterns: DEFAULT_IGNORE_PATTERNS,
      respectGitignore: false,
    });
    expect(result.ok && result.value.files).toEqual([
      ".gitignore",
      "debug.log",
      "docs/readme.md",
      "generated/g.ts",
      "src/a.ts",
      "src/b.py",
    ]);
  });
});
