/**
 * Structural invariant tests — mechanically enforce architectural rules.
 *
 * These tests verify that the codebase's import graph, naming conventions,
 * test coverage and lifecycle definitions stay consistent as the project
 * evolves. They do NOT test runtime behavior; they scan the source tree.
 */
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { BOOTSTRAP_PHASES, BROKER_IDS, SERVICE_STATES } from "../../src/shared/types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const SRC = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../src");

/** Recursively collect all .ts files under a directory. */
function walk(dir: string, ext = ".ts"): string[] {
  const results: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory() && entry.name !== "node_modules") {
      results.push(...walk(full, ext));
    } else if (entry.isFile() && entry.name.endsWith(ext)) {
      results.push(full);
    }
  }
  return results;
}

/** Extract import paths from a TS file (both `import` and `import type`). */
function extractImports(filePath: string): string[] {
  const content = fs.readFileSync(filePath, "utf-8");
  return [...content.matchAll(/from\s+["']([^"']+)["']/g)].flatMap((m) => (m[1] ? [m[1]] : []));
}

/** Top-level src/ directory a relative import lands in. */
function resolveModuleDir(fromFile: string, importPath: string): string | null {
  if (!importPath.startsWith(".")) return null;
  const resolved = path.resolve(path.dirname(fromFile), importPath);
  const rel = path.relative(SRC, resolved);
  const parts = rel.split(path.sep);
  return parts.length > 1 ? (parts[0] ?? null) : null;
}

function importViolations(modules: string[], forbidden: string[]): string[] {
  const violations: string[] = [];
  for (const mod of modules) {
    const files = allSourceFiles.filter((f) => f.startsWith(path.join(SRC, mod) + path.sep));
    for (const file of files) {
      for (const imp of extractImports(file)) {
        const target = resolveModuleDir(file, imp);
        if (target && target !== mod && forbidden.includes(target)) {
          violations.push(`${path.relative(SRC, file)} imports from ${target}/ (${imp})`);
        }
      }
    }
  }
  return violations;
}

const allSourceFiles = walk(SRC).filter((f) => !f.endsWith(".test.ts"));
const allTestFiles = walk(SRC).filter((f) => f.endsWith(".test.ts"));

const domainModules = ["exec", "installer", "services", "supervisor"];

// ---------------------------------------------------------------------------
// 1. Layered Architecture — import boundary enforcement
// ---------------------------------------------------------------------------

describe("layered architecture", () => {
  it("shared/ and security/ only import from each other", () => {
    const leafModules = ["shared", "security"];
    const everythingElse = ["config", "cli", "pipeline", ...domainModules];
    expect(importViolations(leafModules, everythingElse)).toEqual([]);
  });

  it("domain modules do not import from pipeline/ or cli/", () => {
    expect(importViolations(domainModules, ["pipeline", "cli"])).toEqual([]);
  });

  it("config/ does not import from domain or orchestration code", () => {
    expect(importViolations(["config"], ["pipeline", "cli", ...domainModules])).toEqual([]);
  });

  it("pipeline/ does not import from cli/", () => {
    expect(importViolations(["pipeline"], ["cli"])).toEqual([]);
  });

  it("only exec/ and supervisor/process-control spawn child processes", () => {
    const allowed = [path.join("exec", "command-runner.ts"), path.join("supervisor", "process-control.ts")];
    const offenders = allSourceFiles
      .filter((f) => extractImports(f).includes("node:child_process"))
      .map((f) => path.relative(SRC, f))
      .filter((f) => !allowed.includes(f));
    expect(offenders).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// 2. Naming conventions
// ---------------------------------------------------------------------------

describe("naming conventions", () => {
  it("all source files use kebab-case", () => {
    const kebabRe = /^[a-z0-9]+(-[a-z0-9]+)*\.ts$/;
    const violations = [...allSourceFiles, ...allTestFiles]
      .map((f) => path.basename(f).replace(".test.ts", ".ts"))
      .filter((name) => name !== "index.ts" && !kebabRe.test(name));
    expect(violations).toEqual([]);
  });

  it("all directories under src/ use kebab-case", () => {
    const violations: string[] = [];
    const kebabDirRe = /^[a-z0-9]+(-[a-z0-9]+)*$/;

    function checkDirs(dir: string) {
      for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
        if (entry.isDirectory()) {
          if (!kebabDirRe.test(entry.name)) {
            violations.push(path.relative(SRC, path.join(dir, entry.name)));
          }
          checkDirs(path.join(dir, entry.name));
        }
      }
    }

    checkDirs(SRC);
    expect(violations).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// 3. Test co-location
// ---------------------------------------------------------------------------

describe("test co-location", () => {
  const exemptPatterns = [
    /index\.ts$/, // barrel files
    /types\.ts$/, // pure type files
    /errors\.ts$/, // error classes (tested through their callers)
  ];

  const testedDirs = ["config", "exec", "installer", "services", "supervisor", "pipeline", "security", "cli", "shared"];

  it("every source file has a co-located .test.ts file", () => {
    const missing: string[] = [];

    for (const dir of testedDirs) {
      const dirPath = path.join(SRC, dir);
      if (!fs.existsSync(dirPath)) continue;

      const sourceFiles = walk(dirPath).filter(
        (f) => !f.endsWith(".test.ts") && !exemptPatterns.some((re) => re.test(path.basename(f))),
      );

      for (const file of sourceFiles) {
        if (!fs.existsSync(file.replace(/\.ts$/, ".test.ts"))) {
          missing.push(path.relative(SRC, file));
        }
      }
    }

    expect(missing).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// 4. Lifecycle integrity
// ---------------------------------------------------------------------------

describe("lifecycle integrity", () => {
  it("bootstrap phases run install, brokers, worker, monitor in that order", () => {
    expect([...BOOTSTRAP_PHASES]).toEqual(["install", "brokers", "worker", "monitor"]);
  });

  it("brokers move through exactly three states", () => {
    expect([...SERVICE_STATES]).toEqual(["absent", "installed-stopped", "running"]);
  });

  it("every broker id has a descriptor", async () => {
    const { getDescriptor } = await import("../../src/services/brokers.js");
    for (const id of BROKER_IDS) {
      expect(getDescriptor(id).id).toBe(id);
    }
  });
});

// ---------------------------------------------------------------------------
// 5. No circular imports between top-level modules
// ---------------------------------------------------------------------------

describe("no cross-module circular imports", () => {
  it("top-level modules do not form circular dependencies", () => {
    const modules = ["shared", "security", "config", "pipeline", "cli", ...domainModules];
    const graph = new Map<string, Set<string>>();

    for (const mod of modules) {
      const files = allSourceFiles.filter((f) => f.startsWith(path.join(SRC, mod) + path.sep));
      const deps = new Set<string>();
      for (const file of files) {
        for (const imp of extractImports(file)) {
          const target = resolveModuleDir(file, imp);
          if (target && modules.includes(target) && target !== mod) {
            deps.add(target);
          }
        }
      }
      graph.set(mod, deps);
    }

    const cycles: string[] = [];

    function dfs(node: string, visited: Set<string>, trail: string[]) {
      if (visited.has(node)) {
        const cycleStart = trail.indexOf(node);
        if (cycleStart !== -1) {
          cycles.push([...trail.slice(cycleStart), node].join(" → "));
        }
        return;
      }
      visited.add(node);
      trail.push(node);
      for (const dep of graph.get(node) ?? []) {
        dfs(dep, visited, trail);
      }
      trail.pop();
      visited.delete(node);
    }

    for (const mod of modules) {
      dfs(mod, new Set(), []);
    }

    expect(cycles).toEqual([]);
  });
});
