import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import {
  aggregatePackages,
  dedupePackages,
  loadRecipes,
  partitionPackages,
} from "../../src/lib/packages.js";
import { ProvisionReport } from "../../src/lib/report.js";
import { logger } from "../../src/lib/logger.js";
import { createTmpDir, writeFile } from "../helpers.js";

let tmpDirs: string[] = [];

function useTmpDir(): string {
  const dir = createTmpDir();
  tmpDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tmpDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tmpDirs = [];
  if (logger.isCapturing()) logger.flush();
});

function recipeRoot(): string {
  const root = useTmpDir();
  writeFile(root, "a-meta/PKGBUILD", "depends=(kitty fish)\nmakedepends=(git)\n");
  writeFile(root, "b-meta/PKGBUILD", "depends=(fish 'qt6-base>=6.5')\n");
  fs.mkdirSync(path.join(root, "c-empty"));
  return root;
}

// ── dedupePackages ──

describe("dedupePackages", () => {
  it("keeps the first occurrence and drops blanks", () => {
    expect(dedupePackages(["a", "b", " a ", "", "c", "b"])).toEqual(["a", "b", "c"]);
  });
});

// ── aggregatePackages ──

describe("aggregatePackages", () => {
  it("puts the base list first, then recipe dependencies in directory order", () => {
    const root = recipeRoot();
    const dirs = ["a-meta", "b-meta", "c-empty"].map((d) => path.join(root, d));
    expect(aggregatePackages(["hyprland", "kitty"], dirs)).toEqual([
      "hyprland",
      "kitty",
      "fish",
      "git",
      "qt6-base",
    ]);
  });

  it("is unchanged by duplicating its input", () => {
    const root = recipeRoot();
    const dirs = ["a-meta", "b-meta"].map((d) => path.join(root, d));
    const once = aggregatePackages(["hyprland"], dirs);
    const twice = aggregatePackages(["hyprland", "hyprland"], [...dirs, ...dirs]);
    expect(twice).toEqual(once);
  });

  it("returns the deduplicated base list when there are no recipes", () => {
    expect(aggregatePackages(["x", "y", "x"], [])).toEqual(["x", "y"]);
  });

  it("skips a malformed recipe and reports it", () => {
    const root = recipeRoot();
    writeFile(root, "broken/PKGBUILD", "depends=(never-closed\n");
    const report = new ProvisionReport();
    logger.capture();
    const result = aggregatePackages(
      ["base"],
      [path.join(root, "broken"), path.join(root, "b-meta")],
      report,
    );
    logger.flush();

    expect(result).toEqual(["base", "fish", "qt6-base"]);
    expect(report.warnings).toEqual([
      {
        kind: "recipe-parse",
        message: `Skipping broken: ${path.join(root, "broken", "PKGBUILD")}:1: unterminated array (missing ')')`,
      },
    ]);
  });
});

describe("loadRecipes", () => {
  it("skips directories without a PKGBUILD", () => {
    const root = recipeRoot();
    const recipes = loadRecipes([path.join(root, "c-empty"), path.join(root, "a-meta")]);
    expect(recipes.map((r) => r.name)).toEqual(["a-meta"]);
  });
});

// ── partitionPackages ──

describe("partitionPackages", () => {
  it("sends official names to the primary manager and the rest to the secondary source", () => {
    expect(partitionPackages(["hyprland", "quickshell", "kitty"], ["kitty", "hyprland"])).toEqual({
      primary: ["hyprland", "kitty"],
      secondary: ["quickshell"],
    });
  });
});
