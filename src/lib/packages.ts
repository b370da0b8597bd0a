import path from "node:path";
import type { BuildRecipe, PackagePartition, PackageSet } from "../types/index.js";
import { RecipeParseError } from "./errors.js";
import { readRecipe, type ReadRecipeOptions } from "./recipe.js";
import type { ProvisionReport } from "./report.js";

/** Stable dedup: keeps the first occurrence of every name, drops blanks. */
export function dedupePackages(names: Iterable<string>): PackageSet {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of names) {
    const name = raw.trim();
    if (!name || seen.has(name)) continue;
    seen.add(name);
    out.push(name);
  }
  return out;
}

/**
 * Reads each recipe directory, skipping ones without a declaration and
 * reporting malformed ones. Returns the recipes that loaded.
 */
export function loadRecipes(
  recipeDirs: readonly string[],
  report?: ProvisionReport,
  options: ReadRecipeOptions = {},
): BuildRecipe[] {
  const recipes: BuildRecipe[] = [];
  for (const dir of recipeDirs) {
    try {
      const recipe = readRecipe(dir, options);
      if (recipe) recipes.push(recipe);
    } catch (err) {
      if (!(err instanceof RecipeParseError)) throw err;
      report?.warn("recipe-parse", `Skipping ${path.basename(dir)}: ${err.message}`);
    }
  }
  return recipes;
}

/**
 * Unions the base list with every recipe's runtime and build-time
 * dependencies. Base names keep their order and come first.
 */
export function aggregatePackages(
  basePackages: readonly string[],
  recipeDirs: readonly string[],
  report?: ProvisionReport,
): PackageSet {
  const recipes = loadRecipes(recipeDirs, report);
  return dedupePackages([
    ...basePackages,
    ...recipes.flatMap((recipe) => [...recipe.depends, ...recipe.makedepends]),
  ]);
}

/** Names listed as official go to the primary manager, the rest to the community source. */
export function partitionPackages(
  set: PackageSet,
  official: readonly string[],
): PackagePartition {
  const primaryNames = new Set(official);
  const partition: PackagePartition = { primary: [], secondary: [] };
  for (const name of set) {
    if (primaryNames.has(name)) {
      partition.primary.push(name);
    } else {
      partition.secondary.push(name);
    }
  }
  return partition;
}
