import fs from "node:fs";
import path from "node:path";
import type { BuildRecipe, PackagePartition, PackageSet, RecipeResult } from "../types/index.js";
import type { PackageBackend } from "./backends.js";
import type { CleanupScope } from "./cleanup.js";
import type { ProfileConfig } from "./config.js";
import { RecipeParseError } from "./errors.js";
import type { ExecResult } from "./exec.js";
import { logger } from "./logger.js";
import { dedupePackages, partitionPackages } from "./packages.js";
import { findPrebuiltArtifact, readRecipe } from "./recipe.js";
import type { ProvisionReport } from "./report.js";

export interface InstallContext {
  backend: PackageBackend;
  profile: ProfileConfig;
  force: boolean;
  report: ProvisionReport;
  scope: CleanupScope;
}

async function installBatch(
  ctx: InstallContext,
  label: string,
  source: string,
  pkgs: readonly string[],
  install: () => Promise<ExecResult>,
): Promise<boolean> {
  if (pkgs.length === 0) return true;

  logger.info(`Installing ${pkgs.length} ${label} package(s) with ${source}...`);
  const result = await install();
  if (result.exitCode !== 0) {
    ctx.report.warn(
      "package-install",
      `${source} exited with code ${result.exitCode} while installing ${label} packages; continuing`,
    );
    return false;
  }
  logger.success(`Installed ${label} packages`);
  return true;
}

async function applyReplacements(ctx: InstallContext): Promise<void> {
  const { backend, report } = ctx;
  for (const { remove, install } of ctx.profile.replacements) {
    if (await backend.isInstalled(remove)) {
      logger.info(`Removing ${remove} (replaced by ${install})...`);
      const removed = await backend.remove(remove);
      if (removed.exitCode !== 0) {
        report.warn("package-install", `Failed to remove ${remove}, continuing`);
      }
    }
    if (!(await backend.isInstalled(install))) {
      logger.info(`Installing ${install}...`);
      const installed = await backend.installPrimary([install], ctx.force);
      if (installed.exitCode !== 0) {
        report.warn("package-install", `Failed to install ${install}`);
      }
    }
  }
}

/**
 * Installs the package set. Only a failure to set up the secondary source
 * is fatal; every failed batch is reported and the run moves on.
 */
export async function installPackages(
  set: PackageSet,
  ctx: InstallContext,
): Promise<PackagePartition> {
  const { backend, force } = ctx;
  const partition = partitionPackages(set, ctx.profile.packages.official);

  if (force) {
    logger.step("Updating system packages (force reinstall mode)");
    const upgrade = await backend.upgradeSystem(true);
    if (upgrade.exitCode !== 0) {
      ctx.report.warn("package-install", `System upgrade exited with code ${upgrade.exitCode}`);
    }
  }

  await applyReplacements(ctx);

  logger.step(`Preparing ${backend.secondaryName}`);
  await backend.ensureHelper(ctx.scope, ctx.report);

  const critical = dedupePackages(ctx.profile.packages.critical);
  await installBatch(ctx, "critical", backend.secondaryName, critical, () =>
    backend.installSecondary(critical, force),
  );
  await installBatch(ctx, "official", backend.primaryName, partition.primary, () =>
    backend.installPrimary(partition.primary, force),
  );
  await installBatch(ctx, "community", backend.secondaryName, partition.secondary, () =>
    backend.installSecondary(partition.secondary, force),
  );

  return partition;
}

/**
 * Recipe directories for the configured meta-packages, in configured order.
 * A meta-package with `when.missingPath` is only kept while that path is absent.
 */
export function selectRecipeDirs(
  metaPackages: ProfileConfig["metaPackages"],
  recipesRoot: string,
  exists: (p: string) => boolean = fs.existsSync,
): string[] {
  return metaPackages
    .filter((meta) => !meta.when || !exists(meta.when.missingPath))
    .map((meta) => path.join(recipesRoot, meta.name));
}

/**
 * Prefers a prebuilt artifact (in the recipe directory, then beside it),
 * otherwise builds the recipe. Nothing here is fatal.
 */
export async function buildAndInstallRecipes(
  recipeDirs: readonly string[],
  ctx: InstallContext,
): Promise<RecipeResult[]> {
  const { backend, report } = ctx;
  const results: RecipeResult[] = [];

  for (const dir of recipeDirs) {
    const name = path.basename(dir);
    const searchDirs = [dir, path.dirname(dir)];

    let recipe: BuildRecipe | null = null;
    let parseError: RecipeParseError | null = null;
    try {
      recipe = fs.existsSync(dir)
        ? readRecipe(dir, { artifactMatcher: backend.matchesArtifact, artifactDirs: searchDirs.slice(1) })
        : null;
    } catch (err) {
      if (!(err instanceof RecipeParseError)) throw err;
      parseError = err;
    }

    // a prebuilt package wins even over a PKGBUILD that cannot be read
    const artifact = recipe
      ? recipe.prebuiltArtifact
      : findPrebuiltArtifact(name, searchDirs, backend.matchesArtifact);

    if (artifact) {
      logger.info(`Installing prebuilt ${path.basename(artifact)}`);
      const installed = await backend.installArtifact(artifact, ctx.force);
      if (installed.exitCode !== 0) {
        report.warn("recipe-build", `Failed to install prebuilt package for ${name}`);
        results.push({ name, outcome: "failed", artifact });
      } else {
        results.push({ name, outcome: "prebuilt", artifact });
      }
      continue;
    }

    if (parseError) {
      report.warn("recipe-build", `Cannot build ${name}: ${parseError.message}`);
      results.push({ name, outcome: "failed" });
      continue;
    }

    if (!recipe) {
      report.warn("recipe-build", `Meta-package not found and no PKGBUILD to build: ${name}`);
      results.push({ name, outcome: "missing" });
      continue;
    }

    const label = recipe.version ? `${name} ${recipe.version}` : name;
    logger.info(`Building and installing ${label} from its PKGBUILD`);
    const built = await backend.buildRecipe(recipe);
    if (built.exitCode !== 0) {
      report.warn("recipe-build", `Building ${name} failed with exit code ${built.exitCode}`);
      results.push({ name, outcome: "failed" });
    } else {
      results.push({ name, outcome: "built" });
    }
  }

  return results;
}
