import path from "node:path";
import type {
  DistroFamily,
  FileCopyPlan,
  PackagePartition,
  PackageSet,
  ProvisionWarning,
} from "../types/index.js";
import type { ProvisionConfig } from "./config.js";
import { buildFileCopyPlan } from "./copy-plan.js";
import { inspectCheckout } from "./dotfiles.js";
import { selectRecipeDirs } from "./installer.js";
import { aggregatePackages, partitionPackages } from "./packages.js";
import { listRecipeDirs } from "./recipe.js";
import { ProvisionReport } from "./report.js";

export interface InstallPlan {
  family: DistroFamily;
  packages: PackageSet;
  partition: PackagePartition;
  critical: readonly string[];
  recipeDirs: string[];
  metaPackages: string[];
  copyPlan: FileCopyPlan;
  warnings: readonly ProvisionWarning[];
}

/**
 * Works out what an install would do from an existing checkout, without
 * running anything.
 */
export function planInstallation(
  repoDir: string,
  family: DistroFamily,
  config: ProvisionConfig,
  home: string,
  exists?: (p: string) => boolean,
): InstallPlan {
  const report = new ProvisionReport();
  const profile = config.profiles[family];
  const checkout = inspectCheckout(repoDir, config.dotfiles);

  const recipeDirs =
    profile.scanRecipes && checkout.recipesRoot ? listRecipeDirs(checkout.recipesRoot) : [];
  const packages = aggregatePackages(
    [...profile.packages.official, ...profile.packages.community],
    recipeDirs,
    report,
  );
  const metaDirs = selectRecipeDirs(
    profile.metaPackages,
    checkout.recipesRoot ?? path.join(repoDir, config.dotfiles.recipesDir),
    exists,
  );

  return {
    family,
    packages,
    partition: partitionPackages(packages, profile.packages.official),
    critical: profile.packages.critical,
    recipeDirs,
    metaPackages: metaDirs.map((dir) => path.basename(dir)),
    copyPlan: buildFileCopyPlan(checkout.configSource, path.join(home, ".config")),
    warnings: report.warnings,
  };
}
