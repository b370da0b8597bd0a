import fs from "node:fs";
import path from "node:path";
import type {
  EnvironmentInfo,
  FileCopyResult,
  PackagePartition,
  PackageSet,
  ProvisionWarning,
  RecipeResult,
} from "../types/index.js";
import { createBackend } from "./backends.js";
import { backupConfigDir, backupDirName } from "./backup.js";
import { CleanupScope } from "./cleanup.js";
import type { ProvisionConfig } from "./config.js";
import { applyFileCopyPlan, buildFileCopyPlan } from "./copy-plan.js";
import { checkoutDotfiles } from "./dotfiles.js";
import { detectEnvironment } from "./environment.js";
import { UserCancelledError } from "./errors.js";
import type { CommandRunner } from "./exec.js";
import type { GitClient } from "./git.js";
import { installIconTheme } from "./icon-theme.js";
import { buildAndInstallRecipes, installPackages, selectRecipeDirs } from "./installer.js";
import { writeStaticArtifacts } from "./artifacts.js";
import { logger } from "./logger.js";
import { aggregatePackages } from "./packages.js";
import { runPostInstallTasks } from "./post-install.js";
import { checkPreconditions } from "./preconditions.js";
import type { Prompter } from "./prompts.js";
import { listRecipeDirs } from "./recipe.js";
import { ProvisionReport } from "./report.js";
import { enableServices, type ServiceSummary } from "./services.js";

export interface ProvisionDeps {
  runner: CommandRunner;
  git: GitClient;
  prompter: Prompter;
  config: ProvisionConfig;
  home: string;
  uid: number | undefined;
  osReleasePath?: string;
  tmpDir?: string;
  scope?: CleanupScope;
  now?: () => Date;
  freeBytes?: (target: string) => Promise<number>;
  exists?: (target: string) => boolean;
}

export interface ProvisionOptions {
  force: boolean;
}

export interface ProvisionOutcome {
  environment: EnvironmentInfo;
  packages: PackageSet;
  partition: PackagePartition;
  recipes: RecipeResult[];
  backupDir: string | null;
  copy: FileCopyResult;
  services: ServiceSummary;
  artifacts: string[];
  warnings: readonly ProvisionWarning[];
}

/**
 * Runs the whole installation in order. Pre-flight failures throw before
 * anything on the host changes. Temporary paths are removed however the
 * run ends.
 */
export async function runProvision(
  options: ProvisionOptions,
  deps: ProvisionDeps,
): Promise<ProvisionOutcome> {
  const scope = deps.scope ?? new CleanupScope();
  try {
    return await provision(options, deps, scope);
  } catch (err) {
    if (!(err instanceof UserCancelledError)) {
      logger.error("Installation failed! Cleaning up...");
    }
    throw err;
  } finally {
    scope.dispose();
  }
}

async function provision(
  options: ProvisionOptions,
  deps: ProvisionDeps,
  scope: CleanupScope,
): Promise<ProvisionOutcome> {
  const { config, runner, git, prompter, home } = deps;
  const startedAt = (deps.now ?? (() => new Date()))();
  const exists = deps.exists ?? fs.existsSync;
  const report = new ProvisionReport();
  const homeConfig = path.join(home, ".config");

  logger.step("Detecting distribution");
  const environment = detectEnvironment(deps.osReleasePath);
  logger.info(`Detected: ${environment.prettyName}`);

  logger.step("Checking preconditions");
  await checkPreconditions({
    runner,
    git,
    uid: deps.uid,
    probeHost: config.network.probeHost,
    disk: config.disk,
    freeBytes: deps.freeBytes,
  });
  logger.success("Network, git and disk space look good");

  logger.step("Setting up the dotfiles repository");
  const checkout = await checkoutDotfiles(config.dotfiles, git, home);

  let backupDir: string | null = null;
  if (fs.existsSync(homeConfig)) {
    const backup = await prompter.confirm(
      `Back up your current .config directory to ${backupDirName(homeConfig, startedAt)}?`,
      true,
    );
    if (backup) {
      backupDir = backupConfigDir(homeConfig, startedAt);
      logger.success(`Backup created at ${backupDir}`);
    } else {
      logger.warn("Skipping .config backup - existing files may be overwritten!");
    }
  }

  const profile = config.profiles[environment.family];
  const backend = createBackend(environment.family, {
    runner,
    git,
    profile,
    tmpDir: deps.tmpDir,
  });

  logger.step("Aggregating packages");
  const recipeDirs =
    profile.scanRecipes && checkout.recipesRoot ? listRecipeDirs(checkout.recipesRoot) : [];
  const packages = aggregatePackages(
    [...profile.packages.official, ...profile.packages.community],
    recipeDirs,
    report,
  );
  const metaDirs = selectRecipeDirs(
    profile.metaPackages,
    checkout.recipesRoot ?? path.join(checkout.repoDir, config.dotfiles.recipesDir),
    exists,
  );

  logger.blank();
  logger.bold(`Distribution: ${environment.prettyName} (${environment.family})`);
  if (options.force) {
    logger.bold("Force reinstall mode: the system is upgraded first and conflicting files are overwritten");
  }
  logger.info(`${packages.length} packages from ${recipeDirs.length} recipe(s) and the base lists`);
  logger.info(`${metaDirs.length} meta-package(s), ${config.services.length} service(s)`);
  logger.blank();

  const proceed = await prompter.confirm("Proceed with the installation?", true);
  if (!proceed) {
    throw new UserCancelledError();
  }

  const installCtx = { backend, profile, force: options.force, report, scope };

  logger.step("Installing packages");
  const partition = await installPackages(packages, installCtx);

  logger.step("Installing meta-packages");
  const recipes = await buildAndInstallRecipes(metaDirs, installCtx);

  logger.step("Copying configuration files");
  fs.mkdirSync(homeConfig, { recursive: true });
  const copy = applyFileCopyPlan(buildFileCopyPlan(checkout.configSource, homeConfig), {
    overwriteBackupDir: `${backupDirName(homeConfig, startedAt)}.overwrite`,
    templateHome: config.dotfiles.templateHome,
    home,
    ignoreBackupErrors: config.copy.ignoreBackupErrors,
    report,
  });
  logger.success(
    `Copied ${copy.copied.length} item(s), backed up ${copy.backedUp.length}, ` +
      `fixed paths in ${copy.rewritten.length} file(s)`,
  );

  logger.step("Enabling system services");
  const services = await enableServices(config.services, runner, report);

  logger.step("Writing desktop configuration");
  const artifacts = writeStaticArtifacts(homeConfig, config.artifacts);

  logger.step("Installing icon theme");
  await installIconTheme(config.iconTheme, { runner, git, scope, report, tmpDir: deps.tmpDir });

  logger.step("Finishing desktop setup");
  await runPostInstallTasks(config.postInstall, runner, home, report, exists);

  return {
    environment,
    packages,
    partition,
    recipes,
    backupDir,
    copy,
    services,
    artifacts,
    warnings: report.warnings,
  };
}
