import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { CleanupScope } from "./cleanup.js";
import type { ProvisionConfig } from "./config.js";
import type { CommandRunner } from "./exec.js";
import { CloneFailureError } from "./errors.js";
import { cloneRepository, type GitClient } from "./git.js";
import { logger } from "./logger.js";
import type { ProvisionReport } from "./report.js";

export interface IconThemeContext {
  runner: CommandRunner;
  git: GitClient;
  scope: CleanupScope;
  report: ProvisionReport;
  tmpDir?: string;
}

/**
 * Clones the icon theme (falling back to the alternate repository), runs its
 * installer with each argument set until one works, then removes the clone.
 * Returns true when the theme was installed.
 */
export async function installIconTheme(
  theme: ProvisionConfig["iconTheme"],
  ctx: IconThemeContext,
): Promise<boolean> {
  if (!theme.enabled) return false;

  const cloneDir = ctx.scope.register(
    path.join(ctx.tmpDir ?? os.tmpdir(), path.basename(theme.repository, ".git")),
  );
  fs.rmSync(cloneDir, { recursive: true, force: true });

  const repositories = [theme.repository, theme.fallbackRepository].filter(
    (repo): repo is string => Boolean(repo),
  );

  let cloned = false;
  for (const repository of repositories) {
    try {
      logger.info(`Cloning ${repository}...`);
      await cloneRepository(ctx.git, repository, cloneDir, { depth: 1 });
      cloned = true;
      break;
    } catch (err) {
      if (!(err instanceof CloneFailureError)) throw err;
      logger.warn(err.message);
      fs.rmSync(cloneDir, { recursive: true, force: true });
    }
  }

  if (!cloned) {
    ctx.report.warn("icon-theme", "Could not clone the icon theme; skipping its installation");
    ctx.scope.release(cloneDir);
    return false;
  }

  let installed = false;
  for (const args of theme.installArgs) {
    const result = await ctx.runner.run("sudo", ["./install.sh", ...args], {
      cwd: cloneDir,
      inherit: true,
    });
    if (result.exitCode === 0) {
      installed = true;
      break;
    }
    logger.warn(`Icon theme installer failed with arguments: ${args.join(" ")}`);
  }

  ctx.scope.release(cloneDir);
  if (!installed) {
    ctx.report.warn("icon-theme", "Icon theme installation failed with every argument set");
    return false;
  }
  logger.success("Icon theme installed");
  return true;
}
