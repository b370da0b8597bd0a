import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { BuildRecipe, DistroFamily } from "../types/index.js";
import type { ProfileConfig } from "./config.js";
import type { CleanupScope } from "./cleanup.js";
import { commandExists, type CommandRunner, type ExecResult } from "./exec.js";
import { BootstrapFailureError, CloneFailureError } from "./errors.js";
import { cloneRepository, type GitClient } from "./git.js";
import { logger } from "./logger.js";
import type { ArtifactMatcher } from "./recipe.js";
import type { ProvisionReport } from "./report.js";

/**
 * What the planner needs from a distribution: a primary package manager,
 * a secondary community source layered on top of it, and a way to turn a
 * build recipe into an installed package.
 */
export interface PackageBackend {
  readonly family: DistroFamily;
  readonly primaryName: string;
  readonly secondaryName: string;
  readonly matchesArtifact: ArtifactMatcher;

  upgradeSystem(force: boolean): Promise<ExecResult>;
  isInstalled(pkg: string): Promise<boolean>;
  remove(pkg: string): Promise<ExecResult>;
  installPrimary(pkgs: readonly string[], force: boolean): Promise<ExecResult>;
  installSecondary(pkgs: readonly string[], force: boolean): Promise<ExecResult>;
  /** Makes the secondary source usable. Throws BootstrapFailureError when it cannot. */
  ensureHelper(scope: CleanupScope, report: ProvisionReport): Promise<void>;
  installArtifact(file: string, force: boolean): Promise<ExecResult>;
  buildRecipe(recipe: BuildRecipe): Promise<ExecResult>;
}

export interface BackendDeps {
  runner: CommandRunner;
  git: GitClient;
  profile: ProfileConfig;
  tmpDir?: string;
}

const OK: ExecResult = { exitCode: 0, stdout: "", stderr: "" };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

abstract class BaseBackend {
  protected readonly runner: CommandRunner;
  protected readonly git: GitClient;
  protected readonly profile: ProfileConfig;
  protected readonly tmpDir: string;

  constructor(deps: BackendDeps) {
    this.runner = deps.runner;
    this.git = deps.git;
    this.profile = deps.profile;
    this.tmpDir = deps.tmpDir ?? os.tmpdir();
  }

  protected sudo(args: readonly string[]): Promise<ExecResult> {
    return this.runner.run("sudo", args, { inherit: true });
  }
}

export class ArchBackend extends BaseBackend implements PackageBackend {
  readonly family = "arch" as const;
  readonly primaryName = "pacman";

  get secondaryName(): string {
    return this.profile.helper?.name ?? "yay";
  }

  readonly matchesArtifact: ArtifactMatcher = (name, fileName) =>
    new RegExp(`^${escapeRegExp(name)}-[^-]+-[^-]+-[^-]+\\.pkg\\.tar\\.[a-z0-9]+$`).test(fileName);

  private overwrite(force: boolean): string[] {
    return force ? ["--overwrite", "*"] : [];
  }

  upgradeSystem(force: boolean): Promise<ExecResult> {
    return this.sudo(["pacman", "-Syu", "--noconfirm", ...this.overwrite(force)]);
  }

  async isInstalled(pkg: string): Promise<boolean> {
    const result = await this.runner.run("pacman", ["-Q", pkg]);
    return result.exitCode === 0;
  }

  remove(pkg: string): Promise<ExecResult> {
    return this.sudo(["pacman", "-Rdd", "--noconfirm", pkg]);
  }

  installPrimary(pkgs: readonly string[], force: boolean): Promise<ExecResult> {
    return this.sudo(["pacman", "-S", "--noconfirm", "--needed", ...this.overwrite(force), ...pkgs]);
  }

  installSecondary(pkgs: readonly string[], force: boolean): Promise<ExecResult> {
    return this.runner.run(
      this.secondaryName,
      ["-S", "--noconfirm", "--needed", ...this.overwrite(force), ...pkgs],
      { inherit: true },
    );
  }

  async ensureHelper(scope: CleanupScope): Promise<void> {
    const helper = this.profile.helper;
    if (!helper) {
      throw new BootstrapFailureError("the AUR helper", "no helper is configured for this profile");
    }
    if (await commandExists(this.runner, helper.name)) {
      logger.dim(`${helper.name} is already installed`);
      return;
    }

    logger.info(`Installing ${helper.name} AUR helper...`);
    const buildDir = scope.register(path.join(this.tmpDir, path.basename(helper.repository, ".git")));
    fs.rmSync(buildDir, { recursive: true, force: true });

    try {
      await cloneRepository(this.git, helper.repository, buildDir);
    } catch (err) {
      if (err instanceof CloneFailureError) {
        throw new BootstrapFailureError(helper.name, err.message);
      }
      throw err;
    }

    const build = await this.runner.run("makepkg", ["-si", "--noconfirm"], {
      cwd: buildDir,
      inherit: true,
    });
    scope.release(buildDir);
    if (build.exitCode !== 0) {
      throw new BootstrapFailureError(helper.name, `makepkg exited with code ${build.exitCode}`);
    }
    logger.success(`${helper.name} installed`);
  }

  installArtifact(file: string, force: boolean): Promise<ExecResult> {
    return this.sudo(["pacman", "-U", "--noconfirm", ...this.overwrite(force), file]);
  }

  buildRecipe(recipe: BuildRecipe): Promise<ExecResult> {
    return this.runner.run("makepkg", ["-si", "--noconfirm"], { cwd: recipe.dir, inherit: true });
  }
}

export class FedoraBackend extends BaseBackend implements PackageBackend {
  readonly family = "fedora" as const;
  readonly primaryName = "dnf";
  readonly secondaryName = "COPR";

  readonly matchesArtifact: ArtifactMatcher = (name, fileName) =>
    new RegExp(`^${escapeRegExp(name)}-[^-]+-[^-]+\\.rpm$`).test(fileName);

  private allowErasing(force: boolean): string[] {
    return force ? ["--allowerasing"] : [];
  }

  upgradeSystem(force: boolean): Promise<ExecResult> {
    return this.sudo(["dnf", "upgrade", "-y", "--refresh", ...this.allowErasing(force)]);
  }

  async isInstalled(pkg: string): Promise<boolean> {
    const result = await this.runner.run("rpm", ["-q", pkg]);
    return result.exitCode === 0;
  }

  remove(pkg: string): Promise<ExecResult> {
    return this.sudo(["dnf", "remove", "-y", pkg]);
  }

  installPrimary(pkgs: readonly string[], force: boolean): Promise<ExecResult> {
    return this.sudo(["dnf", "install", "-y", ...this.allowErasing(force), ...pkgs]);
  }

  // COPR repositories are plain dnf repositories once enabled
  installSecondary(pkgs: readonly string[], force: boolean): Promise<ExecResult> {
    return this.installPrimary(pkgs, force);
  }

  async ensureHelper(_scope: CleanupScope, report: ProvisionReport): Promise<void> {
    const probe = await this.runner.run("dnf", ["copr", "--help"]);
    if (probe.exitCode !== 0) {
      logger.info("Installing dnf-plugins-core for COPR support...");
      const install = await this.sudo(["dnf", "install", "-y", "dnf-plugins-core"]);
      if (install.exitCode !== 0) {
        throw new BootstrapFailureError(
          "the dnf COPR plugin",
          `dnf install dnf-plugins-core exited with code ${install.exitCode}`,
        );
      }
    }

    for (const repo of this.profile.copr) {
      const enable = await this.sudo(["dnf", "copr", "enable", "-y", repo]);
      if (enable.exitCode !== 0) {
        report.warn("package-install", `Failed to enable COPR repository ${repo}`);
      } else {
        logger.dim(`Enabled COPR repository ${repo}`);
      }
    }
  }

  installArtifact(file: string, force: boolean): Promise<ExecResult> {
    return this.installPrimary([file], force);
  }

  // Meta-packages carry no files of their own; installing one means installing what it depends on.
  async buildRecipe(recipe: BuildRecipe): Promise<ExecResult> {
    if (recipe.depends.length === 0) return OK;
    return this.installPrimary(recipe.depends, false);
  }
}

export function createBackend(family: DistroFamily, deps: BackendDeps): PackageBackend {
  switch (family) {
    case "arch":
      return new ArchBackend(deps);
    case "fedora":
      return new FedoraBackend(deps);
  }
}
