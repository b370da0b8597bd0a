import fs from "node:fs";
import path from "node:path";
import { expandHome, type ProvisionConfig } from "./config.js";
import { CloneFailureError } from "./errors.js";
import { cloneRepository, type GitClient } from "./git.js";
import { logger } from "./logger.js";
import { withSpinner } from "./prompts.js";

export interface DotfilesCheckout {
  repoDir: string;
  configSource: string;
  /** Null when the repository ships no recipes directory. */
  recipesRoot: string | null;
}

/** Locates the config and recipes directories inside an existing checkout. */
export function inspectCheckout(
  repoDir: string,
  dotfiles: ProvisionConfig["dotfiles"],
): DotfilesCheckout {
  const configSource = path.join(repoDir, dotfiles.configDir);
  if (!fs.existsSync(configSource)) {
    throw new CloneFailureError(
      dotfiles.repository,
      `no ${dotfiles.configDir} directory in ${repoDir}; the repository may be incomplete`,
    );
  }

  const recipesRoot = path.join(repoDir, dotfiles.recipesDir);
  return { repoDir, configSource, recipesRoot: fs.existsSync(recipesRoot) ? recipesRoot : null };
}

/**
 * Replaces any previous checkout with a fresh clone of the dotfiles
 * repository. A failed clone or a checkout without a config directory is
 * fatal.
 */
export async function checkoutDotfiles(
  dotfiles: ProvisionConfig["dotfiles"],
  git: GitClient,
  home: string,
): Promise<DotfilesCheckout> {
  const repoDir = expandHome(dotfiles.cloneDir, home);
  if (fs.existsSync(repoDir)) {
    logger.info(`Removing existing ${repoDir}...`);
    fs.rmSync(repoDir, { recursive: true, force: true });
  }

  await withSpinner(
    `Cloning ${dotfiles.repository}...`,
    async () => {
      logger.info(`Cloning ${dotfiles.repository} into ${repoDir}`);
      await cloneRepository(git, dotfiles.repository, repoDir);
    },
    "Repository cloned",
  );

  const checkout = inspectCheckout(repoDir, dotfiles);
  if (!checkout.recipesRoot) {
    logger.warn(`${dotfiles.recipesDir} directory not found in the repository`);
    logger.warn("Prebuilt meta-packages will not be available");
  }
  return checkout;
}
