import { simpleGit } from "simple-git";
import { CloneFailureError, errorMessage } from "./errors.js";

export interface CloneOptions {
  depth?: number;
}

export interface GitClient {
  isInstalled(): Promise<boolean>;
  clone(repository: string, targetDir: string, options?: CloneOptions): Promise<void>;
}

export const simpleGitClient: GitClient = {
  async isInstalled() {
    try {
      const version = await simpleGit().version();
      return version.installed;
    } catch {
      return false;
    }
  },

  async clone(repository, targetDir, options = {}) {
    const args = options.depth ? ["--depth", String(options.depth)] : [];
    await simpleGit().clone(repository, targetDir, args);
  },
};

/** Clones or throws CloneFailureError; the caller decides whether that is fatal. */
export async function cloneRepository(
  git: GitClient,
  repository: string,
  targetDir: string,
  options: CloneOptions = {},
): Promise<void> {
  try {
    await git.clone(repository, targetDir, options);
  } catch (err) {
    throw new CloneFailureError(repository, errorMessage(err));
  }
}
