import os from "node:os";
import { Command } from "commander";
import { expandHome, loadConfig } from "../lib/config.js";
import { detectEnvironment } from "../lib/environment.js";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { planInstallation } from "../lib/plan.js";

export const planCommand = new Command("plan")
  .description("Show what an install would do, using an existing dotfiles checkout")
  .option("--repo <dir>", "Path to the dotfiles checkout (defaults to the configured clone directory)")
  .action((options: { repo?: string }) => {
    try {
      const home = os.homedir();
      const config = loadConfig({ home });
      const environment = detectEnvironment();
      const repoDir = options.repo ?? expandHome(config.dotfiles.cloneDir, home);
      const plan = planInstallation(repoDir, environment.family, config, home);

      logger.blank();
      logger.bold(`${environment.prettyName} (${plan.family})`);
      logger.info(`${plan.packages.length} package(s) from ${plan.recipeDirs.length} recipe(s) and the base lists`);
      logger.info(`${plan.partition.primary.length} official, ${plan.partition.secondary.length} community`);
      if (plan.critical.length > 0) {
        logger.info(`Critical, installed first: ${plan.critical.join(" ")}`);
      }

      if (plan.metaPackages.length > 0) {
        logger.blank();
        logger.table(["meta-package"], plan.metaPackages.map((name) => [name]));
      }

      logger.blank();
      logger.table(
        ["config entry", "destination"],
        plan.copyPlan.map((entry) => [entry.name, entry.destination]),
      );
      logger.blank();
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }
  });
