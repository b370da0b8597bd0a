import os from "node:os";
import { Command } from "commander";
import * as p from "@clack/prompts";
import { CleanupScope } from "../lib/cleanup.js";
import { loadConfig } from "../lib/config.js";
import { ProvisionError, UserCancelledError } from "../lib/errors.js";
import { systemRunner } from "../lib/exec.js";
import { simpleGitClient } from "../lib/git.js";
import { logger } from "../lib/logger.js";
import { runProvision, type ProvisionOutcome } from "../lib/provisioner.js";
import { createPrompter, isInteractive } from "../lib/prompts.js";
import { summarizeWarnings } from "../lib/report.js";

function printSummary(outcome: ProvisionOutcome): void {
  logger.blank();
  logger.bold("Installation summary");
  logger.info(
    `${outcome.partition.primary.length} official and ` +
      `${outcome.partition.secondary.length} community package(s) requested`,
  );
  if (outcome.recipes.length > 0) {
    logger.table(
      ["meta-package", "outcome"],
      outcome.recipes.map((r) => [r.name, r.outcome]),
    );
  }
  if (outcome.backupDir) {
    logger.info(`Previous configuration saved to ${outcome.backupDir}`);
  }
  logger.info(
    `${outcome.services.results.filter((r) => r.status === "enabled").length} service(s) enabled`,
  );

  const counts = summarizeWarnings(outcome.warnings);
  if (counts.length > 0) {
    logger.warn(
      `Finished with ${outcome.warnings.length} warning(s): ` +
        counts.map(([kind, n]) => `${n} ${kind}`).join(", "),
    );
  }
  logger.blank();
  logger.success("Log out and choose Hyprland at the login screen to start your new desktop.");
}

export const installCommand = new Command("install")
  .description("Provision the Hyprland desktop on this machine")
  .option("-f, --force", "Upgrade the system first and overwrite conflicting files")
  .action(async (options: { force?: boolean }) => {
    const interactive = isInteractive();
    const scope = new CleanupScope();

    const onInterrupt = () => {
      scope.dispose();
      logger.error("Interrupted");
      process.exit(130);
    };
    process.once("SIGINT", onInterrupt);

    try {
      if (interactive) {
        p.intro("Hyprland desktop installer");
      } else {
        logger.blank();
      }

      const home = os.homedir();
      const outcome = await runProvision(
        { force: options.force === true },
        {
          runner: systemRunner,
          git: simpleGitClient,
          prompter: createPrompter(interactive),
          config: loadConfig({ home }),
          home,
          uid: process.getuid?.(),
          scope,
        },
      );

      printSummary(outcome);
      if (interactive) {
        p.outro("Done!");
      }
    } catch (err) {
      if (err instanceof UserCancelledError) {
        logger.warn(err.message);
      } else if (err instanceof ProvisionError) {
        logger.error(err.message);
      } else {
        throw err;
      }
      process.exitCode = 1;
    } finally {
      process.off("SIGINT", onInterrupt);
    }
  });
