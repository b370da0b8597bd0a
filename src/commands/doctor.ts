import os from "node:os";
import { Command } from "commander";
import * as p from "@clack/prompts";
import { loadConfig } from "../lib/config.js";
import { runDoctor, type DoctorResult } from "../lib/doctor.js";
import { errorMessage } from "../lib/errors.js";
import { systemRunner } from "../lib/exec.js";
import { simpleGitClient } from "../lib/git.js";
import { logger } from "../lib/logger.js";
import { isInteractive } from "../lib/prompts.js";

export const doctorCommand = new Command("doctor")
  .description("Check whether this machine is ready to install, without changing anything")
  .action(async () => {
    const interactive = isInteractive();
    const home = os.homedir();

    let result: DoctorResult;
    try {
      result = await runDoctor({
        runner: systemRunner,
        git: simpleGitClient,
        config: loadConfig({ home }),
        home,
        uid: process.getuid?.(),
      });
    } catch (err) {
      logger.error(errorMessage(err));
      process.exit(1);
    }

    if (interactive) {
      p.intro("Health check");
    } else {
      logger.blank();
    }

    if (result.environment) {
      logger.bold(`${result.environment.prettyName} (${result.environment.family})`);
    }
    for (const check of result.checks) {
      if (check.ok) logger.success(check.message);
    }

    if (result.issues.length === 0) {
      if (interactive) {
        p.outro("Everything looks good. No issues found.");
      } else {
        logger.success("Everything looks good. No issues found.");
        logger.blank();
      }
      return;
    }

    const errors = result.issues.filter((i) => i.severity === "error");
    const warnings = result.issues.filter((i) => i.severity === "warning");

    for (const issue of [...errors, ...warnings]) {
      if (issue.severity === "error") {
        logger.error(issue.message);
      } else {
        logger.warn(issue.message);
      }
      if (issue.fix) logger.dim(`  Fix: ${issue.fix}`);
    }

    const summary = `${errors.length} error(s), ${warnings.length} warning(s)`;
    if (interactive) {
      p.outro(summary);
    } else {
      logger.blank();
      if (errors.length > 0) {
        logger.error(summary);
      } else {
        logger.warn(summary);
      }
      logger.blank();
    }

    if (errors.length > 0) {
      process.exit(1);
    }
  });
