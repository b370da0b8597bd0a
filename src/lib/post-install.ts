import fs from "node:fs";
import { expandHome, type PostInstallTask } from "./config.js";
import type { CommandRunner } from "./exec.js";
import { logger } from "./logger.js";
import type { ProvisionReport } from "./report.js";

/** Best-effort desktop setup commands. Returns how many succeeded. */
export async function runPostInstallTasks(
  tasks: readonly PostInstallTask[],
  runner: CommandRunner,
  home: string,
  report: ProvisionReport,
  exists: (p: string) => boolean = fs.existsSync,
): Promise<number> {
  let succeeded = 0;
  for (const task of tasks) {
    if (task.when && !exists(expandHome(task.when.pathExists, home))) {
      logger.dim(`${task.label}: skipped`);
      continue;
    }

    logger.info(`${task.label}...`);
    const args = task.args.map((arg) => expandHome(arg, home));
    const result = await runner.run(task.command, args);
    if (result.exitCode !== 0) {
      report.warn("post-install", `${task.label} failed (exit code ${result.exitCode})`);
    } else {
      succeeded++;
    }
  }
  return succeeded;
}
