import type { ServiceEnableResult, ServiceSpec } from "../types/index.js";
import type { CommandRunner } from "./exec.js";
import { logger } from "./logger.js";
import type { ProvisionReport } from "./report.js";

export interface ServiceSummary {
  results: ServiceEnableResult[];
  failures: number;
}

async function unitExists(runner: CommandRunner, name: string): Promise<boolean> {
  const result = await runner.run("systemctl", ["cat", name]);
  return result.exitCode === 0;
}

/**
 * Enables each service in turn. Failures are counted and reported once at
 * the end; they never stop the run.
 */
export async function enableServices(
  services: readonly ServiceSpec[],
  runner: CommandRunner,
  report: ProvisionReport,
): Promise<ServiceSummary> {
  const results: ServiceEnableResult[] = [];

  for (const service of services) {
    const label = service.label ?? service.name;

    if (service.optional && !(await unitExists(runner, service.name))) {
      logger.dim(`${label} is not available on this system, skipping`);
      results.push({ name: service.name, status: "skipped-unavailable" });
      continue;
    }

    const enabled = await runner.run("sudo", ["systemctl", "enable", service.name]);
    if (enabled.exitCode !== 0) {
      logger.warn(`Failed to enable ${label}`);
      results.push({ name: service.name, status: "failed" });
    } else {
      logger.success(`${label} enabled`);
      results.push({ name: service.name, status: "enabled" });
    }

    if (service.start) {
      const active = await runner.run("systemctl", ["is-active", "--quiet", service.name]);
      if (active.exitCode !== 0) {
        logger.info(`Starting ${label}...`);
        const started = await runner.run("sudo", ["systemctl", "start", service.name]);
        if (started.exitCode !== 0) logger.warn(`Failed to start ${label}`);
      }
    }
  }

  const failures = results.filter((r) => r.status === "failed").length;
  if (failures === 0) {
    logger.success("All system services enabled successfully");
  } else if (failures <= 2) {
    report.warn("service-enable", `${failures} service(s) failed to enable. This is usually not critical.`);
  } else {
    report.warn(
      "service-enable",
      `${failures} service(s) failed to enable. You may need to enable them manually later.`,
    );
  }

  return { results, failures };
}
